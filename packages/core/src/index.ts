// ============================================================================
// @zxconv/core — Public API
// ============================================================================

// Charset
export { decodeByte, decodeBytes, encodeChar, encodeText } from './charset/codepage.js';
export type { EncodeCharResult } from './charset/codepage.js';
export { CHARSET, buildCharsetTables, charsetFileSchema } from './charset/tables.js';
export type { CharsetFile, CharsetTables } from './charset/tables.js';

// Tape / +3 BASIC headers
export {
  TAPE_HEADER_LENGTH,
  PLUS3_BASIC_HEADER_LENGTH,
  FILE_NAME_MAX_LENGTH,
  NO_AUTO_START,
  DEFAULT_CODE_ADDRESS,
  FILE_TYPE,
  headerLength,
  isValidAutoStartLine,
  isValidArrayName,
  createTapeHeader,
  programHeader,
  numericArrayHeader,
  charArrayHeader,
  codeHeader,
  withPayloadLength,
  isZeroedHeader,
  encodeTapeHeader,
  decodeTapeHeader,
} from './header/tape_header.js';
export type {
  HeaderLayout,
  TapeHeaderBody,
  TapeHeader,
  HeaderDecodeResult,
  EncodeTapeHeaderOptions,
} from './header/tape_header.js';
export { tapeChecksum, wrapTapeBlock, unwrapTapeBlock } from './header/tape_block.js';

// +3DOS headers
export {
  PLUS3DOS_SIGNATURE,
  PLUS3DOS_HEADER_LENGTH,
  createPlus3DosHeader,
  withPlus3DosPayloadLength,
  plus3DosPayloadLength,
  plus3DosChecksum,
  encodePlus3DosHeader,
  decodePlus3DosHeader,
  readPlus3DosHeader,
} from './header/plus3dos_header.js';
export type { Plus3DosHeader, Plus3DosFile } from './header/plus3dos_header.js';

// Listings
export { BasicListingDecoder, decodeBasicProgram, formatBasicLine } from './listing/basic_decoder.js';
export {
  AssemblerListingDecoder,
  decodeAssemblerSource,
  formatAssemblerLine,
  ASM_LINE_NUMBER_WIDTH,
} from './listing/asm_decoder.js';
export { encodeAssemblerSource, splitSourceLines, parseSourceLine } from './listing/asm_encoder.js';
export type { AssemblerEncodeResult } from './listing/asm_encoder.js';

// Options
export {
  basicDecodeOptionsSchema,
  asmDecodeOptionsSchema,
  asmEncodeOptionsSchema,
  parseOptions,
} from './options.js';
export type {
  BasicDecodeOptions,
  ResolvedBasicDecodeOptions,
  AsmDecodeOptions,
  ResolvedAsmDecodeOptions,
  AsmEncodeOptions,
  ResolvedAsmEncodeOptions,
} from './options.js';

// Errors
export {
  ZxConvError,
  EncodingError,
  LineNumberRangeError,
  HeaderFieldError,
  OptionsValidationError,
  ConflictingOptionsError,
} from './errors.js';

// Logging
export {
  debug,
  warn,
  Timer,
  timer,
  onLog,
  setLogLevel,
  getLogLevel,
  isDebugEnabled,
} from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

// Types
export * from './types.js';
