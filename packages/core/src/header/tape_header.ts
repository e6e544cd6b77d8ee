// ============================================================================
// @zxconv/core — Tape Header / +3 BASIC Header
// ============================================================================
//
// Tape layout (17 bytes, 19 when framed as a tape block):
//   [1 byte]   File type: 0 program, 1 numeric array, 2 char array, 3 code
//   [10 bytes] File name, space padded
//   [2 bytes]  Payload length (uint16 LE)
//   [2 bytes]  Param 1 (uint16 LE)
//   [2 bytes]  Param 2 (uint16 LE)
//
// +3 BASIC layout (8 bytes, bytes 15..22 of a +3DOS header):
//   [1 byte]   File type
//   [2 bytes]  Payload length
//   [2 bytes]  Param 1
//   [2 bytes]  Param 2
//   [1 byte]   Unused (zero)
//
// Params by type:
//   program  → auto-start line, program length (offset to variables)
//   arrays   → 0x00, array name letter, 0x0000
//   code     → load address, 0x8000 on tape / 0x0000 in +3 BASIC header
// ============================================================================

import { decodeByte, decodeBytes, encodeChar, encodeText } from '../charset/codepage.js';
import { EncodingError, HeaderFieldError } from '../errors.js';
import { TAPE_HEADER_MARKER } from '../types.js';
import { unwrapTapeBlock, wrapTapeBlock } from './tape_block.js';

// ── Constants ───────────────────────────────────────────────────────────────

export const TAPE_HEADER_LENGTH = 17;
export const PLUS3_BASIC_HEADER_LENGTH = 8;
export const FILE_NAME_MAX_LENGTH = 10;

/** Auto-start value meaning "do not run after LOAD". */
export const NO_AUTO_START = 0x8000;

/**
 * Load address used when it does not matter. Screen memory makes a
 * mistaken `LOAD "x" CODE` obvious.
 */
export const DEFAULT_CODE_ADDRESS = 16384;

/** Param 2 of a code header on tape (historical value). */
const TAPE_CODE_PARAM2 = 0x8000;

export const FILE_TYPE = {
  program: 0,
  numericArray: 1,
  charArray: 2,
  code: 3,
} as const;

// ── Types ───────────────────────────────────────────────────────────────────

/** Which of the two record layouts a header uses. */
export type HeaderLayout = 'tape' | 'plus3';

/** Type-specific fields; exactly one group per file type. */
export type TapeHeaderBody =
  | { type: 'none' }
  | { type: 'program'; autoStartLine: number; programLength: number }
  | { type: 'numericArray'; arrayName: string }
  | { type: 'charArray'; arrayName: string }
  | { type: 'code'; loadAddress: number };

export interface TapeHeader {
  readonly layout: HeaderLayout;
  /** File name; always empty in the +3 BASIC layout */
  readonly fileName: string;
  readonly payloadLength: number;
  readonly body: TapeHeaderBody;
}

/**
 * Header decode outcome. On failure `header` is the zeroed header of the
 * requested layout.
 */
export type HeaderDecodeResult<T> =
  | { ok: true; header: T }
  | { ok: false; header: T; reason: string };

export interface EncodeTapeHeaderOptions {
  /** Frame as a tape header block: 0x00 flag + header + XOR checksum */
  wrapped?: boolean;
}

// ── Validation ──────────────────────────────────────────────────────────────

export function headerLength(layout: HeaderLayout): number {
  return layout === 'tape' ? TAPE_HEADER_LENGTH : PLUS3_BASIC_HEADER_LENGTH;
}

export function isValidAutoStartLine(line: number): boolean {
  return line === NO_AUTO_START || (line >= 1 && line <= 9999);
}

export function isValidArrayName(name: string): boolean {
  return /^[A-Za-z]$/.test(name);
}

function assertUint16(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new HeaderFieldError(field, value, 'must be an integer in 0..65535');
  }
}

// ── Construction ────────────────────────────────────────────────────────────

/**
 * Create a zeroed header.
 */
export function createTapeHeader(
  layout: HeaderLayout = 'tape',
  fileName = '',
  payloadLength = 0,
): TapeHeader {
  if (layout === 'plus3' && fileName !== '') {
    throw new HeaderFieldError('fileName', fileName, '+3 BASIC headers carry no file name');
  }
  if (Array.from(fileName).length > FILE_NAME_MAX_LENGTH) {
    throw new HeaderFieldError('fileName', fileName, `longer than ${FILE_NAME_MAX_LENGTH} characters`);
  }
  assertUint16('payloadLength', payloadLength);
  return { layout, fileName, payloadLength, body: { type: 'none' } };
}

export function programHeader(
  header: TapeHeader,
  autoStartLine: number = NO_AUTO_START,
  programLength = 0,
): TapeHeader {
  if (!isValidAutoStartLine(autoStartLine)) {
    throw new HeaderFieldError('autoStartLine', autoStartLine, 'must be 1..9999 or NO_AUTO_START');
  }
  assertUint16('programLength', programLength);
  return { ...header, body: { type: 'program', autoStartLine, programLength } };
}

export function numericArrayHeader(header: TapeHeader, arrayName: string): TapeHeader {
  if (!isValidArrayName(arrayName)) {
    throw new HeaderFieldError('arrayName', arrayName, 'must be a single letter');
  }
  return { ...header, body: { type: 'numericArray', arrayName } };
}

export function charArrayHeader(header: TapeHeader, arrayName: string): TapeHeader {
  if (!isValidArrayName(arrayName)) {
    throw new HeaderFieldError('arrayName', arrayName, 'must be a single letter');
  }
  return { ...header, body: { type: 'charArray', arrayName } };
}

export function codeHeader(header: TapeHeader, loadAddress: number = DEFAULT_CODE_ADDRESS): TapeHeader {
  assertUint16('loadAddress', loadAddress);
  return { ...header, body: { type: 'code', loadAddress } };
}

export function withPayloadLength(header: TapeHeader, payloadLength: number): TapeHeader {
  assertUint16('payloadLength', payloadLength);
  return { ...header, payloadLength };
}

/**
 * True for a header with no type and no field set (how +3DOS reports a
 * file without header data).
 */
export function isZeroedHeader(header: TapeHeader): boolean {
  if (header.payloadLength !== 0) return false;
  const { body } = header;
  return (
    body.type === 'none' ||
    (body.type === 'program' && body.autoStartLine === 0 && body.programLength === 0)
  );
}

function fileTypeByte(body: TapeHeaderBody): number {
  return body.type === 'none' ? FILE_TYPE.program : FILE_TYPE[body.type];
}

// ── Encoder ─────────────────────────────────────────────────────────────────

/**
 * Encode a header. Field ranges are not re-checked, so any decoded header
 * can be written back unchanged.
 *
 * @throws {EncodingError} If the file or array name has an unencodable character
 */
export function encodeTapeHeader(header: TapeHeader, options: EncodeTapeHeaderOptions = {}): Uint8Array {
  const bytes = new Uint8Array(headerLength(header.layout));
  const view = new DataView(bytes.buffer);

  if (header.layout === 'tape' || !isZeroedHeader(header)) {
    bytes[0] = fileTypeByte(header.body);
    let offset = 1;

    if (header.layout === 'tape') {
      // Padded by code points: a UDG letter is one byte but two UTF-16 units.
      const name = Array.from(header.fileName.trim()).slice(0, FILE_NAME_MAX_LENGTH);
      while (name.length < FILE_NAME_MAX_LENGTH) {
        name.push(' ');
      }
      bytes.set(encodeText(name.join(''), 'tokens128'), offset);
      offset += FILE_NAME_MAX_LENGTH;
    }

    view.setUint16(offset, header.payloadLength, true);
    offset += 2;

    const { body } = header;
    switch (body.type) {
      case 'program':
        view.setUint16(offset, body.autoStartLine, true);
        view.setUint16(offset + 2, body.programLength, true);
        break;
      case 'numericArray':
      case 'charArray': {
        const letter = encodeChar(body.arrayName, 'tokens128');
        if (!letter.ok) {
          throw new EncodingError(body.arrayName, 0);
        }
        bytes[offset + 1] = letter.byte;
        break;
      }
      case 'code':
        view.setUint16(offset, body.loadAddress, true);
        view.setUint16(offset + 2, header.layout === 'tape' ? TAPE_CODE_PARAM2 : 0, true);
        break;
      case 'none':
        break;
    }
  }

  if (options.wrapped) {
    if (header.layout !== 'tape') {
      throw new HeaderFieldError('layout', header.layout, 'only tape headers can be framed as a tape block');
    }
    return wrapTapeBlock(TAPE_HEADER_MARKER, bytes);
  }
  return bytes;
}

// ── Decoder ─────────────────────────────────────────────────────────────────

/**
 * Decode a header. Tape headers may also be given framed as a tape block
 * (19 bytes), whose flag and checksum are then verified.
 *
 * Never throws: any structural problem yields `ok: false` with the zeroed
 * header of the layout.
 */
export function decodeTapeHeader(
  bytes: Uint8Array,
  layout: HeaderLayout = 'tape',
): HeaderDecodeResult<TapeHeader> {
  const zeroed = createTapeHeader(layout);
  const fail = (reason: string): HeaderDecodeResult<TapeHeader> => ({ ok: false, header: zeroed, reason });
  const length = headerLength(layout);

  let record = bytes;
  if (layout === 'tape' && bytes.length === length + 2) {
    const unwrapped = unwrapTapeBlock(bytes, TAPE_HEADER_MARKER);
    if (!unwrapped.ok) {
      return fail(unwrapped.reason);
    }
    record = unwrapped.payload;
  }

  if (record.length !== length) {
    return fail(`expected ${length} bytes, got ${record.length}`);
  }

  if (record.every((byte) => byte === 0)) {
    return { ok: true, header: zeroed };
  }

  const view = new DataView(record.buffer, record.byteOffset, record.byteLength);
  const fileType = record[0];

  let fileName = '';
  let offset = 1;
  if (layout === 'tape') {
    // Names are not tokenized: the 48K table keeps 0xA3/0xA4 as UDGs
    fileName = decodeBytes(record.subarray(1, 1 + FILE_NAME_MAX_LENGTH), 'tokens48').trim();
    offset += FILE_NAME_MAX_LENGTH;
  }

  const payloadLength = view.getUint16(offset, true);
  const base: TapeHeader = { layout, fileName, payloadLength, body: { type: 'none' } };

  switch (fileType) {
    case FILE_TYPE.program: {
      const autoStartLine = view.getUint16(offset + 2, true);
      const programLength = view.getUint16(offset + 4, true);
      if (!isValidAutoStartLine(autoStartLine)) {
        return fail(`auto-start line ${autoStartLine} out of range`);
      }
      return { ok: true, header: { ...base, body: { type: 'program', autoStartLine, programLength } } };
    }
    case FILE_TYPE.numericArray:
    case FILE_TYPE.charArray: {
      const arrayName = decodeByte(view.getUint8(offset + 3), 'tokens128');
      if (!isValidArrayName(arrayName)) {
        return fail(`array name ${JSON.stringify(arrayName)} is not a letter`);
      }
      const type = fileType === FILE_TYPE.numericArray ? 'numericArray' : 'charArray';
      return { ok: true, header: { ...base, body: { type, arrayName } } };
    }
    case FILE_TYPE.code:
      return { ok: true, header: { ...base, body: { type: 'code', loadAddress: view.getUint16(offset + 2, true) } } };
    default:
      return fail(`unknown file type ${fileType}`);
  }
}
