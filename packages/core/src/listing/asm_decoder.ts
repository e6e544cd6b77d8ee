// ============================================================================
// @zxconv/core — HiSoft GEN Assembler Source Decoder
// ============================================================================
//
// Source line record:
//   [2 bytes] Line number (uint16 LE)
//   [N bytes] Source text, plain characters
//   [1 byte]  0x0D
//
// Some tools write the byte count of the rest of the file in front of the
// first line. It cannot be told apart from a line number except by its
// value, so a first field equal to the bytes remaining after it is taken
// as that count. A real first line number of the same value is lost.
// ============================================================================

import { decodeBytes } from '../charset/codepage.js';
import { plus3DosPayloadLength, readPlus3DosHeader, PLUS3DOS_HEADER_LENGTH } from '../header/plus3dos_header.js';
import { debug, logHeaderFound, logSoftEof } from '../logger.js';
import { asmDecodeOptionsSchema, parseOptions } from '../options.js';
import type { AsmDecodeOptions, ResolvedAsmDecodeOptions } from '../options.js';
import { LINE_END_BYTE, SOFT_EOF_BYTE } from '../types.js';
import type { EncodedLine } from '../types.js';
import { ByteReader } from './byte_reader.js';
import type { LineScanOptions } from './byte_reader.js';

const LINE_NUMBER_LENGTH = 2;

/** Width of the line number column when numbers are included. */
export const ASM_LINE_NUMBER_WIDTH = 6;

/**
 * Format one decoded line, optionally behind its number.
 */
export function formatAssemblerLine(line: EncodedLine, includeLineNumbers: boolean): string {
  if (!includeLineNumbers) {
    return `${line.text}\n`;
  }
  return `${String(line.lineNumber).padStart(ASM_LINE_NUMBER_WIDTH, ' ')}  ${line.text}\n`;
}

/**
 * GEN assembler source decoder.
 *
 * @example
 * ```ts
 * const decoder = new AssemblerListingDecoder({ includeLineNumbers: true });
 * const text = decoder.decode(bytes);
 * ```
 */
export class AssemblerListingDecoder {
  private readonly options: ResolvedAsmDecodeOptions;

  constructor(options: AsmDecodeOptions = {}) {
    this.options = parseOptions(asmDecodeOptionsSchema, options);
  }

  decode(data: Uint8Array): string {
    let text = '';
    for (const line of this.decodeLines(data)) {
      text += formatAssemblerLine(line, this.options.includeLineNumbers);
    }
    return text;
  }

  /**
   * Yield source lines in file order. A leading length prefix is not a line.
   */
  *decodeLines(data: Uint8Array): Generator<EncodedLine, void, undefined> {
    let reader = new ByteReader(data);
    let stopAtSoftEof = this.options.stopAtSoftEof;

    const plus3 = readPlus3DosHeader(data);
    if (plus3) {
      const budget = plus3DosPayloadLength(plus3.header);
      logHeaderFound('plus3dos', budget);
      reader = new ByteReader(data, PLUS3DOS_HEADER_LENGTH, budget);
      stopAtSoftEof = false;
    }

    const scan: LineScanOptions = { stopAtSoftEof, terminator: LINE_END_BYTE };
    let first = true;

    while (reader.remaining > 2) {
      const field = reader.read(LINE_NUMBER_LENGTH);
      if (!field) return;

      if (stopAtSoftEof && (field[0] === SOFT_EOF_BYTE || field[1] === SOFT_EOF_BYTE)) {
        logSoftEof(reader.offset - LINE_NUMBER_LENGTH);
        return;
      }

      const view = new DataView(field.buffer, field.byteOffset, field.byteLength);
      const lineNumber = view.getUint16(0, true);

      if (first) {
        first = false;
        if (lineNumber === reader.remaining) {
          debug('length prefix skipped', { length: lineNumber });
          continue;
        }
      }

      const body = reader.readLineBody(scan);
      if (body.end === 'softEof') {
        logSoftEof(reader.offset - 1);
        return;
      }

      yield { lineNumber, text: decodeBytes(body.bytes, 'assembler') };

      if (body.end === 'truncated') return;
    }
  }
}

/**
 * Decode a GEN assembler source file to Unicode text.
 */
export function decodeAssemblerSource(data: Uint8Array, options: AsmDecodeOptions = {}): string {
  return new AssemblerListingDecoder(options).decode(data);
}
