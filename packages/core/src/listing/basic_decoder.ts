// ============================================================================
// @zxconv/core — Sinclair BASIC Listing Decoder
// ============================================================================
//
// Program line record:
//   [2 bytes] Line number (uint16 BE)
//   [2 bytes] Line length (uint16 LE), unused: the scan finds 0x0D
//   [N bytes] Tokenized text; 0x0E is followed by a 5-byte number that
//             duplicates the digits before it and is skipped
//   [1 byte]  0x0D
//
// A program saved from memory is followed by its variables area; the
// first "line number" of 0x4000 or more marks it when no header gives
// the program length.
// ============================================================================

import { decodeBytes } from '../charset/codepage.js';
import { decodeTapeHeader } from '../header/tape_header.js';
import { plus3DosPayloadLength, readPlus3DosHeader, PLUS3DOS_HEADER_LENGTH } from '../header/plus3dos_header.js';
import { debug, logHeaderFound, logHeaderRejected, logSoftEof } from '../logger.js';
import { basicDecodeOptionsSchema, parseOptions } from '../options.js';
import type { BasicDecodeOptions, ResolvedBasicDecodeOptions } from '../options.js';
import {
  BASIC_NUMBER_LENGTH,
  BASIC_NUMBER_MARKER,
  BASIC_VARIABLES_LINE,
  LINE_END_BYTE,
  MAX_FILE_LENGTH,
  SOFT_EOF_BYTE,
} from '../types.js';
import type { EncodedLine } from '../types.js';
import { ByteReader } from './byte_reader.js';
import type { LineScanOptions } from './byte_reader.js';

const LINE_HEAD_LENGTH = 4;

/** Where the program starts and how far it may be trusted to run. */
interface ProgramBounds {
  start: number;
  budget: number;
  programLengthKnown: boolean;
  stopAtSoftEof: boolean;
}

/**
 * Format one decoded line: number right-aligned in 4 columns, a space,
 * the text.
 */
export function formatBasicLine(line: EncodedLine): string {
  return `${String(line.lineNumber).padStart(4, ' ')} ${line.text}\n`;
}

/**
 * Sinclair BASIC program decoder.
 *
 * Accepts a raw program, a program behind a +3DOS header, or a raw
 * program plus its tape header (given in the options).
 *
 * @example
 * ```ts
 * const decoder = new BasicListingDecoder({ variant: 'tokens48' });
 * for (const line of decoder.decodeLines(bytes)) {
 *   console.log(line.lineNumber, line.text);
 * }
 * ```
 */
export class BasicListingDecoder {
  private readonly options: ResolvedBasicDecodeOptions;

  constructor(options: BasicDecodeOptions = {}) {
    this.options = parseOptions(basicDecodeOptionsSchema, options);
  }

  /**
   * Decode a whole program to text, one formatted line per program line.
   */
  decode(data: Uint8Array): string {
    let text = '';
    for (const line of this.decodeLines(data)) {
      text += formatBasicLine(line);
    }
    return text;
  }

  /**
   * Yield program lines in file order.
   */
  *decodeLines(data: Uint8Array): Generator<EncodedLine, void, undefined> {
    const bounds = this.resolveBounds(data);
    const reader = new ByteReader(data, bounds.start, bounds.budget);
    const scan: LineScanOptions = {
      stopAtSoftEof: bounds.stopAtSoftEof,
      skip: { marker: BASIC_NUMBER_MARKER, length: BASIC_NUMBER_LENGTH },
      terminator: LINE_END_BYTE,
    };

    while (reader.remaining > 2) {
      const head = reader.read(LINE_HEAD_LENGTH);
      if (!head) return;

      if (bounds.stopAtSoftEof && (head[0] === SOFT_EOF_BYTE || head[1] === SOFT_EOF_BYTE)) {
        logSoftEof(reader.offset - LINE_HEAD_LENGTH);
        return;
      }

      const view = new DataView(head.buffer, head.byteOffset, head.byteLength);
      const lineNumber = view.getUint16(0, false);

      if (!bounds.programLengthKnown && lineNumber >= BASIC_VARIABLES_LINE) {
        debug(`variables area at offset ${reader.offset - LINE_HEAD_LENGTH}`, { lineNumber });
        return;
      }

      const body = reader.readLineBody(scan);
      if (body.end === 'softEof') {
        logSoftEof(reader.offset - 1);
        return;
      }

      yield { lineNumber, text: decodeBytes(body.bytes, this.options.variant) };

      if (body.end === 'truncated') return;
    }
  }

  private resolveBounds(data: Uint8Array): ProgramBounds {
    const plus3 = readPlus3DosHeader(data);
    if (plus3) {
      let budget = plus3DosPayloadLength(plus3.header);
      let programLengthKnown = false;
      const { body } = plus3.header.basicHeader;
      if (body.type === 'program') {
        budget = Math.min(budget, body.programLength);
        programLengthKnown = true;
      }
      logHeaderFound('plus3dos', budget);
      return { start: PLUS3DOS_HEADER_LENGTH, budget, programLengthKnown, stopAtSoftEof: false };
    }

    if (this.options.tapeHeader) {
      const tape = decodeTapeHeader(this.options.tapeHeader, 'tape');
      if (!tape.ok) {
        logHeaderRejected('tape', tape.reason);
      } else if (tape.header.body.type === 'program') {
        const budget = Math.min(MAX_FILE_LENGTH, tape.header.body.programLength);
        logHeaderFound('tape', budget);
        return { start: 0, budget, programLengthKnown: true, stopAtSoftEof: false };
      } else {
        logHeaderRejected('tape', `not a program header (${tape.header.body.type})`);
      }
    }

    return {
      start: 0,
      budget: MAX_FILE_LENGTH,
      programLengthKnown: false,
      stopAtSoftEof: this.options.stopAtSoftEof,
    };
  }
}

/**
 * Decode a Sinclair BASIC program to Unicode text.
 */
export function decodeBasicProgram(data: Uint8Array, options: BasicDecodeOptions = {}): string {
  return new BasicListingDecoder(options).decode(data);
}
