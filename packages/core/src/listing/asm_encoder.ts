// ============================================================================
// @zxconv/core — HiSoft GEN Assembler Source Encoder
// ============================================================================
//
// Text lines may start with their own number ("20 NOP"); lines without
// one continue the count from the previous line. Output records are
// described in asm_decoder.ts.
// ============================================================================

import { encodeText } from '../charset/codepage.js';
import { LineNumberRangeError } from '../errors.js';
import {
  createPlus3DosHeader,
  encodePlus3DosHeader,
  withPlus3DosPayloadLength,
  PLUS3DOS_HEADER_LENGTH,
} from '../header/plus3dos_header.js';
import type { Plus3DosHeader } from '../header/plus3dos_header.js';
import {
  codeHeader,
  createTapeHeader,
  encodeTapeHeader,
  DEFAULT_CODE_ADDRESS,
  FILE_NAME_MAX_LENGTH,
} from '../header/tape_header.js';
import { debug } from '../logger.js';
import { asmEncodeOptionsSchema, parseOptions } from '../options.js';
import type { AsmEncodeOptions } from '../options.js';
import { LINE_END_BYTE, SOFT_EOF_BYTE } from '../types.js';

const NUMBERED_LINE = /^ *([0-9]+)(?![\p{L}\p{N}_]) {0,2}(.*)$/su;

export interface AssemblerEncodeResult {
  /** Encoded source, +3DOS header first when requested */
  data: Uint8Array;
  /** 17-byte tape header, present when `tapeHeaderName` was given */
  tapeHeader?: Uint8Array;
}

// ── Growable Buffer ─────────────────────────────────────────────────────────

/**
 * A growable byte buffer backed by a Uint8Array. Doubles capacity on
 * overflow; bytes already written can be patched in place.
 */
class GrowableBuffer {
  private buf: Uint8Array;
  private pos = 0;

  constructor(initialCapacity = 4096) {
    this.buf = new Uint8Array(initialCapacity);
  }

  get length(): number {
    return this.pos;
  }

  toUint8Array(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }

  private ensure(extra: number): void {
    const needed = this.pos + extra;
    if (needed <= this.buf.length) return;
    let cap = this.buf.length;
    while (cap < needed) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
  }

  writeByte(b: number): void {
    this.ensure(1);
    this.buf[this.pos++] = b;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensure(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  writeUint16(value: number): void {
    this.ensure(2);
    this.buf[this.pos++] = value & 0xff;
    this.buf[this.pos++] = (value >>> 8) & 0xff;
  }

  /** Overwrite already-written bytes starting at `offset`. */
  patch(offset: number, bytes: Uint8Array): void {
    this.buf.set(bytes, offset);
  }
}

// ── Line Parsing ────────────────────────────────────────────────────────────

/**
 * Split text into lines on CRLF, CR or LF. A trailing line break does not
 * start another line.
 */
export function splitSourceLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Separate an optional leading line number from the source text.
 */
export function parseSourceLine(line: string): { lineNumber?: number; text: string } {
  const match = NUMBERED_LINE.exec(line);
  if (!match) {
    return { text: line };
  }
  const [, digits = '', rest = ''] = match;
  return { lineNumber: Number(digits), text: rest };
}

// ── Encoder ─────────────────────────────────────────────────────────────────

/**
 * Encode Unicode assembler source to a GEN source file.
 *
 * @throws {EncodingError} If a character has no byte in the assembler table
 * @throws {LineNumberRangeError} If a line number does not fit 16 bits
 *
 * @example
 * ```ts
 * const { data } = encodeAssemblerSource('20 NOP\nHALT\n');
 * // lines 20 and 30
 * ```
 */
export function encodeAssemblerSource(text: string, options: AsmEncodeOptions = {}): AssemblerEncodeResult {
  const opts = parseOptions(asmEncodeOptionsSchema, options);
  const out = new GrowableBuffer();

  if (opts.prependPlus3DosHeader) {
    out.writeBytes(new Uint8Array(PLUS3DOS_HEADER_LENGTH));
  }

  let lineNumber = opts.firstLineNumber;
  for (const raw of splitSourceLines(text)) {
    const parsed = parseSourceLine(raw.trimEnd());
    if (parsed.lineNumber !== undefined) {
      lineNumber = parsed.lineNumber;
    }
    if (lineNumber > 0xffff) {
      throw new LineNumberRangeError(lineNumber);
    }
    out.writeUint16(lineNumber);
    out.writeBytes(encodeText(parsed.text, 'assembler'));
    out.writeByte(LINE_END_BYTE);
    lineNumber += opts.lineNumberStep;
  }

  const bodyLength = out.length - (opts.prependPlus3DosHeader ? PLUS3DOS_HEADER_LENGTH : 0);

  if (opts.appendSoftEof) {
    out.writeByte(SOFT_EOF_BYTE);
  }

  if (opts.prependPlus3DosHeader) {
    const blank = createPlus3DosHeader();
    const header: Plus3DosHeader = withPlus3DosPayloadLength(
      { ...blank, basicHeader: codeHeader(blank.basicHeader, DEFAULT_CODE_ADDRESS) },
      bodyLength,
    );
    out.patch(0, encodePlus3DosHeader(header));
    debug('+3DOS header written', { payloadLength: bodyLength });
  }

  const data = out.toUint8Array();
  if (opts.tapeHeaderName === undefined) {
    return { data };
  }

  const name = Array.from(opts.tapeHeaderName).slice(0, FILE_NAME_MAX_LENGTH).join('');
  const tapeHeader = encodeTapeHeader(
    codeHeader(createTapeHeader('tape', name, data.length), DEFAULT_CODE_ADDRESS),
  );
  return { data, tapeHeader };
}
