// ============================================================================
// @zxconv/core — Bounded Byte Reader
// ============================================================================

import { SOFT_EOF_BYTE } from '../types.js';

/** How a line body scan ended. */
export type LineEnd = 'line' | 'bound' | 'truncated' | 'softEof';

export interface LineBody {
  /** Raw line bytes, number literals removed, terminator excluded */
  bytes: Uint8Array;
  end: LineEnd;
}

export interface LineScanOptions {
  stopAtSoftEof: boolean;
  /** Byte that introduces an embedded literal to skip, with its length */
  skip?: { marker: number; length: number };
  terminator: number;
}

/**
 * Cursor over a byte array with a separate length budget.
 *
 * The budget (from a header, or the data length) is charged for every
 * read even when the data runs out first, so a header that overstates
 * the file length ends the scan at the physical end of data.
 */
export class ByteReader {
  private readonly data: Uint8Array;
  private position: number;
  private budget: number;

  constructor(data: Uint8Array, start = 0, budget = data.length - start) {
    this.data = data;
    this.position = start;
    this.budget = budget;
  }

  /** Bytes left in the budget (may go negative after a skip). */
  get remaining(): number {
    return this.budget;
  }

  get offset(): number {
    return this.position;
  }

  /**
   * Read `count` bytes. Returns `undefined` when the data holds fewer.
   */
  read(count: number): Uint8Array | undefined {
    this.budget -= count;
    if (this.position + count > this.data.length) {
      this.position = this.data.length;
      return undefined;
    }
    const bytes = this.data.subarray(this.position, this.position + count);
    this.position += count;
    return bytes;
  }

  readByte(): number | undefined {
    this.budget -= 1;
    if (this.position >= this.data.length) {
      return undefined;
    }
    const byte = this.data[this.position];
    this.position += 1;
    return byte;
  }

  /**
   * Read one line body: bytes up to the terminator or until the budget
   * is spent.
   */
  readLineBody(options: LineScanOptions): LineBody {
    const bytes: number[] = [];

    while (this.budget > 0) {
      const byte = this.readByte();
      if (byte === undefined) {
        return { bytes: Uint8Array.from(bytes), end: 'truncated' };
      }
      if (options.stopAtSoftEof && byte === SOFT_EOF_BYTE) {
        return { bytes: Uint8Array.from(bytes), end: 'softEof' };
      }
      if (options.skip && byte === options.skip.marker) {
        if (this.read(options.skip.length) === undefined) {
          return { bytes: Uint8Array.from(bytes), end: 'truncated' };
        }
        continue;
      }
      if (byte === options.terminator) {
        return { bytes: Uint8Array.from(bytes), end: 'line' };
      }
      bytes.push(byte);
    }

    return { bytes: Uint8Array.from(bytes), end: 'bound' };
  }
}
