// ============================================================================
// @zxconv/core — +3DOS File Header
// ============================================================================
//
// Binary Format (128 bytes, little-endian):
//   [9 bytes]  Signature: "PLUS3DOS" + 0x1A
//   [1 byte]   Issue number
//   [1 byte]   Version number
//   [4 bytes]  File length including this header (uint32 LE)
//   [8 bytes]  +3 BASIC header (see tape_header.ts)
//   [104 bytes] Reserved (zero)
//   [1 byte]   Checksum: sum of bytes 0..126 modulo 256
//
// Files copied from a +3 disk in CP/M mode keep this header in front of
// the data; the length field is the only reliable end of the payload.
// ============================================================================

import { logHeaderRejected } from '../logger.js';
import { SOFT_EOF_BYTE } from '../types.js';
import {
  PLUS3_BASIC_HEADER_LENGTH,
  createTapeHeader,
  decodeTapeHeader,
  encodeTapeHeader,
  isZeroedHeader,
  withPayloadLength,
} from './tape_header.js';
import type { HeaderDecodeResult, TapeHeader } from './tape_header.js';

// ── Constants ───────────────────────────────────────────────────────────────

/** "PLUS3DOS" followed by the soft-EOF byte. */
export const PLUS3DOS_SIGNATURE = new Uint8Array([0x50, 0x4c, 0x55, 0x53, 0x33, 0x44, 0x4f, 0x53, SOFT_EOF_BYTE]);

export const PLUS3DOS_HEADER_LENGTH = 128;

const ISSUE_OFFSET = 9;
const VERSION_OFFSET = 10;
const FILE_LENGTH_OFFSET = 11;
const BASIC_HEADER_OFFSET = 15;
const CHECKSUM_OFFSET = PLUS3DOS_HEADER_LENGTH - 1;

// ── Types ───────────────────────────────────────────────────────────────────

export interface Plus3DosHeader {
  readonly issue: number;
  readonly version: number;
  /** Total file length, header included */
  readonly fileLength: number;
  /** Embedded +3 BASIC header (layout 'plus3') */
  readonly basicHeader: TapeHeader;
}

/** A file split at its +3DOS header. */
export interface Plus3DosFile {
  header: Plus3DosHeader;
  /** Bytes after the header, bounded by the header's file length */
  payload: Uint8Array;
}

// ── Construction ────────────────────────────────────────────────────────────

/**
 * Create a header for a payload of the given length, with a zeroed
 * +3 BASIC header.
 */
export function createPlus3DosHeader(payloadLength = 0): Plus3DosHeader {
  return {
    issue: 1,
    version: 0,
    fileLength: PLUS3DOS_HEADER_LENGTH + payloadLength,
    basicHeader: createTapeHeader('plus3'),
  };
}

/**
 * Set the payload length. A non-zeroed +3 BASIC header is kept in step.
 */
export function withPlus3DosPayloadLength(header: Plus3DosHeader, payloadLength: number): Plus3DosHeader {
  return {
    ...header,
    fileLength: PLUS3DOS_HEADER_LENGTH + payloadLength,
    basicHeader: isZeroedHeader(header.basicHeader)
      ? header.basicHeader
      : withPayloadLength(header.basicHeader, payloadLength),
  };
}

export function plus3DosPayloadLength(header: Plus3DosHeader): number {
  return header.fileLength - PLUS3DOS_HEADER_LENGTH;
}

/**
 * Sum of the bytes modulo 256.
 */
export function plus3DosChecksum(bytes: Uint8Array): number {
  let sum = 0;
  for (const byte of bytes) {
    sum += byte;
  }
  return sum % 256;
}

// ── Encoder ─────────────────────────────────────────────────────────────────

/**
 * Encode a header; the checksum is always recomputed.
 */
export function encodePlus3DosHeader(header: Plus3DosHeader): Uint8Array {
  const bytes = new Uint8Array(PLUS3DOS_HEADER_LENGTH);
  const view = new DataView(bytes.buffer);

  bytes.set(PLUS3DOS_SIGNATURE, 0);
  view.setUint8(ISSUE_OFFSET, header.issue);
  view.setUint8(VERSION_OFFSET, header.version);
  view.setUint32(FILE_LENGTH_OFFSET, header.fileLength, true);
  bytes.set(encodeTapeHeader(header.basicHeader), BASIC_HEADER_OFFSET);

  bytes[CHECKSUM_OFFSET] = plus3DosChecksum(bytes.subarray(0, CHECKSUM_OFFSET));
  return bytes;
}

// ── Decoder ─────────────────────────────────────────────────────────────────

/**
 * Decode a header. Length, signature, checksum and the embedded
 * +3 BASIC header must all be valid.
 */
export function decodePlus3DosHeader(bytes: Uint8Array): HeaderDecodeResult<Plus3DosHeader> {
  const fail = (reason: string): HeaderDecodeResult<Plus3DosHeader> => ({
    ok: false,
    header: createPlus3DosHeader(),
    reason,
  });

  if (bytes.length !== PLUS3DOS_HEADER_LENGTH) {
    return fail(`expected ${PLUS3DOS_HEADER_LENGTH} bytes, got ${bytes.length}`);
  }

  for (let i = 0; i < PLUS3DOS_SIGNATURE.length; i++) {
    if (bytes[i] !== PLUS3DOS_SIGNATURE[i]) {
      return fail('signature mismatch');
    }
  }

  const checksum = plus3DosChecksum(bytes.subarray(0, CHECKSUM_OFFSET));
  if (bytes[CHECKSUM_OFFSET] !== checksum) {
    return fail(`checksum 0x${(bytes[CHECKSUM_OFFSET] ?? 0).toString(16)} (computed 0x${checksum.toString(16)})`);
  }

  const basic = decodeTapeHeader(
    bytes.subarray(BASIC_HEADER_OFFSET, BASIC_HEADER_OFFSET + PLUS3_BASIC_HEADER_LENGTH),
    'plus3',
  );
  if (!basic.ok) {
    return fail(`+3 BASIC header: ${basic.reason}`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    ok: true,
    header: {
      issue: view.getUint8(ISSUE_OFFSET),
      version: view.getUint8(VERSION_OFFSET),
      fileLength: view.getUint32(FILE_LENGTH_OFFSET, true),
      basicHeader: basic.header,
    },
  };
}

/**
 * Split `data` at a leading +3DOS header, if it has a valid one.
 */
export function readPlus3DosHeader(data: Uint8Array): Plus3DosFile | undefined {
  if (data.length < PLUS3DOS_HEADER_LENGTH) {
    return undefined;
  }
  const result = decodePlus3DosHeader(data.subarray(0, PLUS3DOS_HEADER_LENGTH));
  if (!result.ok) {
    logHeaderRejected('plus3dos', result.reason);
    return undefined;
  }
  const payloadLength = Math.max(0, plus3DosPayloadLength(result.header));
  return {
    header: result.header,
    payload: data.subarray(PLUS3DOS_HEADER_LENGTH, PLUS3DOS_HEADER_LENGTH + payloadLength),
  };
}
