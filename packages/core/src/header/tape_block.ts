// ============================================================================
// @zxconv/core — Tape Block Framing
// ============================================================================
//
// A block as stored on tape:
//   [1 byte]  Flag: 0x00 header block, 0xFF data block
//   [N bytes] Payload
//   [1 byte]  Checksum: XOR of flag and payload
//
// Header flag is zero, so for a header block the checksum is simply the
// XOR of the 17 header bytes.
// ============================================================================

/** Result of stripping flag and checksum from a tape block. */
export type UnwrapResult = { ok: true; payload: Uint8Array } | { ok: false; reason: string };

/**
 * XOR of all bytes.
 */
export function tapeChecksum(bytes: Uint8Array): number {
  let checksum = 0;
  for (const byte of bytes) {
    checksum ^= byte;
  }
  return checksum;
}

/**
 * Frame a payload as a tape block.
 */
export function wrapTapeBlock(flag: number, payload: Uint8Array): Uint8Array {
  const block = new Uint8Array(payload.length + 2);
  block[0] = flag;
  block.set(payload, 1);
  block[block.length - 1] = (flag ^ tapeChecksum(payload)) & 0xff;
  return block;
}

/**
 * Check the flag and checksum of a tape block and return its payload.
 */
export function unwrapTapeBlock(block: Uint8Array, flag: number): UnwrapResult {
  if (block.length < 2) {
    return { ok: false, reason: `tape block too short (${block.length} bytes)` };
  }
  if (block[0] !== flag) {
    return { ok: false, reason: `tape block flag 0x${(block[0] ?? 0).toString(16)} (expected 0x${flag.toString(16)})` };
  }

  const payload = block.subarray(1, block.length - 1);
  const stored = block[block.length - 1];
  const computed = (flag ^ tapeChecksum(payload)) & 0xff;
  if (stored !== computed) {
    return { ok: false, reason: `tape block checksum 0x${(stored ?? 0).toString(16)} (computed 0x${computed.toString(16)})` };
  }

  return { ok: true, payload };
}
