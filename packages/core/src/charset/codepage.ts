// ============================================================================
// @zxconv/core — Codepage Translation
// ============================================================================

import { EncodingError } from '../errors.js';
import type { CodepageVariant } from '../types.js';
import { CHARSET } from './tables.js';

/** Highest code point handled by the Latin-1 fallback. */
const LATIN1_MAX = 0xff;

/**
 * Outcome of encoding one character. Unmappable characters are reported,
 * not thrown, so callers can decide how to fail.
 */
export type EncodeCharResult = { ok: true; byte: number } | { ok: false; char: string };

function encodeTableFor(variant: CodepageVariant): ReadonlyMap<number, number> {
  return variant === 'assembler' ? CHARSET.encodeWithoutTab : CHARSET.encodeWithTab;
}

/**
 * Decode one byte. Tokens expand to their keyword text, so the result may
 * be several characters long.
 */
export function decodeByte(byte: number, variant: CodepageVariant): string {
  return CHARSET.decode[variant][byte & 0xff] ?? '';
}

/**
 * Decode a byte sequence with no listing structure (no line records, no
 * number markers).
 */
export function decodeBytes(bytes: Uint8Array, variant: CodepageVariant): string {
  const table = CHARSET.decode[variant];
  let text = '';
  for (const byte of bytes) {
    text += table[byte] ?? '';
  }
  return text;
}

/**
 * Encode a single Unicode character (one code point).
 *
 * Several Unicode characters may map to the same byte (UDG letter blocks,
 * blank spaces). Keywords are never folded back into token bytes.
 */
export function encodeChar(char: string, variant: CodepageVariant): EncodeCharResult {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) {
    return { ok: false, char };
  }

  const mapped = encodeTableFor(variant).get(codePoint);
  if (mapped !== undefined) {
    return { ok: true, byte: mapped };
  }

  if (codePoint <= LATIN1_MAX) {
    return { ok: true, byte: codePoint };
  }

  return { ok: false, char };
}

/**
 * Encode text to ZX Spectrum bytes.
 *
 * @throws {EncodingError} On the first character with no representation
 */
export function encodeText(text: string, variant: CodepageVariant): Uint8Array {
  const bytes: number[] = [];
  let index = 0;
  for (const char of text) {
    const result = encodeChar(char, variant);
    if (!result.ok) {
      throw new EncodingError(result.char, index);
    }
    bytes.push(result.byte);
    index += char.length;
  }
  return Uint8Array.from(bytes);
}
