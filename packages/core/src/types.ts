// ============================================================================
// @zxconv/core — Type Definitions & Format Constants
// ============================================================================
//
// Byte values and record sizes shared by the charset tables, the header
// codec and the listing codecs.
// ============================================================================

/**
 * Byte↔Unicode mapping in effect for one conversion.
 * - `tokens128` — 128K/+2/+3 BASIC tokens (0xA3 SPECTRUM, 0xA4 PLAY)
 * - `tokens48`  — 48K BASIC, where 0xA3/0xA4 are UDGs T and U
 * - `assembler` — 48K table with TAB passed through untranslated
 */
export type CodepageVariant = 'tokens128' | 'tokens48' | 'assembler';

/** Variants usable for tokenized BASIC. */
export type BasicCodepageVariant = Exclude<CodepageVariant, 'assembler'>;

// ---- Listing Bytes ----

/** CP/M end-of-file marker, found inside the last 128-byte record of a file. */
export const SOFT_EOF_BYTE = 0x1a;

/** Line terminator in both listing formats. */
export const LINE_END_BYTE = 0x0d;

/** Prefix of the 5-byte binary form of a number inside a BASIC line. */
export const BASIC_NUMBER_MARKER = 0x0e;

/** Length of the binary number that follows `BASIC_NUMBER_MARKER`. */
export const BASIC_NUMBER_LENGTH = 5;

/** BASIC line numbers at or above this value start the variables area. */
export const BASIC_VARIABLES_LINE = 0x4000;

/** Upper bound for a +3DOS / CP/M file (32 MiB). */
export const MAX_FILE_LENGTH = 32 * 1024 * 1024;

// ---- Tape Blocks ----

/** Leading byte of a tape header block. */
export const TAPE_HEADER_MARKER = 0x00;

// ---- Listing Records ----

/**
 * One line of a listing: the unit yielded by the streaming decoders.
 */
export interface EncodedLine {
  /** Line number as stored in the file */
  lineNumber: number;
  /** Decoded line text, without terminator */
  text: string;
}
