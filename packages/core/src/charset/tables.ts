// ============================================================================
// @zxconv/core — Charset Tables
// ============================================================================
//
// Built once from data/charset.json:
//   decode: one 256-entry string array per CodepageVariant
//   encode: one Map<codePoint, byte> with TAB, one without
//
// Layout of the ZX Spectrum character set above ASCII:
//   0x80–0x8F  block graphics (2×2 quadrants)
//   0x90–0xA2  UDGs A–S (0xA3/0xA4 are UDGs T/U on the 48K)
//   0xA3–0xFF  BASIC keyword tokens
// ============================================================================

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { CodepageVariant } from '../types.js';

const byteSchema = z.number().int().min(0).max(0xff);
const hexCodePointSchema = z.string().regex(/^[0-9A-F]{4,5}$/);

const mappingSchema = z.object({
  byte: byteSchema,
  char: z.string().min(1),
});

export const charsetFileSchema = z.object({
  printComma: mappingSchema,
  newline: mappingSchema,
  symbols: z.array(mappingSchema),
  blockGraphics: z.object({
    firstByte: byteSchema,
    chars: z.array(z.string().min(1)).length(16),
    blankAliases: z.array(z.string().min(1)),
  }),
  udg: z.object({
    firstByte: byteSchema,
    count48: z.number().int().positive(),
    count128: z.number().int().positive(),
    displayBlock: hexCodePointSchema,
    aliasBlocks: z.array(hexCodePointSchema).min(1),
  }),
  tokens: z.object({
    firstByte: byteSchema,
    keywords: z.array(z.string().min(1)),
  }),
});

export type CharsetFile = z.infer<typeof charsetFileSchema>;

/** Immutable lookup tables for every variant. */
export interface CharsetTables {
  readonly decode: Readonly<Record<CodepageVariant, readonly string[]>>;
  readonly encodeWithTab: ReadonlyMap<number, number>;
  readonly encodeWithoutTab: ReadonlyMap<number, number>;
}

function loadCharsetFile(): CharsetFile {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/charset.json', import.meta.url), 'utf-8'),
  );
  return charsetFileSchema.parse(raw);
}

function codePointOf(char: string): number {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) {
    throw new Error('Empty character in charset table');
  }
  return codePoint;
}

/**
 * Build the decode arrays and encode maps from the charset description.
 */
export function buildCharsetTables(file: CharsetFile): CharsetTables {
  // ---- Decode (byte → Unicode) ----
  const base: string[] = [];
  for (let b = 0; b < 256; b++) {
    base.push(String.fromCharCode(b));
  }

  base[file.printComma.byte] = file.printComma.char;
  base[file.newline.byte] = file.newline.char;
  for (const { byte, char } of file.symbols) {
    base[byte] = char;
  }
  file.blockGraphics.chars.forEach((char, i) => {
    base[file.blockGraphics.firstByte + i] = char;
  });

  const udgDisplay = Number.parseInt(file.udg.displayBlock, 16);
  const udg = (count: number, table: string[]): void => {
    for (let i = 0; i < count; i++) {
      table[file.udg.firstByte + i] = String.fromCodePoint(udgDisplay + i);
    }
  };

  const tokens128 = [...base];
  udg(file.udg.count128, tokens128);
  file.tokens.keywords.forEach((keyword, i) => {
    tokens128[file.tokens.firstByte + i] = keyword;
  });

  const tokens48 = [...tokens128];
  udg(file.udg.count48, tokens48);

  const assembler = [...tokens48];
  assembler[file.printComma.byte] = String.fromCharCode(file.printComma.byte);

  // ---- Encode (Unicode → byte) ----
  const encodeWithTab = new Map<number, number>();
  encodeWithTab.set(codePointOf(file.printComma.char), file.printComma.byte);
  encodeWithTab.set(codePointOf(file.newline.char), file.newline.byte);
  for (const { byte, char } of file.symbols) {
    encodeWithTab.set(codePointOf(char), byte);
  }
  for (const alias of file.blockGraphics.blankAliases) {
    encodeWithTab.set(codePointOf(alias), file.blockGraphics.firstByte);
  }
  file.blockGraphics.chars.forEach((char, i) => {
    encodeWithTab.set(codePointOf(char), file.blockGraphics.firstByte + i);
  });
  for (const block of file.udg.aliasBlocks) {
    const first = Number.parseInt(block, 16);
    for (let i = 0; i < file.udg.count48; i++) {
      encodeWithTab.set(first + i, file.udg.firstByte + i);
    }
  }

  const encodeWithoutTab = new Map(encodeWithTab);
  encodeWithoutTab.delete(codePointOf(file.printComma.char));

  return {
    decode: Object.freeze({
      tokens128: Object.freeze(tokens128),
      tokens48: Object.freeze(tokens48),
      assembler: Object.freeze(assembler),
    }),
    encodeWithTab,
    encodeWithoutTab,
  };
}

/** Process-wide tables, built at module load. */
export const CHARSET: CharsetTables = buildCharsetTables(loadCharsetFile());
