// ============================================================================
// @zxconv/core — Conversion Options
// ============================================================================
//
// Every public conversion accepts a partial options object; the schemas
// below fill in defaults and reject wrong types before any byte is read.
// ============================================================================

import { z } from 'zod';
import { OptionsValidationError } from './errors.js';

const lineNumberSchema = z.number().int().min(0).max(0xffff);

export const basicDecodeOptionsSchema = z.object({
  /** Token set: 128K (+2/+3) or 48K */
  variant: z.enum(['tokens128', 'tokens48']).default('tokens128'),
  /** Companion tape header (17 or 19 bytes) giving the program length */
  tapeHeader: z.instanceof(Uint8Array).optional(),
  /** Stop at the first 0x1A byte when no header bounds the file */
  stopAtSoftEof: z.boolean().default(false),
});

export const asmDecodeOptionsSchema = z.object({
  /** Prefix each line with its number, right-aligned in 6 columns */
  includeLineNumbers: z.boolean().default(false),
  stopAtSoftEof: z.boolean().default(false),
});

export const asmEncodeOptionsSchema = z.object({
  /** Write a +3DOS header (code file at 16384) ahead of the source */
  prependPlus3DosHeader: z.boolean().default(false),
  /** Terminate the output with 0x1A */
  appendSoftEof: z.boolean().default(false),
  /** When set, also produce a 17-byte tape header with this file name */
  tapeHeaderName: z.string().optional(),
  /** Number of the first line that carries no number of its own */
  firstLineNumber: lineNumberSchema.default(10),
  lineNumberStep: lineNumberSchema.min(1).default(10),
});

export type BasicDecodeOptions = z.input<typeof basicDecodeOptionsSchema>;
export type ResolvedBasicDecodeOptions = z.output<typeof basicDecodeOptionsSchema>;
export type AsmDecodeOptions = z.input<typeof asmDecodeOptionsSchema>;
export type ResolvedAsmDecodeOptions = z.output<typeof asmDecodeOptionsSchema>;
export type AsmEncodeOptions = z.input<typeof asmEncodeOptionsSchema>;
export type ResolvedAsmEncodeOptions = z.output<typeof asmEncodeOptionsSchema>;

/**
 * Validate options against a schema, applying its defaults.
 *
 * @throws {OptionsValidationError} If validation fails
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new OptionsValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}
