import { describe, expect, it } from 'vitest';
import { OptionsValidationError } from '../errors.js';
import {
  asmDecodeOptionsSchema,
  asmEncodeOptionsSchema,
  basicDecodeOptionsSchema,
  parseOptions,
} from '../options.js';

describe('Options', () => {
  it('fills in defaults', () => {
    expect(parseOptions(basicDecodeOptionsSchema, {})).toEqual({ variant: 'tokens128', stopAtSoftEof: false });
    expect(parseOptions(asmDecodeOptionsSchema, undefined)).toEqual({
      includeLineNumbers: false,
      stopAtSoftEof: false,
    });
    expect(parseOptions(asmEncodeOptionsSchema, {})).toEqual({
      prependPlus3DosHeader: false,
      appendSoftEof: false,
      firstLineNumber: 10,
      lineNumberStep: 10,
    });
  });

  it('keeps given values', () => {
    const tapeHeader = new Uint8Array(17);
    expect(parseOptions(basicDecodeOptionsSchema, { variant: 'tokens48', tapeHeader })).toEqual({
      variant: 'tokens48',
      tapeHeader,
      stopAtSoftEof: false,
    });
  });

  it('throws OptionsValidationError listing each issue', () => {
    try {
      parseOptions(basicDecodeOptionsSchema, { variant: 'assembler', stopAtSoftEof: 'yes' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(OptionsValidationError);
      if (e instanceof OptionsValidationError) {
        expect(e.issues).toHaveLength(2);
        expect(e.issues[0]?.startsWith('variant: ')).toBe(true);
        expect(e.issues[1]?.startsWith('stopAtSoftEof: ')).toBe(true);
      }
    }
  });

  it('rejects line numbers outside 16 bits', () => {
    expect(() => parseOptions(asmEncodeOptionsSchema, { firstLineNumber: 65536 })).toThrow(OptionsValidationError);
    expect(() => parseOptions(asmEncodeOptionsSchema, { firstLineNumber: 1.5 })).toThrow(OptionsValidationError);
  });
});
