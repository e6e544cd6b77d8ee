import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { decodeByte, decodeBytes, encodeChar, encodeText } from '../charset/codepage.js';
import { CHARSET } from '../charset/tables.js';
import { EncodingError } from '../errors.js';

// ============================================================================
// Charset Tables
// ============================================================================

describe('Charset — decode', () => {
  it('every variant has 256 entries', () => {
    expect(CHARSET.decode.tokens128).toHaveLength(256);
    expect(CHARSET.decode.tokens48).toHaveLength(256);
    expect(CHARSET.decode.assembler).toHaveLength(256);
  });

  it('decodes ASCII letters to themselves', () => {
    expect(decodeBytes(new Uint8Array([0x48, 0x49]), 'tokens128')).toBe('HI');
  });

  it('decodes the Spectrum-specific symbols', () => {
    expect(decodeByte(0x5e, 'tokens128')).toBe('↑');
    expect(decodeByte(0x60, 'tokens128')).toBe('£');
    expect(decodeByte(0x7f, 'tokens128')).toBe('©');
  });

  it('decodes print comma and newline', () => {
    expect(decodeByte(0x06, 'tokens128')).toBe('\t');
    expect(decodeByte(0x0d, 'tokens48')).toBe('\n');
  });

  it('keeps 0x06 untranslated in the assembler variant', () => {
    expect(decodeByte(0x06, 'assembler')).toBe('\x06');
    expect(decodeByte(0x09, 'assembler')).toBe('\t');
  });

  it('decodes block graphics', () => {
    expect(decodeByte(0x80, 'tokens128')).toBe('\u2800');
    expect(decodeByte(0x83, 'tokens128')).toBe('▀');
    expect(decodeByte(0x8f, 'tokens128')).toBe('█');
  });

  it('decodes UDGs to the negative squared letters', () => {
    expect(decodeByte(0x90, 'tokens128')).toBe('\u{1F170}');
    expect(decodeByte(0xa2, 'tokens128')).toBe('\u{1F182}');
  });

  it('decodes 0xA3/0xA4 as tokens on the 128K and as UDGs T/U on the 48K', () => {
    expect(decodeByte(0xa3, 'tokens128')).toBe(' SPECTRUM ');
    expect(decodeByte(0xa4, 'tokens128')).toBe(' PLAY ');
    expect(decodeByte(0xa3, 'tokens48')).toBe('\u{1F183}');
    expect(decodeByte(0xa4, 'tokens48')).toBe('\u{1F184}');
  });

  it('decodes keyword tokens with their literal spacing', () => {
    expect(decodeByte(0xa5, 'tokens128')).toBe('RND');
    expect(decodeByte(0xc7, 'tokens48')).toBe('<=');
    expect(decodeByte(0xf5, 'tokens128')).toBe(' PRINT ');
    expect(decodeByte(0xff, 'assembler')).toBe(' COPY ');
  });
});

describe('Charset — encode', () => {
  it('encodes mapped characters through the table', () => {
    expect(encodeChar('£', 'tokens128')).toEqual({ ok: true, byte: 0x60 });
    expect(encodeChar('█', 'tokens48')).toEqual({ ok: true, byte: 0x8f });
  });

  it('falls back to 7-bit ASCII', () => {
    expect(encodeChar('A', 'tokens128')).toEqual({ ok: true, byte: 0x41 });
    expect(encodeChar('^', 'tokens128')).toEqual({ ok: true, byte: 0x5e });
    expect(encodeChar('`', 'assembler')).toEqual({ ok: true, byte: 0x60 });
  });

  it('falls back to Latin-1 above 0x7F', () => {
    expect(encodeChar('é', 'assembler')).toEqual({ ok: true, byte: 0xe9 });
    expect(encodeChar('ÿ', 'tokens128')).toEqual({ ok: true, byte: 0xff });
    expect(Array.from(encodeText('café', 'assembler'))).toEqual([0x63, 0x61, 0x66, 0xe9]);
  });

  it('maps TAB to 0x06 except in the assembler variant', () => {
    expect(encodeChar('\t', 'tokens128')).toEqual({ ok: true, byte: 0x06 });
    expect(encodeChar('\t', 'assembler')).toEqual({ ok: true, byte: 0x09 });
  });

  it('maps LF to 0x0D', () => {
    expect(encodeChar('\n', 'assembler')).toEqual({ ok: true, byte: 0x0d });
  });

  it('folds the blank-space aliases into 0x80', () => {
    for (const blank of ['\u2800', '\u00A0', '\u2002', '\u2003', '\u3000']) {
      expect(encodeChar(blank, 'tokens128')).toEqual({ ok: true, byte: 0x80 });
    }
  });

  it('folds every UDG alias block into 0x90..0xA4', () => {
    for (const first of [0x24b6, 0x24d0, 0x1f130, 0x1f150, 0x1f170]) {
      expect(encodeChar(String.fromCodePoint(first), 'tokens128')).toEqual({ ok: true, byte: 0x90 });
      expect(encodeChar(String.fromCodePoint(first + 20), 'tokens48')).toEqual({ ok: true, byte: 0xa4 });
    }
  });

  it('reports characters with no representation', () => {
    expect(encodeChar('€', 'tokens128')).toEqual({ ok: false, char: '€' });
    expect(encodeChar('\u0100', 'tokens48')).toEqual({ ok: false, char: '\u0100' });
    expect(encodeChar('', 'tokens128')).toEqual({ ok: false, char: '' });
  });

  it('never folds keywords back into tokens', () => {
    expect(Array.from(encodeText(' PRINT ', 'tokens128'))).toEqual([
      0x20, 0x50, 0x52, 0x49, 0x4e, 0x54, 0x20,
    ]);
  });

  it('throws EncodingError with the character and its index', () => {
    expect(() => encodeText('ab€', 'tokens128')).toThrow(EncodingError);
    try {
      encodeText('\u{1F170}x€', 'tokens128');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(EncodingError);
      if (e instanceof EncodingError) {
        expect(e.char).toBe('€');
        expect(e.index).toBe(3);
        expect(e.message).toContain('U+20AC');
      }
    }
  });

  it('round-trips every non-token byte except TAB and LF (property)', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 0xa2 }).filter((b) => b !== 0x09 && b !== 0x0a),
        (byte) => {
          expect(encodeChar(decodeByte(byte, 'tokens128'), 'tokens128')).toEqual({ ok: true, byte });
        },
      ),
    );
  });

  it('round-trips UDG T and U on the 48K table', () => {
    expect(encodeText(decodeBytes(new Uint8Array([0xa3, 0xa4]), 'tokens48'), 'tokens48')).toEqual(
      new Uint8Array([0xa3, 0xa4]),
    );
  });
});
