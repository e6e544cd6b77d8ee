import { describe, expect, it } from 'vitest';
import {
  createPlus3DosHeader,
  encodePlus3DosHeader,
  withPlus3DosPayloadLength,
} from '../header/plus3dos_header.js';
import { codeHeader, createTapeHeader, encodeTapeHeader, programHeader } from '../header/tape_header.js';
import { BasicListingDecoder, decodeBasicProgram, formatBasicLine } from '../listing/basic_decoder.js';

// ============================================================================
// Sinclair BASIC decoder
// ============================================================================

/** 10 PRINT 1 (with the hidden 5-byte number), 20 CLS */
const PROGRAM = [
  0x00, 0x0a, 0x09, 0x00, 0xf5, 0x31, 0x0e, 0x00, 0x00, 0x01, 0x00, 0x00, 0x0d,
  0x00, 0x14, 0x02, 0x00, 0xfb, 0x0d,
];

/** Bytes that read as line 256 "A" when nothing bounds the program */
const TRAILER = [0x01, 0x00, 0x05, 0x00, 0x41, 0x0d];

function withPlus3Dos(payload: number[], programLength?: number): Uint8Array {
  const blank = createPlus3DosHeader();
  const basicHeader =
    programLength === undefined ? blank.basicHeader : programHeader(blank.basicHeader, 10, programLength);
  const header = withPlus3DosPayloadLength({ ...blank, basicHeader }, payload.length);
  return Uint8Array.from([...encodePlus3DosHeader(header), ...payload]);
}

describe('formatBasicLine', () => {
  it('right-aligns the number in four columns', () => {
    expect(formatBasicLine({ lineNumber: 5, text: 'X' })).toBe('   5 X\n');
    expect(formatBasicLine({ lineNumber: 9999, text: '' })).toBe('9999 \n');
  });
});

describe('BASIC decoder — raw programs', () => {
  it('decodes tokens and skips hidden numbers', () => {
    expect(decodeBasicProgram(new Uint8Array(PROGRAM))).toBe('  10  PRINT 1\n  20  CLS \n');
  });

  it('stops at the variables area', () => {
    const variables = [0x61, 0x00, 0x00, 0x05, 0x00, 0x00, 0x0d];
    expect(decodeBasicProgram(Uint8Array.from([...PROGRAM, ...variables]))).toBe('  10  PRINT 1\n  20  CLS \n');
  });

  it('reads on while line numbers stay below 0x4000', () => {
    expect(decodeBasicProgram(Uint8Array.from([...PROGRAM, ...TRAILER]))).toBe(
      '  10  PRINT 1\n  20  CLS \n 256 A\n',
    );
  });

  it('emits a line cut short by the end of data', () => {
    expect(decodeBasicProgram(new Uint8Array([0x00, 0x0a, 0x05, 0x00, 0x41, 0x42]))).toBe('  10 AB\n');
  });

  it('emits a line whose hidden number is cut short', () => {
    expect(decodeBasicProgram(new Uint8Array([0x00, 0x0a, 0x05, 0x00, 0x31, 0x0e, 0x00, 0x00]))).toBe(
      '  10 1\n',
    );
  });

  it('returns nothing for empty input', () => {
    expect(decodeBasicProgram(new Uint8Array(0))).toBe('');
  });

  it('uses the 48K token set on request', () => {
    const line = new Uint8Array([0x00, 0x01, 0x02, 0x00, 0xa3, 0x0d]);
    expect(decodeBasicProgram(line)).toBe('   1  SPECTRUM \n');
    expect(decodeBasicProgram(line, { variant: 'tokens48' })).toBe('   1 \u{1F183}\n');
  });
});

describe('BASIC decoder — soft-EOF', () => {
  it('stops at 0x1A in the line number', () => {
    const data = Uint8Array.from([...PROGRAM, 0x1a, 0x1a, 0x1a, 0x1a, 0x1a]);
    expect(decodeBasicProgram(data, { stopAtSoftEof: true })).toBe('  10  PRINT 1\n  20  CLS \n');
  });

  it('drops a line cut by 0x1A', () => {
    const data = Uint8Array.from([...PROGRAM, 0x00, 0x1e, 0x03, 0x00, 0x41, 0x1a, 0x0d]);
    expect(decodeBasicProgram(data, { stopAtSoftEof: true })).toBe('  10  PRINT 1\n  20  CLS \n');
    expect(decodeBasicProgram(data)).toBe('  10  PRINT 1\n  20  CLS \n  30 A\x1a\n');
  });
});

describe('BASIC decoder — +3DOS header', () => {
  it('decodes a program behind a +3DOS header', () => {
    const data = withPlus3Dos([0x00, 0x01, 0x02, 0x00, 0xf5, 0x0d]);
    expect(decodeBasicProgram(data)).toBe('   1  PRINT \n');
  });

  it('bounds the program by the program length of the embedded header', () => {
    const data = withPlus3Dos([...PROGRAM, ...TRAILER], PROGRAM.length);
    expect(decodeBasicProgram(data)).toBe('  10  PRINT 1\n  20  CLS \n');
  });

  it('bounds the program by the file length', () => {
    const data = Uint8Array.from([...withPlus3Dos(PROGRAM), ...TRAILER]);
    expect(decodeBasicProgram(data)).toBe('  10  PRINT 1\n  20  CLS \n');
  });

  it('ignores soft-EOF inside a +3DOS file', () => {
    const data = withPlus3Dos([0x00, 0x01, 0x03, 0x00, 0x41, 0x1a, 0x0d]);
    expect(decodeBasicProgram(data, { stopAtSoftEof: true })).toBe('   1 A\x1a\n');
  });
});

describe('BASIC decoder — tape header', () => {
  const data = Uint8Array.from([...PROGRAM, ...TRAILER]);
  const tape = programHeader(createTapeHeader('tape', 'prog', data.length), 10, PROGRAM.length);

  it('bounds the program by the tape header program length', () => {
    expect(decodeBasicProgram(data, { tapeHeader: encodeTapeHeader(tape) })).toBe('  10  PRINT 1\n  20  CLS \n');
  });

  it('accepts the header framed as a tape block', () => {
    const tapeHeader = encodeTapeHeader(tape, { wrapped: true });
    expect(decodeBasicProgram(data, { tapeHeader })).toBe('  10  PRINT 1\n  20  CLS \n');
  });

  it('ignores a corrupt or non-program header', () => {
    const corrupt = encodeTapeHeader(tape, { wrapped: true });
    corrupt[18] = (corrupt[18] ?? 0) ^ 0xff;
    const expected = '  10  PRINT 1\n  20  CLS \n 256 A\n';
    expect(decodeBasicProgram(data, { tapeHeader: corrupt })).toBe(expected);

    const code = encodeTapeHeader(codeHeader(createTapeHeader('tape', 'prog', 10)));
    expect(decodeBasicProgram(data, { tapeHeader: code })).toBe(expected);
  });
});

describe('BasicListingDecoder.decodeLines', () => {
  it('yields line records in file order', () => {
    const decoder = new BasicListingDecoder();
    expect([...decoder.decodeLines(new Uint8Array(PROGRAM))]).toEqual([
      { lineNumber: 10, text: ' PRINT 1' },
      { lineNumber: 20, text: ' CLS ' },
    ]);
  });
});
