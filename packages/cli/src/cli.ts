// ============================================================================
// @zxconv/cli — ZX Spectrum ↔ Unicode file converter
// ============================================================================
// Commands:
//   zxconv bas2u <file.bas> [out]   Sinclair BASIC program  → Unicode text
//   zxconv asm2u <file.asm> [out]   GEN assembler source    → Unicode text
//   zxconv u2asm <file.txt> [out]   Unicode text            → GEN assembler source
// ============================================================================

import { readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import {
  ConflictingOptionsError,
  FILE_NAME_MAX_LENGTH,
  OptionsValidationError,
  ZxConvError,
  decodeAssemblerSource,
  decodeBasicProgram,
  encodeAssemblerSource,
  parseOptions,
  timer,
} from '@zxconv/core';
import { z } from 'zod';

const BOM = '\uFEFF';

export const CLI_COMMANDS = ['bas2u', 'asm2u', 'u2asm'] as const;
export type CliCommand = (typeof CLI_COMMANDS)[number];

/** Exit codes returned by `runCli`. */
export const EXIT = {
  ok: 0,
  failure: 1,
  usage: 2,
} as const;

// ── Options ─────────────────────────────────────────────────────────────────

export const cliOptionsSchema = z.object({
  command: z.enum(CLI_COMMANDS),
  input: z.string().min(1),
  output: z.string().min(1).optional(),
  useSpectrum48KTokens: z.boolean().default(false),
  includeLineNumbers: z.boolean().default(false),
  tapeHeaderFile: z.string().min(1).optional(),
  prependPlus3DosHeader: z.boolean().default(false),
  useSoftEof: z.boolean().default(false),
});

export type CliOptions = z.output<typeof cliOptionsSchema>;

interface FlagSpec {
  short: string;
  long: string;
  takesValue: boolean;
}

const FLAGS = {
  useSpectrum48KTokens: { short: '-4', long: '--useSpectrum48KTokens', takesValue: false },
  includeLineNumbers: { short: '-l', long: '--includeLineNumbers', takesValue: false },
  tapeHeaderFile: { short: '-t', long: '--tapeHeaderFile', takesValue: true },
  prependPlus3DosHeader: { short: '-3', long: '--prependPlus3DosHeader', takesValue: false },
  useSoftEof: { short: '-s', long: '--useSoftEOF', takesValue: false },
  help: { short: '-h', long: '--help', takesValue: false },
} as const satisfies Record<string, FlagSpec>;

type FlagName = keyof typeof FLAGS;

/**
 * Thrown for a command line that cannot be parsed.
 */
export class UsageError extends ZxConvError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type ParsedCommandLine = { kind: 'help' } | { kind: 'run'; options: CliOptions };

interface RawArgs {
  positional: string[];
  flags: Map<FlagName, string | true>;
}

const FLAG_NAMES: readonly FlagName[] = [
  'useSpectrum48KTokens',
  'includeLineNumbers',
  'tapeHeaderFile',
  'prependPlus3DosHeader',
  'useSoftEof',
  'help',
];

function flagNameOf(arg: string): FlagName | undefined {
  return FLAG_NAMES.find((name) => FLAGS[name].short === arg || FLAGS[name].long === arg);
}

function splitArgs(argv: readonly string[]): RawArgs {
  const positional: string[] = [];
  const flags = new Map<FlagName, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('-') || arg === '-') {
      positional.push(arg);
      continue;
    }

    const name = flagNameOf(arg);
    if (!name) {
      throw new UsageError(`unknown option ${arg}`);
    }
    if (FLAGS[name].takesValue) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`${arg} needs a file name`);
      }
      flags.set(name, value);
      i++;
    } else {
      flags.set(name, true);
    }
  }

  return { positional, flags };
}

function hasFlag(args: RawArgs, name: FlagName): boolean {
  return args.flags.has(name);
}

function getFlag(args: RawArgs, name: FlagName): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Reject option combinations that mix tape and disk output.
 *
 * @throws {ConflictingOptionsError}
 */
export function assertCompatibleOptions(options: CliOptions): void {
  if (options.tapeHeaderFile === undefined) return;
  const disk = [
    options.prependPlus3DosHeader ? '--prependPlus3DosHeader' : undefined,
    options.useSoftEof ? '--useSoftEOF' : undefined,
  ].filter((name): name is string => name !== undefined);
  if (disk.length > 0) {
    throw new ConflictingOptionsError(
      ['--tapeHeaderFile', ...disk],
      `Cannot use --tapeHeaderFile at the same time as disk options ${disk.join(' or ')}`,
    );
  }
}

/**
 * Parse and validate a command line (without the node and script paths).
 *
 * @throws {UsageError} On unknown options or extra arguments
 * @throws {OptionsValidationError} On an unknown command or empty file name
 * @throws {ConflictingOptionsError} On tape and disk options combined
 */
export function parseCommandLine(argv: readonly string[]): ParsedCommandLine {
  const args = splitArgs(argv);
  if (hasFlag(args, 'help')) {
    return { kind: 'help' };
  }

  const [command, input, output, ...extra] = args.positional;
  if (command === undefined || input === undefined) {
    throw new UsageError('expected a command and an input file');
  }
  if (extra.length > 0) {
    throw new UsageError(`unexpected argument ${extra[0] ?? ''}`);
  }

  const options = parseOptions(cliOptionsSchema, {
    command,
    input,
    output,
    useSpectrum48KTokens: hasFlag(args, 'useSpectrum48KTokens'),
    includeLineNumbers: hasFlag(args, 'includeLineNumbers'),
    tapeHeaderFile: getFlag(args, 'tapeHeaderFile'),
    prependPlus3DosHeader: hasFlag(args, 'prependPlus3DosHeader'),
    useSoftEof: hasFlag(args, 'useSoftEof'),
  });
  assertCompatibleOptions(options);
  return { kind: 'run', options };
}

// ── Paths & Files ───────────────────────────────────────────────────────────

export function defaultOutputPath(command: CliCommand, input: string): string {
  return command === 'u2asm' ? `${input}.asm` : `${input}.txt`;
}

/**
 * Tape file name for an output path: its base name, at most 10 characters.
 * Backslashes count as directory separators.
 */
export function tapeFileName(outputPath: string): string {
  const base = path.posix.basename(outputPath.replace(/\\/g, '/'));
  return Array.from(base).slice(0, FILE_NAME_MAX_LENGTH).join('');
}

function readBinaryFile(file: string): Uint8Array {
  return new Uint8Array(readFileSync(file));
}

function readUnicodeFile(file: string): string {
  const text = readFileSync(file, 'utf-8');
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

function writeUnicodeFile(file: string, text: string): void {
  writeFileSync(file, BOM + text, 'utf-8');
}

// ── Commands ────────────────────────────────────────────────────────────────

function basToUnicode(options: CliOptions, output: string): string {
  const tapeHeader = options.tapeHeaderFile === undefined ? undefined : readBinaryFile(options.tapeHeaderFile);
  const text = decodeBasicProgram(readBinaryFile(options.input), {
    variant: options.useSpectrum48KTokens ? 'tokens48' : 'tokens128',
    tapeHeader,
    stopAtSoftEof: options.useSoftEof,
  });
  writeUnicodeFile(output, text);
  return text;
}

function asmToUnicode(options: CliOptions, output: string): string {
  const text = decodeAssemblerSource(readBinaryFile(options.input), {
    includeLineNumbers: options.includeLineNumbers,
    stopAtSoftEof: options.useSoftEof,
  });
  writeUnicodeFile(output, text);
  return text;
}

function unicodeToAsm(options: CliOptions, output: string): Uint8Array {
  const result = encodeAssemblerSource(readUnicodeFile(options.input), {
    prependPlus3DosHeader: options.prependPlus3DosHeader,
    appendSoftEof: options.useSoftEof,
    tapeHeaderName: options.tapeHeaderFile === undefined ? undefined : tapeFileName(output),
  });
  writeFileSync(output, result.data);
  if (options.tapeHeaderFile !== undefined && result.tapeHeader) {
    writeFileSync(options.tapeHeaderFile, result.tapeHeader);
  }
  return result.data;
}

// ── Entry ───────────────────────────────────────────────────────────────────

/** Where the CLI writes its messages. */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export function usageText(): string {
  return [
    'ZX Spectrum <-> Unicode file converter (Sinclair BASIC, HiSoft GEN assembler)',
    '',
    'Usage:',
    '  zxconv bas2u <input> [output]   Sinclair BASIC program to Unicode (default output: input.txt)',
    '  zxconv asm2u <input> [output]   GEN assembler source to Unicode (default output: input.txt)',
    '  zxconv u2asm <input> [output]   Unicode to GEN assembler source (default output: input.asm)',
    '',
    'Options:',
    '  -4, --useSpectrum48KTokens      Decode with 48K BASIC tokens (bas2u)',
    '  -l, --includeLineNumbers        Keep line numbers in the text (asm2u)',
    '  -t, --tapeHeaderFile <file>     Tape header to read (bas2u) or write (u2asm)',
    '  -3, --prependPlus3DosHeader     Write a +3DOS header in front of the output (u2asm)',
    '  -s, --useSoftEOF                Stop input at 0x1A, or append 0x1A to the output',
    '  -h, --help                      Show this help',
    '',
    'Environment Variables:',
    '  ZXCONV_DEBUG=1                  Log header detection and scan details',
  ].join('\n');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function isUsageProblem(error: unknown): boolean {
  return (
    error instanceof UsageError ||
    error instanceof OptionsValidationError ||
    error instanceof ConflictingOptionsError
  );
}

/**
 * Run the converter. Returns the process exit code.
 */
export function runCli(argv: readonly string[], io: CliIO = consoleIO): number {
  let parsed: ParsedCommandLine;
  try {
    parsed = parseCommandLine(argv);
  } catch (error: unknown) {
    if (!isUsageProblem(error)) throw error;
    io.stderr(`Error: ${errorMessage(error)}`);
    io.stderr('Run "zxconv --help" for usage.');
    return EXIT.usage;
  }

  if (parsed.kind === 'help') {
    io.stdout(usageText());
    return EXIT.ok;
  }

  const { options } = parsed;
  const output = options.output ?? defaultOutputPath(options.command, options.input);
  const t = timer(options.command);

  try {
    switch (options.command) {
      case 'bas2u': {
        const text = basToUnicode(options, output);
        t.endWith({ input: options.input, output, characters: text.length });
        break;
      }
      case 'asm2u': {
        const text = asmToUnicode(options, output);
        t.endWith({ input: options.input, output, characters: text.length });
        break;
      }
      case 'u2asm': {
        const data = unicodeToAsm(options, output);
        t.endWith({ input: options.input, output, bytes: data.length });
        break;
      }
    }
  } catch (error: unknown) {
    io.stderr(`Error: ${errorMessage(error)}`);
    return EXIT.failure;
  }

  io.stdout(`${options.command}: ${options.input} -> ${output}`);
  return EXIT.ok;
}
