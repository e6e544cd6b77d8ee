// ============================================================================
// @zxconv/cli — Public API
// ============================================================================

export {
  CLI_COMMANDS,
  EXIT,
  UsageError,
  assertCompatibleOptions,
  cliOptionsSchema,
  defaultOutputPath,
  parseCommandLine,
  runCli,
  tapeFileName,
  usageText,
} from './cli.js';
export type { CliCommand, CliIO, CliOptions, ParsedCommandLine } from './cli.js';
