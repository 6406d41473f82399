/**
 * @fileoverview Public API exports for @numerals/cli
 */

export { run } from './run.js';
export type { RunOptions } from './run.js';

export {
  ExitCode,
  parseArgs,
  parseIntegerArg,
  formatHelp,
  formatResult,
  createResult,
} from './cli-utils.js';
export type { ParsedArgs, CliResult } from './cli-utils.js';

export { loadConfig, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';

export { CommandRegistry, createDefaultRegistry } from './commands/registry.js';
export { RomanToIntCommand, IntToRomanCommand } from './commands/roman.command.js';
export { TernaryToIntCommand, IntToTernaryCommand } from './commands/ternary.command.js';
export { UsageError, isUsageError } from './commands/errors.js';
export type { Command, CommandOptions, CommandData } from './commands/types.js';
