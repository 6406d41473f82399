/**
 * Shared CLI utilities for @numerals/cli
 *
 * - Argument parsing with flag validation
 * - Help text formatting
 * - Unified JSON/pretty output
 * - Standard result object structure
 *
 * Output is JSON by default (machine-readable); --pretty switches to a
 * human-readable block. Exit codes: 0 = success, 1 = conversion error,
 * 2 = usage error.
 */

import { UsageError } from './commands/errors.js';

/**
 * Process exit codes
 */
export enum ExitCode {
  Success = 0,
  ConversionError = 1,
  UsageError = 2,
}

/**
 * Parsed command-line arguments
 */
export interface ParsedArgs {
  help: boolean;           // --help, -h: Show help text
  pretty: boolean;         // --pretty: Human-readable formatted output
  lower: boolean;          // --lower: Lowercase roman numeral output
  command?: string;        // First positional argument
  remaining: string[];     // Positional arguments after the command
}

/**
 * Standard result object structure printed by every command
 */
export interface CliResult {
  success: boolean;        // Overall operation success status
  command: string;         // Name of the command that ran
  timestamp: string;       // ISO 8601 timestamp of execution
  data: unknown;           // Command-specific data
  errors?: string[];       // Error messages
}

/**
 * Parse command-line arguments
 *
 * Supports flags:
 * - --help, -h: Show help text
 * - --pretty: Human-readable output
 * - --lower: Lowercase roman numeral output
 *
 * A lone "-" is positional, and so is anything after "--", so negative
 * numbers and balanced ternary text such as "-0+" can be passed.
 *
 * @param argv - Command-line arguments (typically process.argv.slice(2))
 * @throws {UsageError} On an unknown flag
 *
 * @example
 * parseArgs(['int-to-roman', '14', '--lower'])
 * // { help: false, pretty: false, lower: true, command: 'int-to-roman', remaining: ['14'] }
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args: ParsedArgs = {
    help: false,
    pretty: false,
    lower: false,
    remaining: [],
  };
  const positional: string[] = [];
  let flagsEnded = false;

  for (const arg of argv) {
    if (flagsEnded) {
      positional.push(arg);
    } else if (arg === '--') {
      flagsEnded = true;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--pretty') {
      args.pretty = true;
    } else if (arg === '--lower') {
      args.lower = true;
    } else if (/^--?[a-z]/i.test(arg)) {
      throw new UsageError(`Unknown flag: ${arg}`, { flag: arg });
    } else {
      positional.push(arg);
    }
  }

  const [command, ...remaining] = positional;
  if (command !== undefined) {
    args.command = command;
  }
  args.remaining = remaining;

  return args;
}

/**
 * Parse a base-10 integer argument
 *
 * @throws {UsageError} If text is not an optionally signed run of digits
 *
 * @example
 * parseIntegerArg('1994')  // 1994
 * parseIntegerArg('-8')    // -8
 * parseIntegerArg('1e3')   // throws UsageError
 */
export function parseIntegerArg(text: string): number {
  if (!/^[+-]?\d+$/.test(text)) {
    throw new UsageError(`Expected an integer, got "${text}"`, { argument: text });
  }
  return Number(text);
}

/**
 * Build standardized help text
 *
 * @param commands - Name and description of every command
 */
export function formatHelp(commands: ReadonlyArray<{ name: string; usage: string; description: string }>): string {
  const width = Math.max(...commands.map((c) => c.usage.length));
  const commandLines = commands
    .map((c) => `  ${c.usage.padEnd(width)}  ${c.description}`)
    .join('\n');

  return `numerals - Convert between integers, Roman numerals and balanced ternary

USAGE:
  numerals <command> <argument> [options]

COMMANDS:
${commandLines}

OPTIONS:
  --help, -h        Show this help message
  --pretty          Human-readable formatted output (default: JSON)
  --lower           Lowercase roman numeral output

OUTPUT:
  By default, outputs machine-readable JSON to stdout.
  Use --pretty for human-readable output.

EXIT CODES:
  0  Success
  1  Conversion error (invalid numeral, overflow, value out of range)
  2  Invalid usage`;
}

/**
 * Format result as a single JSON line or a pretty block
 *
 * @example
 * formatResult(createResult('int-to-roman', true, { numeral: 'XIV' }), false)
 * // '{"success":true,"command":"int-to-roman",...}'
 */
export function formatResult(result: CliResult, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(result);
  }

  const lines: string[] = [
    '='.repeat(60),
    `Command: ${result.command}`,
    `Status: ${result.success ? 'SUCCESS' : 'FAILED'}`,
    `Timestamp: ${result.timestamp}`,
    '='.repeat(60),
    'Data:',
    JSON.stringify(result.data, null, 2),
  ];

  if (result.errors && result.errors.length > 0) {
    lines.push('Errors:');
    result.errors.forEach((e) => lines.push(`  - ${e}`));
  }

  return lines.join('\n');
}

/**
 * Create a standard result object
 *
 * @example
 * createResult('roman-to-int', true, { input: 'XIV', value: 14 })
 */
export function createResult(
  command: string,
  success: boolean,
  data: unknown,
  options: { errors?: string[] } = {}
): CliResult {
  const result: CliResult = {
    success,
    command,
    timestamp: new Date().toISOString(),
    data,
  };
  if (options.errors) {
    result.errors = options.errors;
  }
  return result;
}
