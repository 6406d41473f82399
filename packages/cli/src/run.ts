/**
 * CLI runner
 *
 * Parses arguments, loads configuration, dispatches to a command and prints
 * the result object. Returns the exit code instead of exiting, so the whole
 * flow runs in-process under test.
 */

import { isConfigError, isNumeralsError } from '@numerals/contracts';
import { createChildLogger, createLogger } from '@numerals/logger';
import type { Logger } from '@numerals/logger';
import { ExitCode, createResult, formatHelp, formatResult, parseArgs } from './cli-utils.js';
import type { ParsedArgs } from './cli-utils.js';
import { loadConfig } from './config/index.js';
import type { Config } from './config/index.js';
import { UsageError, isUsageError } from './commands/errors.js';
import { createDefaultRegistry } from './commands/registry.js';
import type { CommandRegistry } from './commands/registry.js';

/** Command name reported before a command has been resolved. */
const PROGRAM_NAME = 'numerals';

export interface RunOptions {
  /** Environment to read configuration from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Output sink for results and help text (defaults to console.log) */
  write?: (text: string) => void;
  /** Logger to use instead of one built from configuration */
  logger?: Logger;
  registry?: CommandRegistry;
}

/**
 * Run the CLI once.
 *
 * Errors that are not NumeralsError propagate to the caller.
 *
 * @example
 * const code = run(['int-to-roman', '1994']);
 * // prints {"success":true,"command":"int-to-roman",...,"data":{"input":1994,"numeral":"MCMXCIV"}}
 */
export function run(argv: string[], options: RunOptions = {}): ExitCode {
  const write = options.write ?? ((text: string) => console.log(text));
  const registry = options.registry ?? createDefaultRegistry();

  let config: Config;
  try {
    config = loadConfig(options.env);
  } catch (error) {
    return fail(PROGRAM_NAME, error, { write, pretty: false });
  }

  const logger = createChildLogger(
    options.logger ??
      createLogger({
        level: config.logging.level,
        json: config.logging.format === 'json',
        stderr: true,
      }),
    { component: 'cli' }
  );

  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    return fail(PROGRAM_NAME, error, { write, pretty: config.output.pretty, logger });
  }

  const pretty = args.pretty || config.output.pretty;

  if (args.help || args.command === undefined) {
    write(formatHelp(registry.list()));
    return args.help ? ExitCode.Success : ExitCode.UsageError;
  }

  const command = registry.get(args.command);
  if (!command) {
    const error = new UsageError(`Unknown command: ${args.command}`, { command: args.command });
    return fail(PROGRAM_NAME, error, { write, pretty, logger });
  }

  const commandLogger = createChildLogger(logger, { command: command.name });

  try {
    const data = command.execute(args.remaining, {
      letterCase: args.lower ? 'lower' : config.output.letterCase,
      logger: commandLogger,
    });
    write(formatResult(createResult(command.name, true, data), pretty));
    return ExitCode.Success;
  } catch (error) {
    return fail(command.name, error, { write, pretty, logger: commandLogger });
  }
}

/**
 * Print a failure result for a NumeralsError and map it to an exit code.
 * Anything else is rethrown.
 */
function fail(
  commandName: string,
  error: unknown,
  context: { write: (text: string) => void; pretty: boolean; logger?: Logger }
): ExitCode {
  if (!isNumeralsError(error)) {
    throw error;
  }

  context.logger?.warn('Command failed', { error_code: error.code, reason: error.message });

  const data = { code: error.code, ...error.data };
  context.write(formatResult(createResult(commandName, false, data, { errors: [error.message] }), context.pretty));

  // Configuration problems are usage problems: nothing was converted
  return isUsageError(error) || isConfigError(error) ? ExitCode.UsageError : ExitCode.ConversionError;
}
