/**
 * Argument helpers shared by the conversion commands
 */

import { UsageError } from './errors.js';

/**
 * Returns the single positional argument of a command.
 *
 * @throws {UsageError} If there is no argument or more than one
 */
export function singleArgument(command: string, args: string[], name: string): string {
  const [value, ...extra] = args;
  if (value === undefined) {
    throw new UsageError(`${command}: missing <${name}> argument`, { command });
  }
  if (extra.length > 0) {
    throw new UsageError(`${command}: unexpected arguments: ${extra.join(' ')}`, {
      command,
      extra,
    });
  }
  return value;
}
