/**
 * Error handling for CLI commands
 */

import { NumeralsError } from '@numerals/contracts';

/**
 * Thrown for invalid command-line usage: unknown command or flag, missing
 * or malformed argument.
 */
export class UsageError extends NumeralsError {
  constructor(message: string, data: Record<string, unknown> = {}) {
    super('INVALID_ARGS', message, data);
  }
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}
