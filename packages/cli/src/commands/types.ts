/**
 * Command types and interfaces
 */

import type { LetterCase } from '@numerals/core';
import type { Logger } from '@numerals/logger';

/**
 * Base command interface
 */
export interface Command {
  name: string;
  description: string;
  /** Usage line shown in help, e.g. "int-to-roman <n>" */
  usage: string;
  execute(args: string[], options: CommandOptions): CommandData;
}

/**
 * Command execution options
 */
export interface CommandOptions {
  letterCase: LetterCase;
  logger: Logger;
}

/**
 * Command-specific result payload
 */
export type CommandData = Record<string, unknown>;
