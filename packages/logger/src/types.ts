/**
 * @fileoverview Type definitions for the numerals logger
 * Provides strongly-typed interfaces for logger configuration and usage.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that abort a command
 * - 'warn': Rejected input and other recoverable problems
 * - 'info': Informational messages about normal operations
 * - 'debug': Detailed debugging information for development
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * All supported levels, most severe first.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: true,
 *   stderr: true,
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * Messages below this level will be filtered out.
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON
   * - false: Human-readable pretty-print
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for file transport.
   * If provided, logs will be written to this file in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Send console output of every level to stderr, leaving stdout to
   * command results.
   * @default false
   */
  stderr?: boolean;
}

/**
 * Child logger context fields.
 * These fields will be automatically included in all logs from the child logger.
 *
 * @example
 * ```typescript
 * const cliLogger = logger.child({ component: 'cli', command: 'int-to-roman' });
 * cliLogger.debug('Encoding'); // Includes component and command
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g., 'cli', 'config') */
  component?: string;

  /** CLI command being run */
  command?: string;

  /** Notation being converted */
  notation?: string;

  /** Allow any additional context fields */
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
