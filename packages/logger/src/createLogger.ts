/**
 * @fileoverview Main logger factory for the numerals suite
 * Creates configured Winston logger instances with structured logging
 * and flexible transport options.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { LOG_LEVELS } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance with structured logging.
 *
 * Features:
 * - Structured logging with standard fields (timestamp, level, message)
 * - Console and file transports
 * - JSON or pretty-print output
 * - Optional stderr-only console output so stdout carries command results
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Converted', { input: 'XIV', value: 14 });
 * ```
 *
 * @example
 * ```typescript
 * // CLI usage: diagnostics on stderr, results on stdout
 * const logger = createLogger({ level: 'debug', json: false, stderr: true });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
  } = config;

  const logFormat = format.combine(standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        stderrLevels: stderr ? [...LOG_LEVELS] : [],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // File output is always JSON
        format: format.combine(standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  // Winston warns when a logger has no transports; a silent console stands in
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Exit handling is done explicitly in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger with additional context fields.
 * Child loggers inherit all configuration from the parent logger
 * and automatically include context fields in every log entry.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const cliLogger = createChildLogger(logger, { component: 'cli', command: 'roman-to-int' });
 * cliLogger.info('Decoded'); // Includes component and command
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
