/**
 * @fileoverview Public API exports for @numerals/logger
 * Structured logging and global error handling for the numerals suite
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';
export type { DetachHandlers } from './errorHandler.js';

// Formats
export { standardFields, prettyPrint, formatPrettyLine } from './formats.js';

// Type exports
export { LOG_LEVELS } from './types.js';
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
