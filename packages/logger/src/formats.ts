/**
 * @fileoverview Custom Winston formats for the numerals logger
 * Standard fields and human-readable output.
 */

import { format } from 'winston';

/**
 * Context fields printed first, in this order, by {@link prettyPrint}.
 */
const LEADING_FIELDS = ['component', 'command', 'notation'] as const;

/**
 * Winston internals never printed as context.
 */
const INTERNAL_FIELDS = new Set(['level', 'message', 'timestamp', 'stack', 'splat']);

/**
 * Winston format that adds a timestamp and expands Error objects.
 */
export const standardFields = format.combine(
  // ISO 8601 timestamp
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),

  format.errors({ stack: true })
);

/**
 * Formats a log entry as a single human-readable line.
 *
 * @example
 * ```typescript
 * formatPrettyLine({ timestamp: 't', level: 'info', message: 'Encoded', component: 'cli', value: 14 })
 * // '[t] info: Encoded component=cli value=14'
 * ```
 */
export function formatPrettyLine(info: Record<string, unknown>): string {
  const context: string[] = [];

  for (const key of LEADING_FIELDS) {
    const value = info[key];
    if (value !== undefined && value !== null && value !== '') {
      context.push(`${key}=${String(value)}`);
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (INTERNAL_FIELDS.has(key) || LEADING_FIELDS.some((field) => field === key)) {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(info['timestamp'])}] ${String(info['level'])}: ${String(info['message'])}${contextStr}`;

  // Add stack trace if present (for errors)
  const stack = info['stack'];
  if (typeof stack === 'string') {
    return `${baseMsg}\n${stack}`;
  }

  return baseMsg;
}

/**
 * Winston format for human-readable pretty-print output.
 *
 * @example
 * ```typescript
 * // Output format:
 * // [2025-09-29T12:34:56.789Z] info: Encoded component=cli command=int-to-roman value=14
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => formatPrettyLine(info))
);
