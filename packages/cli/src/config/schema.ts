/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * CLI configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
      format: z.enum(['json', 'pretty']).default('json'),
    })
    .default({}),

  output: z
    .object({
      pretty: z.boolean().default(false),
      letterCase: z.enum(['upper', 'lower']).default('upper'),
    })
    .default({}),
});

/**
 * Validated configuration
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable to config path mapping
 */
export const envMapping: Record<string, readonly [section: 'logging' | 'output', key: string]> = {
  NUMERALS_LOG_LEVEL: ['logging', 'level'],
  NUMERALS_LOG_FORMAT: ['logging', 'format'],
  NUMERALS_PRETTY: ['output', 'pretty'],
  NUMERALS_LETTER_CASE: ['output', 'letterCase'],
};
