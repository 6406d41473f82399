/**
 * Configuration loading
 */

import { ConfigError } from '@numerals/contracts';
import { configSchema, envMapping, type Config } from './schema.js';

/**
 * Load configuration from environment variables and defaults
 *
 * @throws {ConfigError} Listing every invalid setting as "path: message"
 *
 * @example
 * loadConfig({ NUMERALS_LETTER_CASE: 'lower' }).output.letterCase  // 'lower'
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig: Record<string, Record<string, unknown>> = {};

  for (const [envKey, [section, key]] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined) {
      (rawConfig[section] ??= {})[key] = parseEnvValue(value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  return result.data;
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): string | number | boolean {
  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  // String
  return value;
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
