#!/usr/bin/env node

/**
 * numerals - convert between integers, Roman numerals and balanced ternary
 *
 * USAGE:
 *   numerals <command> <argument> [--pretty] [--lower] [--help]
 *
 * EXAMPLES:
 *   numerals int-to-roman 1994        {"success":true,...,"data":{"input":1994,"numeral":"MCMXCIV"}}
 *   numerals roman-to-int xiv         {"success":true,...,"data":{"input":"xiv","value":14}}
 *   numerals int-to-ternary -- -8     {"success":true,...,"data":{"input":-8,"ternary":"-0+"}}
 */

import { attachGlobalHandlers, createLogger } from '@numerals/logger';
import { run } from '../run.js';

const logger = createLogger({ level: 'error', json: true, stderr: true });
attachGlobalHandlers(logger);

process.exitCode = run(process.argv.slice(2));
