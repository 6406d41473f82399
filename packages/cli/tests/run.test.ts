/**
 * Tests for the CLI runner
 *
 * Each run writes into an in-memory sink and logs through a silent logger.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger } from '@numerals/logger';
import { run } from '../src/run.js';
import { ExitCode } from '../src/cli-utils.js';
import type { CliResult } from '../src/cli-utils.js';
import { CommandRegistry } from '../src/commands/registry.js';

const TIMESTAMP = '2025-01-01T00:00:00.000Z';

describe('run', () => {
  let output: string[];
  const logger = createLogger({ level: 'error', console: false });

  function runCli(argv: string[], env: NodeJS.ProcessEnv = {}): ExitCode {
    return run(argv, { env, logger, write: (text) => output.push(text) });
  }

  function lastResult(): CliResult {
    return JSON.parse(output[output.length - 1] ?? '') as CliResult;
  }

  beforeEach(() => {
    output = [];
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(TIMESTAMP));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('roman commands', () => {
    it('should encode an integer', () => {
      expect(runCli(['int-to-roman', '1994'])).toBe(ExitCode.Success);
      expect(output).toEqual([
        `{"success":true,"command":"int-to-roman","timestamp":"${TIMESTAMP}","data":{"input":1994,"numeral":"MCMXCIV"}}`,
      ]);
    });

    it('should encode in lowercase with --lower', () => {
      runCli(['int-to-roman', '134', '--lower']);
      expect(lastResult().data).toEqual({ input: 134, numeral: 'cxxxiv' });
    });

    it('should take letter case from configuration', () => {
      runCli(['int-to-roman', '134'], { NUMERALS_LETTER_CASE: 'lower' });
      expect(lastResult().data).toEqual({ input: 134, numeral: 'cxxxiv' });
    });

    it('should decode a numeral in any case', () => {
      expect(runCli(['roman-to-int', 'mcmxciv'])).toBe(ExitCode.Success);
      expect(lastResult().data).toEqual({ input: 'mcmxciv', value: 1994 });
    });

    it('should report an invalid character with its position', () => {
      expect(runCli(['roman-to-int', 'XIIA'])).toBe(ExitCode.ConversionError);
      expect(lastResult()).toEqual({
        success: false,
        command: 'roman-to-int',
        timestamp: TIMESTAMP,
        data: { code: 'INVALID_NUMERAL_TEXT', position: 3, character: 'A', notation: 'roman' },
        errors: ['Invalid roman numeral character "A" at position 3'],
      });
    });

    it('should report non-positive input', () => {
      expect(runCli(['int-to-roman', '0'])).toBe(ExitCode.ConversionError);
      expect(lastResult().data).toEqual({ code: 'NON_POSITIVE_INPUT', value: 0 });
    });

    it('should report input above the 16-bit range', () => {
      expect(runCli(['int-to-roman', '40000'])).toBe(ExitCode.ConversionError);
      expect(lastResult().data).toEqual({ code: 'NUMERAL_RANGE', value: 40000, min: 1, max: 32767 });
    });

    it('should report overflow when decoding', () => {
      expect(runCli(['roman-to-int', 'M'.repeat(54)])).toBe(ExitCode.ConversionError);
      expect(lastResult().data).toEqual({
        code: 'NUMERAL_OVERFLOW',
        notation: 'roman',
        min: -32768,
        max: 32767,
      });
    });
  });

  describe('balanced ternary commands', () => {
    it('should encode a negative integer', () => {
      expect(runCli(['int-to-ternary', '-8'])).toBe(ExitCode.Success);
      expect(lastResult().data).toEqual({ input: -8, ternary: '-0+' });
    });

    it('should decode ternary text', () => {
      expect(runCli(['ternary-to-int', '+0-'])).toBe(ExitCode.Success);
      expect(lastResult().data).toEqual({ input: '+0-', value: 8 });
    });
  });

  describe('usage errors', () => {
    it('should print help and succeed with --help', () => {
      expect(runCli(['--help'])).toBe(ExitCode.Success);
      expect(output).toHaveLength(1);
      expect(output[0]).toMatch(/^numerals - Convert between integers/);
      expect(output[0]).toContain('int-to-roman <n>');
    });

    it('should print help and fail without a command', () => {
      expect(runCli([])).toBe(ExitCode.UsageError);
      expect(output[0]).toMatch(/^numerals - /);
    });

    it('should reject an unknown command', () => {
      expect(runCli(['to-hex', '10'])).toBe(ExitCode.UsageError);
      expect(lastResult()).toEqual({
        success: false,
        command: 'numerals',
        timestamp: TIMESTAMP,
        data: { code: 'INVALID_ARGS', command: 'to-hex' },
        errors: ['Unknown command: to-hex'],
      });
    });

    it('should reject a missing argument', () => {
      expect(runCli(['int-to-roman'])).toBe(ExitCode.UsageError);
      expect(lastResult().errors).toEqual(['int-to-roman: missing <n> argument']);
    });

    it('should reject extra arguments', () => {
      expect(runCli(['roman-to-int', 'X', 'V'])).toBe(ExitCode.UsageError);
      expect(lastResult().errors).toEqual(['roman-to-int: unexpected arguments: V']);
    });

    it('should reject a malformed integer', () => {
      expect(runCli(['int-to-roman', 'twelve'])).toBe(ExitCode.UsageError);
      expect(lastResult().errors).toEqual(['Expected an integer, got "twelve"']);
    });

    it('should reject an unknown flag', () => {
      expect(runCli(['int-to-roman', '5', '--upper'])).toBe(ExitCode.UsageError);
      expect(lastResult().errors).toEqual(['Unknown flag: --upper']);
    });

    it('should reject invalid configuration', () => {
      expect(runCli(['int-to-roman', '5'], { NUMERALS_LETTER_CASE: 'title' })).toBe(ExitCode.UsageError);
      expect(lastResult().success).toBe(false);
      expect(lastResult().data).toMatchObject({ code: 'CONFIG_INVALID' });
    });
  });

  describe('output format', () => {
    it('should print a pretty block with --pretty', () => {
      runCli(['int-to-roman', '4', '--pretty']);
      const lines = (output[0] ?? '').split('\n');

      expect(lines[1]).toBe('Command: int-to-roman');
      expect(lines[2]).toBe('Status: SUCCESS');
    });

    it('should print a pretty block when configured', () => {
      runCli(['int-to-roman', '4'], { NUMERALS_PRETTY: 'true' });
      expect((output[0] ?? '').split('\n')[1]).toBe('Command: int-to-roman');
    });
  });

  it('should propagate errors that are not numerals errors', () => {
    const registry = new CommandRegistry();
    registry.register({
      name: 'broken',
      description: 'Always throws',
      usage: 'broken',
      execute: () => {
        throw new TypeError('boom');
      },
    });

    expect(() => run(['broken'], { env: {}, logger, registry, write: () => undefined })).toThrowError('boom');
  });
});
