/**
 * Roman numeral conversion commands
 */

import { Notation } from '@numerals/contracts';
import { decodeRoman, encodeRoman, parseRoman, renderRomanLower, renderRomanUpper } from '@numerals/core';
import type { Command, CommandData, CommandOptions } from './types.js';
import { singleArgument } from './arguments.js';
import { parseIntegerArg } from '../cli-utils.js';

/**
 * roman-to-int - decode a Roman numeral
 */
export class RomanToIntCommand implements Command {
  name = 'roman-to-int';
  description = 'Decode a Roman numeral (any letter case) to an integer';
  usage = 'roman-to-int <numeral>';

  execute(args: string[], options: CommandOptions): CommandData {
    const input = singleArgument(this.name, args, 'numeral');
    const roman = parseRoman(input);
    const value = decodeRoman(roman);

    options.logger.debug('Decoded roman numeral', {
      notation: Notation.Roman,
      symbols: roman.length,
      value,
    });

    return { input, value };
  }
}

/**
 * int-to-roman - encode a positive integer as a Roman numeral
 */
export class IntToRomanCommand implements Command {
  name = 'int-to-roman';
  description = 'Encode an integer from 1 to 32767 as a Roman numeral';
  usage = 'int-to-roman <n>';

  execute(args: string[], options: CommandOptions): CommandData {
    const input = parseIntegerArg(singleArgument(this.name, args, 'n'));
    const roman = encodeRoman(input);
    const numeral = options.letterCase === 'lower' ? renderRomanLower(roman) : renderRomanUpper(roman);

    options.logger.debug('Encoded roman numeral', {
      notation: Notation.Roman,
      value: input,
      symbols: roman.length,
    });

    return { input, numeral };
  }
}
