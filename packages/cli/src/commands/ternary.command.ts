/**
 * Balanced ternary conversion commands
 */

import { Notation } from '@numerals/contracts';
import { decodeBalancedTernary, encodeBalancedTernary, parseBalancedTernary, renderBalancedTernary } from '@numerals/core';
import type { Command, CommandData, CommandOptions } from './types.js';
import { singleArgument } from './arguments.js';
import { parseIntegerArg } from '../cli-utils.js';

/**
 * ternary-to-int - decode balanced ternary text
 */
export class TernaryToIntCommand implements Command {
  name = 'ternary-to-int';
  description = 'Decode balanced ternary text of "-", "0" and "+" to an integer';
  usage = 'ternary-to-int <trits>';

  execute(args: string[], options: CommandOptions): CommandData {
    const input = singleArgument(this.name, args, 'trits');
    const value = decodeBalancedTernary(parseBalancedTernary(input));

    options.logger.debug('Decoded balanced ternary', {
      notation: Notation.BalancedTernary,
      value,
    });

    return { input, value };
  }
}

/**
 * int-to-ternary - encode any safe integer as balanced ternary
 */
export class IntToTernaryCommand implements Command {
  name = 'int-to-ternary';
  description = 'Encode an integer as balanced ternary';
  usage = 'int-to-ternary <n>';

  execute(args: string[], options: CommandOptions): CommandData {
    const input = parseIntegerArg(singleArgument(this.name, args, 'n'));
    const ternary = renderBalancedTernary(encodeBalancedTernary(input));

    options.logger.debug('Encoded balanced ternary', {
      notation: Notation.BalancedTernary,
      value: input,
      trits: ternary.length,
    });

    return { input, ternary };
  }
}
