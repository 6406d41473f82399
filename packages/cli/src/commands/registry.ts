/**
 * Command registry
 */

import type { Command } from './types.js';
import { IntToRomanCommand, RomanToIntCommand } from './roman.command.js';
import { IntToTernaryCommand, TernaryToIntCommand } from './ternary.command.js';

/**
 * Name-indexed set of commands, kept in registration order for help output.
 */
export class CommandRegistry {
  private readonly commands = new Map<string, Command>();

  register(command: Command): void {
    if (this.commands.has(command.name)) {
      throw new Error(`Command already registered: ${command.name}`);
    }
    this.commands.set(command.name, command);
  }

  get(name: string): Command | undefined {
    return this.commands.get(name);
  }

  list(): Command[] {
    return [...this.commands.values()];
  }
}

/**
 * Registry holding every conversion command.
 */
export function createDefaultRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  registry.register(new RomanToIntCommand());
  registry.register(new IntToRomanCommand());
  registry.register(new TernaryToIntCommand());
  registry.register(new IntToTernaryCommand());
  return registry;
}
