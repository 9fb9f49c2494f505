/**
 * @fileoverview Command Registry
 *
 * Stores command descriptors keyed by name. Descriptors are copied and frozen
 * on registration; enumeration follows registration order.
 */

import type { CommandDescriptor, FlagDefinition } from './types.js';

/**
 * Query-only view of a registry
 */
export interface ReadonlyCommandRegistry {
  get(name: string): Readonly<CommandDescriptor> | undefined;
  has(name: string): boolean;
  enumerate(): string[];
  list(): Readonly<CommandDescriptor>[];
  count(): number;
}

function freezeDescriptor(descriptor: CommandDescriptor): Readonly<CommandDescriptor> {
  const flags: readonly FlagDefinition[] = Object.freeze(
    (descriptor.flags ?? []).map((flag) => Object.freeze({ ...flag }))
  );
  return Object.freeze({ ...descriptor, flags });
}

export class CommandRegistry implements ReadonlyCommandRegistry {
  private commands: Map<string, Readonly<CommandDescriptor>> = new Map();

  /**
   * Register a command. Returns false if the name is already taken.
   */
  register(descriptor: CommandDescriptor): boolean {
    if (this.commands.has(descriptor.name)) {
      return false;
    }
    this.commands.set(descriptor.name, freezeDescriptor(descriptor));
    return true;
  }

  /**
   * Remove a command. Returns false if it was not registered.
   */
  unregister(name: string): boolean {
    return this.commands.delete(name);
  }

  get(name: string): Readonly<CommandDescriptor> | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  /**
   * All registered names, in registration order
   */
  enumerate(): string[] {
    return Array.from(this.commands.keys());
  }

  list(): Readonly<CommandDescriptor>[] {
    return Array.from(this.commands.values());
  }

  count(): number {
    return this.commands.size;
  }
}

export function createCommandRegistry(descriptors: CommandDescriptor[] = []): CommandRegistry {
  const registry = new CommandRegistry();
  for (const descriptor of descriptors) {
    registry.register(descriptor);
  }
  return registry;
}
