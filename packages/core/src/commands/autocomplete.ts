/**
 * @fileoverview Autocomplete Index
 *
 * Prefix completion over visible command names, plus custom entries the game
 * adds (god names, locations, ...). The name index is derived from a registry
 * and must be rebuilt after every registry mutation; it is never patched.
 */

import type { ReadonlyCommandRegistry } from './registry.js';

export type CompletionContext = 'command' | 'flag' | 'argument';

export interface LineCompletion {
  /** Which part of the line is being completed */
  context: CompletionContext;
  /** The partial word at the end of the line */
  prefix: string;
  /** Replacement candidates for the partial word */
  candidates: string[];
}

function lastWord(input: string): string {
  const match = /(\S+)$/.exec(input);
  return match?.[1] ?? '';
}

export class Autocomplete {
  private registry: ReadonlyCommandRegistry | null = null;
  private commandNames: string[] = [];
  private customEntries: string[] = [];

  constructor(registry?: ReadonlyCommandRegistry) {
    if (registry) {
      this.rebuild(registry);
    }
  }

  /**
   * Recompute the name index from the registry
   */
  rebuild(registry: ReadonlyCommandRegistry): void {
    this.registry = registry;
    this.commandNames = registry
      .enumerate()
      .filter((name) => registry.get(name)?.hidden !== true);
  }

  /**
   * Candidates starting with the prefix: command names in registry order,
   * then custom entries in insertion order
   */
  complete(prefix: string): string[] {
    const commands = this.commandNames.filter((name) => name.startsWith(prefix));
    const custom = this.customEntries.filter(
      (entry) => entry.startsWith(prefix) && !commands.includes(entry)
    );
    return [...commands, ...custom];
  }

  /**
   * Complete the last word of a partially typed line
   */
  completeLine(input: string): LineCompletion {
    const prefix = lastWord(input);
    const endsWithSpace = prefix === '' && input.length > 0;
    const words = input.trim() === '' ? [] : input.trim().split(/\s+/);

    if (words.length === 0 || (words.length === 1 && !endsWithSpace)) {
      return { context: 'command', prefix, candidates: this.complete(prefix) };
    }

    if (!endsWithSpace && prefix.startsWith('-')) {
      const commandName = words[0] ?? '';
      return { context: 'flag', prefix, candidates: this.completeFlag(commandName, prefix) };
    }

    return { context: 'argument', prefix, candidates: [] };
  }

  /**
   * `--na` and a lone `-` complete long names; `-x` completes short names
   */
  private completeFlag(commandName: string, prefix: string): string[] {
    const descriptor = this.registry?.get(commandName);
    if (!descriptor || descriptor.hidden) {
      return [];
    }
    const flags = descriptor.flags ?? [];

    if (prefix === '-' || prefix.startsWith('--')) {
      const bare = prefix.replace(/^-+/, '');
      return flags.filter((flag) => flag.name.startsWith(bare)).map((flag) => `--${flag.name}`);
    }

    const bare = prefix.slice(1);
    const candidates: string[] = [];
    for (const flag of flags) {
      if (flag.short?.startsWith(bare)) {
        candidates.push(`-${flag.short}`);
      }
    }
    return candidates;
  }

  /**
   * Add a custom completion entry. Returns false if already present.
   */
  addEntry(entry: string): boolean {
    if (entry === '' || this.customEntries.includes(entry)) {
      return false;
    }
    this.customEntries.push(entry);
    return true;
  }

  removeEntry(entry: string): boolean {
    const index = this.customEntries.indexOf(entry);
    if (index === -1) {
      return false;
    }
    this.customEntries.splice(index, 1);
    return true;
  }

  clearCustomEntries(): void {
    this.customEntries = [];
  }

  /**
   * Names currently in the index (for diagnostics and tests)
   */
  getCommandNames(): string[] {
    return [...this.commandNames];
  }
}
