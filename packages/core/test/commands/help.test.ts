/**
 * @fileoverview Help Formatting Tests
 */
import { describe, it, expect } from 'vitest';
import { commandSuccess } from '../../src/commands/dispatcher.js';
import {
  formatCommandHelp,
  formatCommandList,
  formatFlagSignature,
} from '../../src/commands/help.js';
import { createCommandRegistry } from '../../src/commands/registry.js';

describe('Help Formatting', () => {
  describe('formatFlagSignature', () => {
    it('should show a boolean flag without a value', () => {
      expect(formatFlagSignature({ name: 'verbose', short: 'v', type: 'bool' })).toBe(
        '-v, --verbose'
      );
    });

    it('should show the value type and required marker', () => {
      expect(formatFlagSignature({ name: 'count', type: 'int', required: true })).toBe(
        '--count <int> (required)'
      );
    });
  });

  describe('formatCommandHelp', () => {
    it('should show every section of a full descriptor', () => {
      const help = formatCommandHelp({
        name: 'raise',
        description: 'Raise undead',
        usage: 'raise <corpse> [--count <n>]',
        helpText: 'Animates a corpse.',
        flags: [
          { name: 'count', short: 'c', type: 'int', description: 'How many to raise' },
          { name: 'quiet', type: 'bool' },
        ],
        minArgs: 1,
        handler: () => commandSuccess(),
      });

      expect(help).toBe(
        [
          '=== raise ===',
          '',
          'Description: Raise undead',
          '',
          'Usage: raise <corpse> [--count <n>]',
          '',
          'Animates a corpse.',
          '',
          'Options:',
          '  -c, --count <int>',
          '      How many to raise',
          '  --quiet',
          '',
          'Arguments:',
          '  Minimum: 1',
          '  Maximum: unlimited',
        ].join('\n')
      );
    });

    it('should fall back to the name for usage', () => {
      const help = formatCommandHelp({
        name: 'status',
        description: 'Show status',
        handler: () => commandSuccess(),
      });

      expect(help).toBe(['=== status ===', '', 'Description: Show status', '', 'Usage: status'].join('\n'));
    });
  });

  describe('formatCommandList', () => {
    it('should list visible commands sorted by name', () => {
      const registry = createCommandRegistry([
        { name: 'status', description: 'Show status', handler: () => commandSuccess() },
        { name: 'army', description: 'List minions', handler: () => commandSuccess() },
        { name: 'debug', description: 'Debug', hidden: true, handler: () => commandSuccess() },
      ]);

      expect(formatCommandList(registry)).toBe(
        [
          "=== Necromancer's Shell - Command Help ===",
          '',
          'Available commands:',
          '',
          '  army         - List minions',
          '  status       - Show status',
          '',
          "Type 'help <command>' for detailed information on a specific command.",
        ].join('\n')
      );
    });
  });
});
