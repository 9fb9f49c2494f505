/**
 * @fileoverview Help Formatting
 *
 * Renders command descriptors as help text for the `help` built-in and for
 * front ends that show usage on a failed parse.
 */

import type { ReadonlyCommandRegistry } from './registry.js';
import type { CommandDescriptor, FlagDefinition } from './types.js';

const NAME_COLUMN_WIDTH = 12;

/**
 * `-v, --verbose` or `--count <int> (required)`
 */
export function formatFlagSignature(flag: FlagDefinition): string {
  let signature = flag.short ? `-${flag.short}, --${flag.name}` : `--${flag.name}`;
  if (flag.type !== 'bool') {
    signature += ` <${flag.type}>`;
  }
  if (flag.required) {
    signature += ' (required)';
  }
  return signature;
}

/**
 * Detailed help for one command
 */
export function formatCommandHelp(descriptor: Readonly<CommandDescriptor>): string {
  const lines: string[] = [
    `=== ${descriptor.name} ===`,
    '',
    `Description: ${descriptor.description || 'No description'}`,
    '',
    `Usage: ${descriptor.usage ?? descriptor.name}`,
  ];

  if (descriptor.helpText) {
    lines.push('', descriptor.helpText);
  }

  const flags = descriptor.flags ?? [];
  if (flags.length > 0) {
    lines.push('', 'Options:');
    for (const flag of flags) {
      lines.push(`  ${formatFlagSignature(flag)}`);
      if (flag.description) {
        lines.push(`      ${flag.description}`);
      }
    }
  }

  const minArgs = descriptor.minArgs ?? 0;
  const maxArgs = descriptor.maxArgs ?? 0;
  if (minArgs > 0 || maxArgs > 0) {
    lines.push(
      '',
      'Arguments:',
      `  Minimum: ${minArgs}`,
      `  Maximum: ${maxArgs > 0 ? String(maxArgs) : 'unlimited'}`
    );
  }

  return lines.join('\n');
}

/**
 * Listing of every visible command, sorted by name
 */
export function formatCommandList(registry: ReadonlyCommandRegistry): string {
  const visible = registry
    .list()
    .filter((descriptor) => !descriptor.hidden)
    .sort((a, b) => a.name.localeCompare(b.name));

  const lines = ["=== Necromancer's Shell - Command Help ===", '', 'Available commands:', ''];
  for (const descriptor of visible) {
    lines.push(
      `  ${descriptor.name.padEnd(NAME_COLUMN_WIDTH)} - ${descriptor.description || 'No description'}`
    );
  }
  lines.push('', "Type 'help <command>' for detailed information on a specific command.");
  return lines.join('\n');
}
