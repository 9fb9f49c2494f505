/**
 * @fileoverview Command Parser
 *
 * Parses tokenized input into a ParsedCommand validated against the
 * descriptor registered for the command name. Parsing never mutates the
 * registry and never invokes a handler.
 */

import { coerce } from './coercion.js';
import type { ReadonlyCommandRegistry } from './registry.js';
import { tokenize, tokenizeErrorString, type TokenizeError } from './tokenizer.js';
import type {
  CommandDescriptor,
  FlagDefinition,
  ParsedCommand,
  Token,
  TypedValue,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export type ParseError =
  | { kind: 'tokenize'; error: TokenizeError }
  | { kind: 'empty_command' }
  | { kind: 'unknown_command'; command: string }
  | { kind: 'invalid_flag'; command: string; flag: string }
  | { kind: 'missing_flag_value'; command: string; flag: string }
  | { kind: 'invalid_flag_value'; command: string; flag: string; detail: string }
  | { kind: 'too_few_args'; command: string; expected: number; received: number }
  | { kind: 'too_many_args'; command: string; expected: number; received: number }
  | { kind: 'required_flag_missing'; command: string; flag: string };

export type ParseErrorKind = ParseError['kind'];

export type ParseResult =
  | { success: true; command: ParsedCommand }
  | { success: false; error: ParseError };

interface FlagIndex {
  long: Map<string, FlagDefinition>;
  short: Map<string, FlagDefinition>;
}

// =============================================================================
// Flag Lookup
// =============================================================================

const flagIndexCache = new WeakMap<Readonly<CommandDescriptor>, FlagIndex>();

function getFlagIndex(descriptor: Readonly<CommandDescriptor>): FlagIndex {
  const cached = flagIndexCache.get(descriptor);
  if (cached) {
    return cached;
  }

  const index: FlagIndex = { long: new Map(), short: new Map() };
  for (const flag of descriptor.flags ?? []) {
    index.long.set(flag.name, flag);
    if (flag.short) {
      index.short.set(flag.short, flag);
    }
  }
  flagIndexCache.set(descriptor, index);
  return index;
}

/**
 * A token is a flag if it starts with '-' and has at least one more
 * character. Quoting does not change this.
 */
export function isFlagToken(token: Token): boolean {
  return token.text.length > 1 && token.text.startsWith('-');
}

function resolveFlag(index: FlagIndex, text: string): FlagDefinition | undefined {
  if (text.startsWith('--')) {
    return index.long.get(text.slice(2));
  }
  return index.short.get(text.slice(1));
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse tokens against the registry
 */
export function parse(
  tokens: readonly Token[],
  registry: ReadonlyCommandRegistry,
  raw?: string
): ParseResult {
  const [first, ...rest] = tokens;
  if (!first) {
    return { success: false, error: { kind: 'empty_command' } };
  }

  const name = first.text;
  const descriptor = registry.get(name);
  if (!descriptor) {
    return { success: false, error: { kind: 'unknown_command', command: name } };
  }

  const index = getFlagIndex(descriptor);
  const flags = new Map<string, TypedValue>();
  const args: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (!token) {
      break;
    }

    if (!isFlagToken(token)) {
      args.push(token.text);
      continue;
    }

    const definition = resolveFlag(index, token.text);
    if (!definition) {
      return {
        success: false,
        error: { kind: 'invalid_flag', command: name, flag: token.text },
      };
    }

    if (definition.type === 'bool') {
      flags.set(definition.name, { type: 'bool', value: true });
      continue;
    }

    const valueToken = rest[i + 1];
    if (!valueToken) {
      return {
        success: false,
        error: { kind: 'missing_flag_value', command: name, flag: `--${definition.name}` },
      };
    }
    i++;

    const coerced = coerce(valueToken.text, definition.type);
    if (!coerced.success) {
      return {
        success: false,
        error: {
          kind: 'invalid_flag_value',
          command: name,
          flag: `--${definition.name}`,
          detail: coerced.error,
        },
      };
    }
    flags.set(definition.name, coerced.value);
  }

  const minArgs = descriptor.minArgs ?? 0;
  const maxArgs = descriptor.maxArgs ?? 0;

  if (args.length < minArgs) {
    return {
      success: false,
      error: { kind: 'too_few_args', command: name, expected: minArgs, received: args.length },
    };
  }
  if (maxArgs > 0 && args.length > maxArgs) {
    return {
      success: false,
      error: { kind: 'too_many_args', command: name, expected: maxArgs, received: args.length },
    };
  }

  for (const flag of descriptor.flags ?? []) {
    if (flag.required && !flags.has(flag.name)) {
      return {
        success: false,
        error: { kind: 'required_flag_missing', command: name, flag: `--${flag.name}` },
      };
    }
  }

  return {
    success: true,
    command: {
      name,
      descriptor,
      flags,
      args,
      raw: raw ?? tokens.map((token) => token.text).join(' '),
    },
  };
}

/**
 * Tokenize and parse a raw line
 */
export function parseLine(line: string, registry: ReadonlyCommandRegistry): ParseResult {
  const tokenized = tokenize(line);
  if (!tokenized.success) {
    return { success: false, error: { kind: 'tokenize', error: tokenized.error } };
  }
  return parse(tokenized.tokens, registry, line);
}

/**
 * Get human-readable error message
 */
export function parseErrorString(error: ParseError): string {
  switch (error.kind) {
    case 'tokenize':
      return tokenizeErrorString(error.error);
    case 'empty_command':
      return 'Empty command';
    case 'unknown_command':
      return `Unknown command: ${error.command}`;
    case 'invalid_flag':
      return `Invalid flag for ${error.command}: ${error.flag}`;
    case 'missing_flag_value':
      return `Missing value for ${error.flag}`;
    case 'invalid_flag_value':
      return `Invalid value for ${error.flag}: ${error.detail}`;
    case 'too_few_args':
      return `Too few arguments for ${error.command}: expected at least ${error.expected}, got ${error.received}`;
    case 'too_many_args':
      return `Too many arguments for ${error.command}: expected at most ${error.expected}, got ${error.received}`;
    case 'required_flag_missing':
      return `Missing required flag for ${error.command}: ${error.flag}`;
  }
}

// =============================================================================
// Accessors
// =============================================================================

export function getFlag(command: ParsedCommand, name: string): TypedValue | undefined {
  return command.flags.get(name);
}

export function hasFlag(command: ParsedCommand, name: string): boolean {
  return command.flags.has(name);
}

export function getArg(command: ParsedCommand, index: number): string | undefined {
  return command.args[index];
}

export function getString(command: ParsedCommand, name: string): string | undefined {
  const flag = command.flags.get(name);
  return flag?.type === 'string' ? flag.value : undefined;
}

export function getInt(command: ParsedCommand, name: string): number | undefined {
  const flag = command.flags.get(name);
  return flag?.type === 'int' ? flag.value : undefined;
}

export function getFloat(command: ParsedCommand, name: string): number | undefined {
  const flag = command.flags.get(name);
  return flag?.type === 'float' ? flag.value : undefined;
}

/**
 * Boolean flags are either present (true) or absent (false)
 */
export function getBool(command: ParsedCommand, name: string): boolean {
  const flag = command.flags.get(name);
  return flag?.type === 'bool' ? flag.value : false;
}
