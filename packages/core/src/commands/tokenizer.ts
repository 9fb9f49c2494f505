/**
 * @fileoverview Command Tokenizer
 *
 * Splits an input line into tokens, handling:
 * - Whitespace separation
 * - Single quotes (literal, no escapes)
 * - Double quotes with escapes (\n, \t, \\, \", \')
 *
 * A quote opening inside a word, or text directly after a closing quote,
 * continues the same token: `a"b c"d` is the single token `ab cd`.
 */

import type { Token } from './types.js';

// =============================================================================
// Types
// =============================================================================

export type TokenizeError = 'empty_input' | 'unclosed_quote' | 'invalid_escape';

export type TokenizeResult =
  | { success: true; tokens: Token[] }
  | { success: false; error: TokenizeError };

type QuoteState = 'none' | 'single' | 'double';

// =============================================================================
// Constants
// =============================================================================

const WHITESPACE = new Set([' ', '\t', '\n', '\r', '\v', '\f']);

/** Escapes recognized inside double quotes */
const DOUBLE_QUOTE_ESCAPES = new Map<string, string>([
  ['n', '\n'],
  ['t', '\t'],
  ['\\', '\\'],
  ['"', '"'],
  ["'", "'"],
]);

const TOKENIZE_ERROR_MESSAGES: Record<TokenizeError, string> = {
  empty_input: 'Empty input',
  unclosed_quote: 'Unclosed quote',
  invalid_escape: 'Invalid escape sequence',
};

// =============================================================================
// Tokenizer
// =============================================================================

export function isBlank(line: string): boolean {
  for (const char of line) {
    if (!WHITESPACE.has(char)) {
      return false;
    }
  }
  return true;
}

/**
 * Tokenize an input line
 */
export function tokenize(line: string): TokenizeResult {
  if (isBlank(line)) {
    return { success: false, error: 'empty_input' };
  }

  const tokens: Token[] = [];
  let state: QuoteState = 'none';
  let current = '';
  let inToken = false;
  let quoted = false;
  let escaping = false;

  for (const char of line) {
    if (state === 'double') {
      if (escaping) {
        const escaped = DOUBLE_QUOTE_ESCAPES.get(char);
        if (escaped === undefined) {
          return { success: false, error: 'invalid_escape' };
        }
        current += escaped;
        escaping = false;
      } else if (char === '\\') {
        escaping = true;
      } else if (char === '"') {
        state = 'none';
      } else {
        current += char;
      }
      continue;
    }

    if (state === 'single') {
      if (char === "'") {
        state = 'none';
      } else {
        current += char;
      }
      continue;
    }

    if (WHITESPACE.has(char)) {
      if (inToken) {
        tokens.push({ text: current, wasQuoted: quoted });
        current = '';
        inToken = false;
        quoted = false;
      }
      continue;
    }

    inToken = true;
    if (char === '"') {
      state = 'double';
      quoted = true;
    } else if (char === "'") {
      state = 'single';
      quoted = true;
    } else {
      current += char;
    }
  }

  if (escaping) {
    return { success: false, error: 'invalid_escape' };
  }
  if (state !== 'none') {
    return { success: false, error: 'unclosed_quote' };
  }

  if (inToken) {
    tokens.push({ text: current, wasQuoted: quoted });
  }

  return { success: true, tokens };
}

/**
 * Get human-readable error message
 */
export function tokenizeErrorString(error: TokenizeError): string {
  return TOKENIZE_ERROR_MESSAGES[error];
}
