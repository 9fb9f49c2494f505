/**
 * @fileoverview Value Coercion
 *
 * Converts token text into typed flag values. Numeric parsing accepts the
 * whole string or nothing; the boolean literal set is closed and
 * case-sensitive.
 */

import type { TypedValue, ValueType } from './types.js';

export type CoercionResult =
  | { success: true; value: TypedValue }
  | { success: false; error: string };

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const TRUE_LITERALS: readonly string[] = ['true', 'yes', '1'];
export const FALSE_LITERALS: readonly string[] = ['false', 'no', '0'];

function fail(text: string, type: ValueType): CoercionResult {
  return { success: false, error: `expected ${type}, got '${text}'` };
}

/**
 * Coerce token text to the requested type
 */
export function coerce(text: string, type: ValueType): CoercionResult {
  switch (type) {
    case 'string':
      return { success: true, value: { type, value: text } };

    case 'int': {
      if (!INT_PATTERN.test(text)) {
        return fail(text, type);
      }
      const value = Number(text);
      if (!Number.isSafeInteger(value)) {
        return fail(text, type);
      }
      return { success: true, value: { type, value } };
    }

    case 'float': {
      if (!FLOAT_PATTERN.test(text)) {
        return fail(text, type);
      }
      const value = Number(text);
      if (!Number.isFinite(value)) {
        return fail(text, type);
      }
      return { success: true, value: { type, value } };
    }

    case 'bool':
      if (TRUE_LITERALS.includes(text)) {
        return { success: true, value: { type, value: true } };
      }
      if (FALSE_LITERALS.includes(text)) {
        return { success: true, value: { type, value: false } };
      }
      return fail(text, type);
  }
}

/**
 * Render a typed value back to text
 */
export function formatTypedValue(value: TypedValue): string {
  switch (value.type) {
    case 'string':
      return value.value;
    case 'int':
    case 'float':
      return String(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
  }
}
