import type { TokenCursor } from '../types.js';
import { MalformedValueError } from '../errors.js';

/**
 * A scalar token read without losing its original kind. Bounds such as
 * "12km" stay textual so that unit-aware readers downstream can tell them
 * apart from plain numbers.
 */
export type CoercedValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'absent' };

/** A range bound: a bare number, or text that carries its own unit. */
export type BoundValue = string | number;

export function coerceValue(cursor: TokenCursor): CoercedValue {
  switch (cursor.currentToken()) {
    case 'VALUE_NULL':
      return { kind: 'absent' };
    case 'VALUE_STRING':
      return { kind: 'string', value: cursor.text() };
    case 'VALUE_NUMBER':
      return { kind: 'number', value: cursor.numberValue() };
    case 'VALUE_BOOLEAN':
      return { kind: 'boolean', value: cursor.booleanValue() };
    default: {
      const field = cursor.currentName();
      throw new MalformedValueError(
        null,
        field,
        `expected a value for [${field ?? ''}] but found [${cursor.currentToken() ?? 'end of content'}]`,
      );
    }
  }
}

/** Reads a range bound. Returns undefined for null, which leaves the bound unset. */
export function coerceBound(cursor: TokenCursor): BoundValue | undefined {
  const coerced = coerceValue(cursor);
  switch (coerced.kind) {
    case 'absent':
      return undefined;
    case 'string':
    case 'number':
      return coerced.value;
    case 'boolean': {
      const field = cursor.currentName();
      throw new MalformedValueError(
        null,
        field,
        `[${field ?? ''}] must be a number or a string but found [${String(coerced.value)}]`,
      );
    }
  }
}
