import type { QueryParseContext } from './context.js';
import { MalformedValueError, UnrecognizedFieldError } from '../errors.js';
import { matchesAny } from './parse-field.js';
import type { ParseField } from './parse-field.js';

/** Tests the current field name against one field, under the context's policy. */
export type FieldTest = (field: ParseField) => boolean;

/**
 * Callbacks for one clause body. Each returns true when it consumed the
 * value for `name`; object and array handlers must leave the cursor on the
 * matching end token.
 */
export interface ClauseBodyHandlers {
  /** Every field the clause knows, used to tell a wrong shape from an unknown name. */
  fields: readonly ParseField[];
  /** Skip `_cache` and `_cache_key` instead of rejecting them. */
  skipDeprecatedSettings?: boolean;
  onValue?: (name: string, is: FieldTest) => boolean;
  onObject?: (name: string, is: FieldTest) => boolean;
  onArray?: (name: string, is: FieldTest) => boolean;
}

/**
 * Drives one pass over a clause body, from just after its START_OBJECT up
 * to and including the matching END_OBJECT.
 *
 *   AWAITING_FIELD --FIELD_NAME--> AWAITING_VALUE --value|object|array--> AWAITING_FIELD
 *
 * Nested objects and arrays are consumed by the handlers, so every token
 * seen here sits at the clause's own depth.
 */
export function parseClauseBody(
  context: QueryParseContext,
  clause: string,
  handlers: ClauseBodyHandlers,
): void {
  const cursor = context.cursor;
  let fieldName: string | null = null;

  for (;;) {
    const token = cursor.nextToken();
    if (token === null) {
      throw new MalformedValueError(clause, fieldName, 'unexpected end of content, expected end_object');
    }
    if (token === 'END_OBJECT' && fieldName === null) {
      return;
    }
    if (token === 'FIELD_NAME' && fieldName === null) {
      fieldName = cursor.currentName() ?? '';
      continue;
    }
    if (fieldName === null || token === 'END_OBJECT' || token === 'END_ARRAY' || token === 'FIELD_NAME') {
      throw new MalformedValueError(clause, fieldName, `unexpected token [${token}]`);
    }

    const name = fieldName;
    fieldName = null;

    if (handlers.skipDeprecatedSettings === true && context.isDeprecatedSetting(clause, name)) {
      cursor.skipChildren();
      continue;
    }

    const is: FieldTest = (field) => context.matcher.match(clause, name, field);
    let handled: boolean;
    try {
      if (token === 'START_OBJECT') {
        handled = handlers.onObject?.(name, is) ?? false;
      } else if (token === 'START_ARRAY') {
        handled = handlers.onArray?.(name, is) ?? false;
      } else {
        handled = handlers.onValue?.(name, is) ?? false;
      }
    } catch (err) {
      if (err instanceof MalformedValueError && err.clause === null) {
        throw err.withClause(clause);
      }
      throw err;
    }

    if (!handled) {
      if (matchesAny(name, handlers.fields)) {
        throw new MalformedValueError(clause, name, `[${name}] does not accept [${token}]`);
      }
      throw new UnrecognizedFieldError(clause, name);
    }
  }
}
