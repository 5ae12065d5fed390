import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../../src/config.js';
import { ContentTokenCursor } from '../../src/content/cursor.js';
import { MalformedValueError, UnrecognizedFieldError } from '../../src/errors.js';
import { parseClauseBody } from '../../src/parse/clause-body.js';
import { QueryParseContext } from '../../src/parse/context.js';
import { ParseField } from '../../src/parse/parse-field.js';
import type { ContentValue, DeprecationNotice } from '../../src/types.js';
import { thrownBy } from './helpers.js';

const SIZE_FIELD = new ParseField('size', 'limit');
const TAGS_FIELD = new ParseField('tags');

/** A context whose cursor sits on the START_OBJECT of body. */
function contextFor(body: ContentValue, notices: DeprecationNotice[] = []): QueryParseContext {
  const cursor = ContentTokenCursor.fromContent(body);
  cursor.nextToken();
  return new QueryParseContext(cursor, resolveConfig({ onDeprecation: (notice) => { notices.push(notice); } }));
}

describe('parseClauseBody', () => {
  it('hands each value to the matching handler and stops on END_OBJECT', () => {
    const context = contextFor({ size: 3, tags: ['a', 'b'] });
    const seen: string[] = [];
    parseClauseBody(context, 'test', {
      fields: [SIZE_FIELD, TAGS_FIELD],
      onValue: (name, is) => {
        seen.push(`${name}=${context.cursor.intValue()}`);
        return is(SIZE_FIELD);
      },
      onArray: (name, is) => {
        context.cursor.skipChildren();
        seen.push(`${name}[]`);
        return is(TAGS_FIELD);
      },
    });
    expect(seen).toEqual(['size=3', 'tags[]']);
    expect(context.cursor.currentToken()).toBe('END_OBJECT');
    expect(context.cursor.nextToken()).toBeNull();
  });

  it('reports deprecated spellings through the context', () => {
    const notices: DeprecationNotice[] = [];
    const context = contextFor({ limit: 3 }, notices);
    parseClauseBody(context, 'test', { fields: [SIZE_FIELD], onValue: (_name, is) => is(SIZE_FIELD) });
    expect(notices).toEqual([{ clause: 'test', field: 'limit', replacement: 'size' }]);
  });

  it('rejects names no field knows', () => {
    const err = thrownBy(() =>
      parseClauseBody(contextFor({ bogus: 1 }), 'test', { fields: [SIZE_FIELD], onValue: () => false }),
    );
    expect(err).toBeInstanceOf(UnrecognizedFieldError);
    expect(err).toHaveProperty('message', '[test] query does not support [bogus]');
  });

  it('rejects a known field in a shape no handler takes', () => {
    const err = thrownBy(() => parseClauseBody(contextFor({ size: {} }), 'test', { fields: [SIZE_FIELD] }));
    expect(err).toBeInstanceOf(MalformedValueError);
    expect(err).toHaveProperty('message', '[test] [size] does not accept [START_OBJECT]');
  });

  it('attaches the clause to errors raised by the cursor', () => {
    const context = contextFor({ size: 'many' });
    const err = thrownBy(() =>
      parseClauseBody(context, 'test', {
        fields: [SIZE_FIELD],
        onValue: () => {
          context.cursor.intValue();
          return true;
        },
      }),
    );
    expect(err).toHaveProperty('message', '[test] expected a number for [size] but found [VALUE_STRING]');
    expect(err).toHaveProperty('clause', 'test');
  });

  it('rejects deprecated cache settings unless asked to skip them', () => {
    const err = thrownBy(() => parseClauseBody(contextFor({ _cache: true }), 'test', { fields: [SIZE_FIELD] }));
    expect(err).toBeInstanceOf(UnrecognizedFieldError);

    const notices: DeprecationNotice[] = [];
    parseClauseBody(contextFor({ _cache: { a: 1 } }, notices), 'test', {
      fields: [SIZE_FIELD],
      skipDeprecatedSettings: true,
    });
    expect(notices).toEqual([{ clause: 'test', field: '_cache', replacement: null }]);
  });

  it('fails on a body that ends early', () => {
    const cursor = ContentTokenCursor.fromEvents([{ token: 'START_OBJECT' }, { token: 'FIELD_NAME', name: 'size' }]);
    cursor.nextToken();
    const context = new QueryParseContext(cursor, resolveConfig());
    expect(() => parseClauseBody(context, 'test', { fields: [SIZE_FIELD] })).toThrow(
      '[test] unexpected end of content, expected end_object',
    );
  });
});
