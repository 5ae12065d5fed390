import { createQueryParser } from '../../src/parser.js';
import type { QueryParserConfig } from '../../src/config.js';
import type { ContentValue, DeprecationNotice, QueryBuilder } from '../../src/types.js';

/** A lenient parser that records deprecation notices instead of logging them. */
export function recordingParser(config: Omit<QueryParserConfig, 'onDeprecation'> = {}) {
  const notices: DeprecationNotice[] = [];
  const parser = createQueryParser({
    ...config,
    onDeprecation: (notice) => {
      notices.push(notice);
    },
  });
  return {
    notices,
    parse: (content: ContentValue): QueryBuilder => parser.parse(content),
  };
}

/** Parses and returns the builder, failing the test if it is not of the given class. */
export function parseAs<T>(
  ctor: abstract new (...args: never[]) => T,
  content: ContentValue,
  config: Omit<QueryParserConfig, 'onDeprecation'> = {},
): T {
  const builder = recordingParser(config).parse(content);
  if (!(builder instanceof ctor)) {
    throw new Error(`expected ${ctor.name} but got ${builder.constructor.name}`);
  }
  return builder;
}

/** Runs fn and returns what it threw. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}
