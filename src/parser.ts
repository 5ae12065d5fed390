import type { ContentValue, QueryBuilder, TokenCursor } from './types.js';
import { ContentTokenCursor } from './content/cursor.js';
import { resolveConfig } from './config.js';
import type { QueryParserConfig, ResolvedParserConfig } from './config.js';
import { MalformedValueError } from './errors.js';
import { QueryParseContext } from './parse/context.js';

/**
 * Parses whole query documents of the form `{ "<clause>": { ... } }`.
 * Stateless between calls; each call gets its own parse context.
 */
export class QueryDslParser {
  private readonly resolved: ResolvedParserConfig;

  constructor(config: QueryParserConfig = {}) {
    this.resolved = resolveConfig(config);
  }

  parse(content: ContentValue): QueryBuilder {
    return this.parseCursor(ContentTokenCursor.fromContent(content));
  }

  parseJson(text: string): QueryBuilder {
    return this.parseCursor(ContentTokenCursor.fromJson(text));
  }

  /** Parses from a cursor positioned before the document's START_OBJECT. */
  parseCursor(cursor: TokenCursor): QueryBuilder {
    const context = new QueryParseContext(cursor, this.resolved);
    const builder = context.parseInnerQueryBuilder();
    const trailing = cursor.nextToken();
    if (trailing !== null) {
      throw new MalformedValueError(null, null, `unexpected [${trailing}] after the end of the query`);
    }
    return builder;
  }
}

export function createQueryParser(config: QueryParserConfig = {}): QueryDslParser {
  return new QueryDslParser(config);
}

/** One-shot helper around createQueryParser(config).parse(content). */
export function parseQuery(content: ContentValue, config: QueryParserConfig = {}): QueryBuilder {
  return createQueryParser(config).parse(content);
}
