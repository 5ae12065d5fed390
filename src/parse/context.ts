import type { QueryBuilder, TokenCursor } from '../types.js';
import type { ResolvedParserConfig } from '../config.js';
import {
  MalformedValueError,
  NestedClauseError,
  QueryParsingError,
  UnknownClauseError,
} from '../errors.js';
import { ParseField, ParseFieldMatcher } from './parse-field.js';
import type { ClauseRegistry } from './registry.js';

// Settings that older documents still carry but that no longer do anything.
const DEPRECATED_SETTINGS: readonly ParseField[] = [
  new ParseField('_cache').withAllDeprecated(null),
  new ParseField('_cache_key').withAllDeprecated(null),
];

/**
 * State shared by every clause parser during one top-level parse: the
 * cursor, the field-matching policy and the registry used for nested
 * clauses. One context per parse call; never reused.
 */
export class QueryParseContext {
  readonly matcher: ParseFieldMatcher;

  constructor(
    readonly cursor: TokenCursor,
    private readonly config: ResolvedParserConfig,
  ) {
    this.matcher = new ParseFieldMatcher(config);
  }

  get registry(): ClauseRegistry {
    return this.config.registry;
  }

  isDeprecatedSetting(clause: string, rawName: string): boolean {
    return DEPRECATED_SETTINGS.some((setting) => this.matcher.match(clause, rawName, setting));
  }

  /**
   * Parses one `{ "<clause>": { ... } }` object. Entered on its START_OBJECT
   * (or just before it) and leaves the cursor on its END_OBJECT.
   *
   * The clause kind is only known once the first field name inside the
   * object has been read. When parentClause is given, failures inside the
   * nested clause are rethrown as NestedClauseError under the parent.
   */
  parseInnerQueryBuilder(parentClause: string | null = null): QueryBuilder {
    const cursor = this.cursor;
    if (cursor.currentToken() !== 'START_OBJECT') {
      const token = cursor.nextToken();
      if (token !== 'START_OBJECT') {
        throw new MalformedValueError(null, null, `query malformed, must start with start_object but found [${token ?? 'end of content'}]`);
      }
    }

    let token = cursor.nextToken();
    if (token === 'END_OBJECT') {
      throw new MalformedValueError(null, null, 'query malformed, empty clause found');
    }
    if (token !== 'FIELD_NAME') {
      throw new MalformedValueError(null, null, `query malformed, no field after start_object but found [${token ?? 'end of content'}]`);
    }
    const clauseName = cursor.currentName() ?? '';

    token = cursor.nextToken();
    if (token !== 'START_OBJECT') {
      throw new MalformedValueError(null, clauseName, `[${clauseName}] query malformed, expected start_object but found [${token ?? 'end of content'}]`);
    }

    const parser = this.registry.lookup(clauseName);
    if (parser === undefined) {
      throw new UnknownClauseError(parentClause, clauseName);
    }

    let builder: QueryBuilder;
    try {
      builder = parser.fromContent(this);
    } catch (err) {
      if (parentClause !== null && err instanceof QueryParsingError) {
        throw new NestedClauseError(parentClause, clauseName, err);
      }
      throw err;
    }

    token = cursor.nextToken();
    if (token !== 'END_OBJECT') {
      throw new MalformedValueError(null, clauseName, `[${clauseName}] query malformed, expected end_object but found [${token ?? 'end of content'}]`);
    }
    return builder;
  }
}
