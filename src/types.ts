import type { QueryParseContext } from './parse/context.js';

export type Token =
  | 'START_OBJECT'
  | 'END_OBJECT'
  | 'START_ARRAY'
  | 'END_ARRAY'
  | 'FIELD_NAME'
  | 'VALUE_STRING'
  | 'VALUE_NUMBER'
  | 'VALUE_BOOLEAN'
  | 'VALUE_NULL';

export type ScalarValue = string | number | boolean | null;

/** An in-memory query document, as produced by JSON.parse. */
export type ContentValue = ScalarValue | ContentValue[] | ContentObject;

export interface ContentObject {
  [key: string]: ContentValue;
}

/**
 * Pull-based cursor over a pre-buffered token stream.
 * Owned by the caller; parsers advance it but never keep it.
 */
export interface TokenCursor {
  /** Advances to the next token. Returns null once the stream is exhausted. */
  nextToken(): Token | null;
  currentToken(): Token | null;
  /** Name of the field the current token belongs to, if any. */
  currentName(): string | null;
  text(): string;
  textOrNull(): string | null;
  numberValue(): number;
  floatValue(): number;
  intValue(): number;
  booleanValue(): boolean;
  /** When on START_OBJECT or START_ARRAY, moves to the matching end token. */
  skipChildren(): void;
}

/** Immutable description of one parsed query clause. */
export interface QueryBuilder {
  readonly boost: number;
  readonly queryName: string | null;
  getName(): string;
  /** Renders the clause back into a document that parses to an equal builder. */
  toContent(): ContentObject;
}

/**
 * One parser per clause kind. The registry indexes it under every name it
 * reports, and the dispatcher hands it a context whose cursor sits just
 * inside the clause body.
 */
export interface QueryParser<B extends QueryBuilder = QueryBuilder> {
  names(): readonly string[];
  getBuilderPrototype(): B;
  fromContent(context: QueryParseContext): B;
}

/** Raised out-of-band whenever a deprecated field spelling is accepted. */
export interface DeprecationNotice {
  clause: string;
  field: string;
  replacement: string | null;
}
