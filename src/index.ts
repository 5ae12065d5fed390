export { createQueryParser, parseQuery, QueryDslParser } from './parser.js';
export { defaultRegistry } from './config.js';
export type { QueryParserConfig } from './config.js';
export type {
  Token,
  ScalarValue,
  ContentValue,
  ContentObject,
  TokenCursor,
  QueryBuilder,
  QueryParser,
  DeprecationNotice,
} from './types.js';
export { ContentTokenCursor } from './content/cursor.js';
export type { TokenEvent } from './content/cursor.js';
export { coerceValue, coerceBound } from './content/coerce.js';
export type { CoercedValue, BoundValue } from './content/coerce.js';
export {
  ParseField,
  ParseFieldMatcher,
  match,
  isDeprecated,
  stripSuffix,
} from './parse/parse-field.js';
export type { FieldSpelling } from './parse/parse-field.js';
export { ClauseRegistry } from './parse/registry.js';
export { QueryParseContext } from './parse/context.js';
export { parseClauseBody } from './parse/clause-body.js';
export type { ClauseBodyHandlers, FieldTest } from './parse/clause-body.js';
export { normalizePoint, parsePointString } from './geo/geo-point.js';
export type { GeoPoint } from './geo/geo-point.js';
export { decodeGeohash, encodeGeohash, isValidGeohash } from './geo/geohash.js';
export { parseDistance, toMeters } from './geo/distance.js';
export type { Distance, DistanceUnit, GeoDistanceType } from './geo/distance.js';
export { DEFAULT_BOOST } from './query/abstract-query.js';
export { MatchAllQueryBuilder } from './query/match-all.js';
export { MatchAllQueryParser } from './query/match-all-parser.js';
export { HasParentQueryBuilder } from './query/has-parent.js';
export type { HasParentFields } from './query/has-parent.js';
export { HasParentQueryParser } from './query/has-parent-parser.js';
export type { InnerHits } from './query/inner-hits.js';
export { GeoDistanceRangeQueryBuilder } from './query/geo-distance-range.js';
export type {
  GeoDistanceRangeFields,
  GeoPointValue,
  OptimizeBbox,
  PointInput,
} from './query/geo-distance-range.js';
export { GeoDistanceRangeQueryParser } from './query/geo-distance-range-parser.js';
export {
  QueryParsingError,
  UnrecognizedFieldError,
  MalformedValueError,
  MissingRequiredFieldError,
  IncompleteCompositeError,
  NestedClauseError,
  DeprecatedFieldError,
  UnknownClauseError,
} from './errors.js';
