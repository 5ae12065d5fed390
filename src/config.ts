import type { DeprecationNotice } from './types.js';
import { ClauseRegistry } from './parse/registry.js';
import { GeoDistanceRangeQueryParser } from './query/geo-distance-range-parser.js';
import { HasParentQueryParser } from './query/has-parent-parser.js';
import { MatchAllQueryParser } from './query/match-all-parser.js';

export interface QueryParserConfig {
  /** Reject deprecated field spellings instead of warning about them. */
  strict?: boolean;
  /** Clause parsers available to the top level and to nested clauses. */
  registry?: ClauseRegistry;
  onDeprecation?: (notice: DeprecationNotice) => void;
}

/** Internal: config with defaults applied */
export interface ResolvedParserConfig {
  strict: boolean;
  registry: ClauseRegistry;
  onDeprecation: (notice: DeprecationNotice) => void;
}

/** A registry holding every clause parser this library ships. */
export function defaultRegistry(): ClauseRegistry {
  return new ClauseRegistry()
    .register(new HasParentQueryParser())
    .register(new GeoDistanceRangeQueryParser())
    .register(new MatchAllQueryParser());
}

export function resolveConfig(config: QueryParserConfig = {}): ResolvedParserConfig {
  return {
    strict: config.strict ?? false,
    registry: config.registry ?? defaultRegistry(),
    onDeprecation: config.onDeprecation ?? (({ clause, field, replacement }) => {
      console.warn(
        replacement === null
          ? `[query-dsl] Deprecated field [${field}] used in [${clause}], it no longer has any effect`
          : `[query-dsl] Deprecated field [${field}] used in [${clause}], expected [${replacement}] instead`,
      );
    }),
  };
}
