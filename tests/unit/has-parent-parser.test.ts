import { describe, it, expect } from 'vitest';
import {
  DeprecatedFieldError,
  MalformedValueError,
  MissingRequiredFieldError,
  NestedClauseError,
  UnknownClauseError,
  UnrecognizedFieldError,
} from '../../src/errors.js';
import { HasParentQueryBuilder } from '../../src/query/has-parent.js';
import { HasParentQueryParser } from '../../src/query/has-parent-parser.js';
import { MatchAllQueryBuilder } from '../../src/query/match-all.js';
import { createQueryParser } from '../../src/parser.js';
import { parseAs, recordingParser, thrownBy } from './helpers.js';

const MATCH_ALL = { match_all: {} };

describe('HasParentQueryParser', () => {
  describe('canonical fields', () => {
    it('builds the query from parent_type, query and score', () => {
      const builder = parseAs(HasParentQueryBuilder, {
        has_parent: { parent_type: 'blog', query: MATCH_ALL, score: true },
      });
      expect(builder.parentType).toBe('blog');
      expect(builder.query).toBeInstanceOf(MatchAllQueryBuilder);
      expect(builder.score).toBe(true);
      expect(builder.boost).toBe(1);
      expect(builder.queryName).toBeNull();
      expect(builder.innerHits).toBeNull();
    });

    it('defaults score to false', () => {
      const builder = parseAs(HasParentQueryBuilder, { has_parent: { parent_type: 'blog', query: MATCH_ALL } });
      expect(builder.score).toBe(false);
    });

    it('reads boost and _name', () => {
      const builder = parseAs(HasParentQueryBuilder, {
        has_parent: { parent_type: 'blog', query: MATCH_ALL, boost: 2.5, _name: 'parents' },
      });
      expect(builder.boost).toBe(2.5);
      expect(builder.queryName).toBe('parents');
    });

    it('accepts fields in any order', () => {
      const builder = parseAs(HasParentQueryBuilder, {
        has_parent: { score: true, query: MATCH_ALL, parent_type: 'blog' },
      });
      expect(builder.parentType).toBe('blog');
      expect(builder.score).toBe(true);
    });

    it('accepts camelCase clause and field names without notices', () => {
      const { notices, parse } = recordingParser();
      const builder = parse({ hasParent: { parentType: 'blog', query: { matchAll: {} } } });
      expect(builder).toBeInstanceOf(HasParentQueryBuilder);
      expect(builder.getName()).toBe('has_parent');
      expect(notices).toEqual([]);
    });

    it('returns a frozen builder', () => {
      const builder = parseAs(HasParentQueryBuilder, { has_parent: { parent_type: 'blog', query: MATCH_ALL } });
      expect(Object.isFrozen(builder)).toBe(true);
    });
  });

  describe('deprecated spellings', () => {
    it('accepts type and filter, reporting each', () => {
      const { notices, parse } = recordingParser();
      const builder = parse({ has_parent: { type: 'blog', filter: MATCH_ALL } });
      expect(builder).toBeInstanceOf(HasParentQueryBuilder);
      expect(notices).toEqual([
        { clause: 'has_parent', field: 'type', replacement: 'parent_type' },
        { clause: 'has_parent', field: 'filter', replacement: 'query' },
      ]);
    });

    it('maps score_mode "score" to score true', () => {
      const { notices, parse } = recordingParser();
      const builder = parse({ has_parent: { parent_type: 'blog', query: MATCH_ALL, score_mode: 'score' } });
      expect(builder).toHaveProperty('score', true);
      expect(notices).toEqual([{ clause: 'has_parent', field: 'score_mode', replacement: 'score' }]);
    });

    it('maps score_type "none" to score false', () => {
      const builder = parseAs(HasParentQueryBuilder, {
        has_parent: { parent_type: 'blog', query: MATCH_ALL, score: true, score_type: 'none' },
      });
      expect(builder.score).toBe(false);
    });

    it('ignores other legacy score modes', () => {
      const builder = parseAs(HasParentQueryBuilder, {
        has_parent: { parent_type: 'blog', query: MATCH_ALL, score: true, score_mode: 'max' },
      });
      expect(builder.score).toBe(true);
    });

    it('ignores a null legacy score mode', () => {
      const builder = parseAs(HasParentQueryBuilder, {
        has_parent: { parent_type: 'blog', query: MATCH_ALL, score: true, score_mode: null },
      });
      expect(builder.score).toBe(true);
    });

    it('builds the same query from every spelling', () => {
      const { parse } = recordingParser();
      const canonical = parse({ has_parent: { parent_type: 'blog', query: MATCH_ALL, score: true } }).toContent();
      expect(parse({ has_parent: { type: 'blog', filter: MATCH_ALL, score_mode: 'score' } }).toContent()).toEqual(canonical);
      expect(parse({ hasParent: { parentType: 'blog', query: { matchAll: {} }, scoreType: 'score' } }).toContent()).toEqual(
        canonical,
      );
    });

    it('rejects deprecated spellings in strict mode', () => {
      const parser = createQueryParser({ strict: true });
      const err = thrownBy(() => parser.parse({ has_parent: { type: 'blog', query: MATCH_ALL } }));
      expect(err).toBeInstanceOf(DeprecatedFieldError);
      expect(err).toHaveProperty('message', '[has_parent] Deprecated field [type] used, expected [parent_type] instead');
    });
  });

  describe('required fields', () => {
    it('requires parent_type', () => {
      const err = thrownBy(() => recordingParser().parse({ has_parent: { query: MATCH_ALL } }));
      expect(err).toBeInstanceOf(MissingRequiredFieldError);
      expect(err).toHaveProperty('message', "[has_parent] requires 'parent_type' field");
    });

    it('requires query', () => {
      const err = thrownBy(() => recordingParser().parse({ has_parent: { parent_type: 'blog' } }));
      expect(err).toBeInstanceOf(MissingRequiredFieldError);
      expect(err).toHaveProperty('field', 'query');
    });

    it('checks required fields when built directly', () => {
      expect(() => new HasParentQueryBuilder({ query: MatchAllQueryBuilder.PROTOTYPE })).toThrow(
        "[has_parent] requires 'parent_type' field",
      );
    });
  });

  describe('unknown and malformed fields', () => {
    it('rejects unknown scalar fields', () => {
      const err = thrownBy(() =>
        recordingParser().parse({ has_parent: { parent_type: 'blog', bogus: 1, query: MATCH_ALL } }),
      );
      expect(err).toBeInstanceOf(UnrecognizedFieldError);
      expect(err).toHaveProperty('message', '[has_parent] query does not support [bogus]');
    });

    it('rejects unknown object fields', () => {
      const err = thrownBy(() => recordingParser().parse({ has_parent: { parent_type: 'blog', bogus: {} } }));
      expect(err).toBeInstanceOf(UnrecognizedFieldError);
      expect(err).toHaveProperty('field', 'bogus');
    });

    it('rejects a known field given the wrong shape', () => {
      const err = thrownBy(() => recordingParser().parse({ has_parent: { parent_type: { a: 1 }, query: MATCH_ALL } }));
      expect(err).toBeInstanceOf(MalformedValueError);
      expect(err).toHaveProperty('message', '[has_parent] [parent_type] does not accept [START_OBJECT]');
    });

    it('rejects a query given as a string', () => {
      expect(() => recordingParser().parse({ has_parent: { parent_type: 'blog', query: 'x' } })).toThrow(
        '[has_parent] [query] does not accept [VALUE_STRING]',
      );
    });

    it('rejects a null parent_type', () => {
      expect(() => recordingParser().parse({ has_parent: { parent_type: null, query: MATCH_ALL } })).toThrow(
        '[has_parent] expected a value for [parent_type] but found [VALUE_NULL]',
      );
    });

    it('rejects a non-boolean score', () => {
      expect(() => recordingParser().parse({ has_parent: { parent_type: 'blog', query: MATCH_ALL, score: 'yes' } })).toThrow(
        '[has_parent] expected a boolean for [score] but found [VALUE_STRING]',
      );
    });
  });

  describe('nested query', () => {
    it('wraps failures inside the nested clause', () => {
      const err = thrownBy(() =>
        recordingParser().parse({ has_parent: { parent_type: 'blog', query: { match_all: { bogus: 1 } } } }),
      );
      expect(err).toBeInstanceOf(NestedClauseError);
      expect(err).toHaveProperty(
        'message',
        '[has_parent] failed to parse nested [match_all] clause: [match_all] query does not support [bogus]',
      );
      expect(err).toHaveProperty('cause', expect.any(UnrecognizedFieldError));
    });

    it('reports an unknown nested clause under the parent', () => {
      const err = thrownBy(() => recordingParser().parse({ has_parent: { parent_type: 'blog', query: { nope: {} } } }));
      expect(err).toBeInstanceOf(UnknownClauseError);
      expect(err).toHaveProperty('message', '[has_parent] no query registered for [nope]');
    });

    it('rejects an empty nested query', () => {
      expect(() => recordingParser().parse({ has_parent: { parent_type: 'blog', query: {} } })).toThrow(
        '[has_parent] query malformed, empty clause found',
      );
    });

    it('rejects a second clause inside the query object', () => {
      expect(() =>
        recordingParser().parse({ has_parent: { parent_type: 'blog', query: { match_all: {}, bogus: {} } } }),
      ).toThrow('[has_parent] [match_all] query malformed, expected end_object but found [FIELD_NAME]');
    });

    it('nests has_parent inside has_parent', () => {
      const builder = parseAs(HasParentQueryBuilder, {
        has_parent: {
          parent_type: 'blog',
          query: { has_parent: { parent_type: 'site', query: MATCH_ALL } },
        },
      });
      expect(builder.query).toBeInstanceOf(HasParentQueryBuilder);
      expect(builder.query).toHaveProperty('parentType', 'site');
    });

    it('wraps a missing field of an inner has_parent', () => {
      const err = thrownBy(() =>
        recordingParser().parse({ has_parent: { parent_type: 'blog', query: { has_parent: { query: MATCH_ALL } } } }),
      );
      expect(err).toBeInstanceOf(NestedClauseError);
      expect(err).toHaveProperty(
        'message',
        "[has_parent] failed to parse nested [has_parent] clause: [has_parent] requires 'parent_type' field",
      );
    });
  });

  describe('inner_hits', () => {
    it('reads the inner hits options', () => {
      const builder = parseAs(HasParentQueryBuilder, {
        has_parent: {
          parent_type: 'blog',
          query: MATCH_ALL,
          inner_hits: { name: 'parents', from: 0, size: 3, track_scores: true },
        },
      });
      expect(builder.innerHits).toEqual({ name: 'parents', from: 0, size: 3, trackScores: true });
    });

    it('rejects negative sizes', () => {
      expect(() =>
        recordingParser().parse({ has_parent: { parent_type: 'blog', query: MATCH_ALL, inner_hits: { size: -1 } } }),
      ).toThrow('[inner_hits] [size] must be non-negative but was [-1]');
    });

    it('rejects unknown options', () => {
      const err = thrownBy(() =>
        recordingParser().parse({ has_parent: { parent_type: 'blog', query: MATCH_ALL, inner_hits: { bogus: 1 } } }),
      );
      expect(err).toBeInstanceOf(UnrecognizedFieldError);
      expect(err).toHaveProperty('message', '[inner_hits] query does not support [bogus]');
    });
  });

  describe('toContent', () => {
    it('renders every field', () => {
      const builder = parseAs(HasParentQueryBuilder, {
        has_parent: {
          type: 'blog',
          filter: MATCH_ALL,
          score_mode: 'score',
          _name: 'p',
          inner_hits: { size: 2 },
        },
      });
      expect(builder.toContent()).toEqual({
        has_parent: {
          query: { match_all: { boost: 1 } },
          parent_type: 'blog',
          score: true,
          inner_hits: { size: 2 },
          boost: 1,
          _name: 'p',
        },
      });
    });

    it('renders a document that parses back to the same query', () => {
      const { parse } = recordingParser();
      const first = parse({
        has_parent: { parent_type: 'blog', query: MATCH_ALL, boost: 3, inner_hits: { name: 'n', explain: true } },
      });
      expect(parse(first.toContent()).toContent()).toEqual(first.toContent());
    });
  });

  it('exposes its names and prototype', () => {
    const parser = new HasParentQueryParser();
    expect(parser.names()).toEqual(['has_parent', 'hasParent']);
    expect(parser.getBuilderPrototype().parentType).toBe('');
    expect(parser.getBuilderPrototype().query).toBe(MatchAllQueryBuilder.PROTOTYPE);
  });
});
