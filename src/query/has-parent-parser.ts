import type { QueryParser } from '../types.js';
import type { QueryParseContext } from '../parse/context.js';
import { parseClauseBody } from '../parse/clause-body.js';
import { ParseField, toCamelCase } from '../parse/parse-field.js';
import { HasParentQueryBuilder } from './has-parent.js';
import type { HasParentFields } from './has-parent.js';
import { parseInnerHits } from './inner-hits.js';

const QUERY_FIELD = new ParseField('query', 'filter');
const SCORE_MODE_FIELD = new ParseField('score_type', 'score_mode').withAllDeprecated('score');
const TYPE_FIELD = new ParseField('parent_type', 'type');
const SCORE_FIELD = new ParseField('score');
const INNER_HITS_FIELD = new ParseField('inner_hits');
const BOOST_FIELD = new ParseField('boost');
const NAME_FIELD = new ParseField('_name');

const FIELDS: readonly ParseField[] = [
  QUERY_FIELD,
  SCORE_MODE_FIELD,
  TYPE_FIELD,
  SCORE_FIELD,
  INNER_HITS_FIELD,
  BOOST_FIELD,
  NAME_FIELD,
];

/**
 * Parses has_parent:
 *
 * ```json
 * { "parent_type": "blog", "query": { "match_all": {} }, "score": true }
 * ```
 */
export class HasParentQueryParser implements QueryParser<HasParentQueryBuilder> {
  names(): readonly string[] {
    return [HasParentQueryBuilder.NAME, toCamelCase(HasParentQueryBuilder.NAME)];
  }

  getBuilderPrototype(): HasParentQueryBuilder {
    return HasParentQueryBuilder.PROTOTYPE;
  }

  fromContent(context: QueryParseContext): HasParentQueryBuilder {
    const cursor = context.cursor;
    const fields: HasParentFields = {};

    parseClauseBody(context, HasParentQueryBuilder.NAME, {
      fields: FIELDS,
      onObject: (_name, is) => {
        if (is(QUERY_FIELD)) {
          fields.query = context.parseInnerQueryBuilder(HasParentQueryBuilder.NAME);
        } else if (is(INNER_HITS_FIELD)) {
          fields.innerHits = parseInnerHits(context);
        } else {
          return false;
        }
        return true;
      },
      onValue: (_name, is) => {
        if (is(TYPE_FIELD)) {
          fields.parentType = cursor.text();
        } else if (is(SCORE_MODE_FIELD)) {
          // Legacy values other than "score" and "none", null included, leave score as it is.
          const scoreMode = cursor.textOrNull();
          if (scoreMode === 'score') {
            fields.score = true;
          } else if (scoreMode === 'none') {
            fields.score = false;
          }
        } else if (is(SCORE_FIELD)) {
          fields.score = cursor.booleanValue();
        } else if (is(BOOST_FIELD)) {
          fields.boost = cursor.floatValue();
        } else if (is(NAME_FIELD)) {
          fields.queryName = cursor.text();
        } else {
          return false;
        }
        return true;
      },
    });

    return new HasParentQueryBuilder(fields);
  }
}
