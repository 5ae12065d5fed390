import type { QueryParser } from '../types.js';
import type { QueryParseContext } from '../parse/context.js';
import { parseClauseBody } from '../parse/clause-body.js';
import { ParseField, toCamelCase } from '../parse/parse-field.js';
import type { CommonQueryFields } from './abstract-query.js';
import { MatchAllQueryBuilder } from './match-all.js';

const BOOST_FIELD = new ParseField('boost');
const NAME_FIELD = new ParseField('_name');

export class MatchAllQueryParser implements QueryParser<MatchAllQueryBuilder> {
  names(): readonly string[] {
    return [MatchAllQueryBuilder.NAME, toCamelCase(MatchAllQueryBuilder.NAME)];
  }

  getBuilderPrototype(): MatchAllQueryBuilder {
    return MatchAllQueryBuilder.PROTOTYPE;
  }

  fromContent(context: QueryParseContext): MatchAllQueryBuilder {
    const cursor = context.cursor;
    const fields: CommonQueryFields = {};

    parseClauseBody(context, MatchAllQueryBuilder.NAME, {
      fields: [BOOST_FIELD, NAME_FIELD],
      onValue: (_name, is) => {
        if (is(BOOST_FIELD)) {
          fields.boost = cursor.floatValue();
        } else if (is(NAME_FIELD)) {
          fields.queryName = cursor.text();
        } else {
          return false;
        }
        return true;
      },
    });

    return new MatchAllQueryBuilder(fields);
  }
}
