import type { ContentObject, QueryBuilder } from '../types.js';
import { MissingRequiredFieldError } from '../errors.js';
import { AbstractQueryBuilder } from './abstract-query.js';
import type { CommonQueryFields } from './abstract-query.js';
import { innerHitsContent } from './inner-hits.js';
import type { InnerHits } from './inner-hits.js';
import { MatchAllQueryBuilder } from './match-all.js';

export interface HasParentFields extends CommonQueryFields {
  parentType?: string;
  query?: QueryBuilder;
  score?: boolean;
  innerHits?: InnerHits;
}

/**
 * Matches child documents whose parent, of type parentType, matches the
 * nested query. The nested builder belongs to this one alone.
 */
export class HasParentQueryBuilder extends AbstractQueryBuilder {
  static readonly NAME = 'has_parent';
  static readonly DEFAULT_SCORE = false;
  static readonly PROTOTYPE = new HasParentQueryBuilder({
    parentType: '',
    query: MatchAllQueryBuilder.PROTOTYPE,
  });

  readonly parentType: string;
  readonly query: QueryBuilder;
  readonly score: boolean;
  readonly innerHits: InnerHits | null;

  constructor(fields: HasParentFields) {
    super(fields);
    if (fields.parentType === undefined) {
      throw new MissingRequiredFieldError(HasParentQueryBuilder.NAME, 'parent_type');
    }
    if (fields.query === undefined) {
      throw new MissingRequiredFieldError(HasParentQueryBuilder.NAME, 'query');
    }
    this.parentType = fields.parentType;
    this.query = fields.query;
    this.score = fields.score ?? HasParentQueryBuilder.DEFAULT_SCORE;
    this.innerHits = fields.innerHits ?? null;
    Object.freeze(this);
  }

  override getName(): string {
    return HasParentQueryBuilder.NAME;
  }

  protected override bodyContent(): ContentObject {
    const body: ContentObject = {
      query: this.query.toContent(),
      parent_type: this.parentType,
      score: this.score,
    };
    if (this.innerHits !== null) {
      body['inner_hits'] = innerHitsContent(this.innerHits);
    }
    return body;
  }
}
