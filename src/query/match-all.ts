import type { ContentObject } from '../types.js';
import { AbstractQueryBuilder } from './abstract-query.js';
import type { CommonQueryFields } from './abstract-query.js';

/** Matches every document. The leaf most nested clauses bottom out on. */
export class MatchAllQueryBuilder extends AbstractQueryBuilder {
  static readonly NAME = 'match_all';
  static readonly PROTOTYPE = new MatchAllQueryBuilder();

  constructor(fields: CommonQueryFields = {}) {
    super(fields);
    Object.freeze(this);
  }

  override getName(): string {
    return MatchAllQueryBuilder.NAME;
  }

  protected override bodyContent(): ContentObject {
    return {};
  }
}
