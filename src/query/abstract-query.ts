import type { ContentObject, QueryBuilder } from '../types.js';

export const DEFAULT_BOOST = 1;

/** Settings every clause accepts. */
export interface CommonQueryFields {
  boost?: number;
  queryName?: string;
}

/**
 * Base for all builders. Subclasses assign their own fields and then
 * freeze the instance, so a builder never changes after construction.
 */
export abstract class AbstractQueryBuilder implements QueryBuilder {
  readonly boost: number;
  readonly queryName: string | null;

  protected constructor(common: CommonQueryFields) {
    this.boost = common.boost ?? DEFAULT_BOOST;
    this.queryName = common.queryName ?? null;
  }

  abstract getName(): string;

  /** Clause-specific body fields, without boost and _name. */
  protected abstract bodyContent(): ContentObject;

  toContent(): ContentObject {
    const body: ContentObject = { ...this.bodyContent(), boost: this.boost };
    if (this.queryName !== null) {
      body['_name'] = this.queryName;
    }
    return { [this.getName()]: body };
  }
}
