import type { ContentObject } from '../types.js';
import type { QueryParseContext } from '../parse/context.js';
import { MalformedValueError } from '../errors.js';
import { parseClauseBody } from '../parse/clause-body.js';
import { ParseField } from '../parse/parse-field.js';

/** Options for returning the matching parent documents alongside each hit. */
export interface InnerHits {
  readonly name?: string;
  readonly from?: number;
  readonly size?: number;
  readonly explain?: boolean;
  readonly version?: boolean;
  readonly trackScores?: boolean;
}

const INNER_HITS = 'inner_hits';

const NAME_FIELD = new ParseField('name');
const FROM_FIELD = new ParseField('from');
const SIZE_FIELD = new ParseField('size');
const EXPLAIN_FIELD = new ParseField('explain');
const VERSION_FIELD = new ParseField('version');
const TRACK_SCORES_FIELD = new ParseField('track_scores');

function nonNegative(field: string, value: number): number {
  if (value < 0) {
    throw new MalformedValueError(INNER_HITS, field, `[${field}] must be non-negative but was [${value}]`);
  }
  return value;
}

/** Reads an inner_hits object. Entered on its START_OBJECT, leaves on its END_OBJECT. */
export function parseInnerHits(context: QueryParseContext): InnerHits {
  const cursor = context.cursor;
  const innerHits: { -readonly [K in keyof InnerHits]: InnerHits[K] } = {};

  parseClauseBody(context, INNER_HITS, {
    fields: [NAME_FIELD, FROM_FIELD, SIZE_FIELD, EXPLAIN_FIELD, VERSION_FIELD, TRACK_SCORES_FIELD],
    onValue: (name, is) => {
      if (is(NAME_FIELD)) {
        innerHits.name = cursor.text();
      } else if (is(FROM_FIELD)) {
        innerHits.from = nonNegative(name, cursor.intValue());
      } else if (is(SIZE_FIELD)) {
        innerHits.size = nonNegative(name, cursor.intValue());
      } else if (is(EXPLAIN_FIELD)) {
        innerHits.explain = cursor.booleanValue();
      } else if (is(VERSION_FIELD)) {
        innerHits.version = cursor.booleanValue();
      } else if (is(TRACK_SCORES_FIELD)) {
        innerHits.trackScores = cursor.booleanValue();
      } else {
        return false;
      }
      return true;
    },
  });

  return Object.freeze(innerHits);
}

export function innerHitsContent(innerHits: InnerHits): ContentObject {
  const content: ContentObject = {};
  if (innerHits.name !== undefined) content['name'] = innerHits.name;
  if (innerHits.from !== undefined) content['from'] = innerHits.from;
  if (innerHits.size !== undefined) content['size'] = innerHits.size;
  if (innerHits.explain !== undefined) content['explain'] = innerHits.explain;
  if (innerHits.version !== undefined) content['version'] = innerHits.version;
  if (innerHits.trackScores !== undefined) content['track_scores'] = innerHits.trackScores;
  return content;
}
