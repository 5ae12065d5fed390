import type { ContentObject, ContentValue } from '../types.js';
import type { BoundValue } from '../content/coerce.js';
import {
  IncompleteCompositeError,
  MalformedValueError,
  MissingRequiredFieldError,
  QueryParsingError,
} from '../errors.js';
import {
  DEFAULT_DISTANCE_UNIT,
  DEFAULT_GEO_DISTANCE,
  parseDistance,
  toMeters,
} from '../geo/distance.js';
import type { DistanceUnit, GeoDistanceType } from '../geo/distance.js';
import { GEOHASH_SUFFIX, isValidLat, isValidLon, normalizePoint } from '../geo/geo-point.js';
import type { GeoPoint } from '../geo/geo-point.js';
import { decodeGeohash, isValidGeohash } from '../geo/geohash.js';
import { AbstractQueryBuilder } from './abstract-query.js';
import type { CommonQueryFields } from './abstract-query.js';

export type OptimizeBbox = 'memory' | 'indexed' | 'none';

export const OPTIMIZE_BBOX_VALUES: readonly OptimizeBbox[] = ['memory', 'indexed', 'none'];

/**
 * A point as the parser accumulated it. `partial` points come from
 * suffixed `.lat` / `.lon` fields and may still lack one half.
 */
export type PointInput =
  | { kind: 'point'; lat: number; lon: number }
  | { kind: 'partial'; lat?: number; lon?: number }
  | { kind: 'geohash'; geohash: string };

/** A validated point. Geohashes are kept as given and decoded on demand. */
export type GeoPointValue =
  | { readonly kind: 'point'; readonly lat: number; readonly lon: number }
  | { readonly kind: 'geohash'; readonly geohash: string };

export interface GeoDistanceRangeFields extends CommonQueryFields {
  fieldName?: string;
  point?: PointInput;
  from?: BoundValue;
  to?: BoundValue;
  includeLower?: boolean;
  includeUpper?: boolean;
  unit?: DistanceUnit;
  distanceType?: GeoDistanceType;
  optimizeBbox?: OptimizeBbox;
  coerce?: boolean;
  ignoreMalformed?: boolean;
}

const NAME = 'geo_distance_range';

function resolvePointInput(
  fieldName: string,
  input: PointInput,
  coerce: boolean,
  ignoreMalformed: boolean,
): GeoPointValue {
  if (input.kind === 'geohash') {
    if (!isValidGeohash(input.geohash)) {
      throw new MalformedValueError(NAME, fieldName, `[${input.geohash}] is not a valid geohash for [${fieldName}]`);
    }
    const hashed: GeoPointValue = { kind: 'geohash', geohash: input.geohash };
    return Object.freeze(hashed);
  }
  if (input.lat === undefined) {
    throw new IncompleteCompositeError(NAME, fieldName, 'lat');
  }
  if (input.lon === undefined) {
    throw new IncompleteCompositeError(NAME, fieldName, 'lon');
  }

  let point: GeoPoint = { lat: input.lat, lon: input.lon };
  if (coerce) {
    point = normalizePoint(point);
  } else if (!ignoreMalformed) {
    if (!isValidLat(point.lat)) {
      throw new MalformedValueError(NAME, fieldName, `illegal latitude value [${point.lat}] for [${fieldName}]`);
    }
    if (!isValidLon(point.lon)) {
      throw new MalformedValueError(NAME, fieldName, `illegal longitude value [${point.lon}] for [${fieldName}]`);
    }
  }
  const value: GeoPointValue = { kind: 'point', lat: point.lat, lon: point.lon };
  return Object.freeze(value);
}

function checkBound(field: string, bound: BoundValue | undefined, unit: DistanceUnit): BoundValue | null {
  if (bound === undefined) {
    return null;
  }
  if (typeof bound === 'number') {
    if (!Number.isFinite(bound)) {
      throw new MalformedValueError(NAME, field, `[${field}] must be a finite number but was [${bound}]`);
    }
    return bound;
  }
  try {
    parseDistance(bound, unit);
  } catch (err) {
    if (err instanceof QueryParsingError) {
      throw new MalformedValueError(NAME, field, `[${field}] ${err.message}`);
    }
    throw err;
  }
  return bound;
}

function boundInMeters(bound: BoundValue | null, unit: DistanceUnit): number | null {
  if (bound === null) return null;
  return toMeters(typeof bound === 'number' ? { value: bound, unit } : parseDistance(bound, unit));
}

/**
 * Matches documents whose geo point lies between two distances of a
 * central point. Bounds are kept as given, numbers or unit-bearing text,
 * and converted through fromMeters() / toMeters().
 */
export class GeoDistanceRangeQueryBuilder extends AbstractQueryBuilder {
  static readonly NAME = NAME;
  static readonly DEFAULT_INCLUDE_LOWER = true;
  static readonly DEFAULT_INCLUDE_UPPER = true;
  static readonly DEFAULT_OPTIMIZE_BBOX: OptimizeBbox = 'memory';
  static readonly PROTOTYPE = new GeoDistanceRangeQueryBuilder({
    fieldName: '_na_',
    point: { kind: 'point', lat: 0, lon: 0 },
  });

  readonly fieldName: string;
  readonly point: GeoPointValue;
  readonly from: BoundValue | null;
  readonly to: BoundValue | null;
  readonly includeLower: boolean;
  readonly includeUpper: boolean;
  readonly unit: DistanceUnit;
  readonly distanceType: GeoDistanceType;
  readonly optimizeBbox: OptimizeBbox;
  readonly coerce: boolean;
  readonly ignoreMalformed: boolean;

  constructor(fields: GeoDistanceRangeFields) {
    super(fields);
    if (fields.fieldName === undefined || fields.fieldName === '' || fields.point === undefined) {
      throw new MissingRequiredFieldError(NAME, 'point');
    }
    this.fieldName = fields.fieldName;
    this.coerce = fields.coerce ?? false;
    this.ignoreMalformed = fields.ignoreMalformed ?? false;
    this.point = resolvePointInput(fields.fieldName, fields.point, this.coerce, this.ignoreMalformed);
    this.unit = fields.unit ?? DEFAULT_DISTANCE_UNIT;
    this.from = checkBound('from', fields.from, this.unit);
    this.to = checkBound('to', fields.to, this.unit);
    this.includeLower = fields.includeLower ?? GeoDistanceRangeQueryBuilder.DEFAULT_INCLUDE_LOWER;
    this.includeUpper = fields.includeUpper ?? GeoDistanceRangeQueryBuilder.DEFAULT_INCLUDE_UPPER;
    this.distanceType = fields.distanceType ?? DEFAULT_GEO_DISTANCE;
    this.optimizeBbox = fields.optimizeBbox ?? GeoDistanceRangeQueryBuilder.DEFAULT_OPTIMIZE_BBOX;
    Object.freeze(this);
  }

  /** The central point, decoding a geohash on first need. */
  resolvePoint(): GeoPoint {
    if (this.point.kind === 'geohash') {
      return decodeGeohash(this.point.geohash);
    }
    return { lat: this.point.lat, lon: this.point.lon };
  }

  /** Lower bound in meters, or null when unbounded. */
  fromMeters(): number | null {
    return boundInMeters(this.from, this.unit);
  }

  /** Upper bound in meters, or null when unbounded. */
  toMeters(): number | null {
    return boundInMeters(this.to, this.unit);
  }

  override getName(): string {
    return NAME;
  }

  protected override bodyContent(): ContentObject {
    const body: ContentObject = {};
    if (this.point.kind === 'geohash') {
      body[`${this.fieldName}${GEOHASH_SUFFIX}`] = this.point.geohash;
    } else {
      const coordinates: ContentValue[] = [this.point.lon, this.point.lat];
      body[this.fieldName] = coordinates;
    }
    if (this.from !== null) body['from'] = this.from;
    if (this.to !== null) body['to'] = this.to;
    body['include_lower'] = this.includeLower;
    body['include_upper'] = this.includeUpper;
    body['unit'] = this.unit;
    body['distance_type'] = this.distanceType;
    body['optimize_bbox'] = this.optimizeBbox;
    body['coerce'] = this.coerce;
    body['ignore_malformed'] = this.ignoreMalformed;
    return body;
  }
}
