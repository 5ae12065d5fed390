import type { QueryParser } from '../types.js';
import type { QueryParseContext } from '../parse/context.js';
import { coerceBound } from '../content/coerce.js';
import { MalformedValueError, UnrecognizedFieldError } from '../errors.js';
import { distanceUnitFromString, geoDistanceFromString } from '../geo/distance.js';
import { GEOHASH_SUFFIX, LAT_SUFFIX, LON_SUFFIX, parseGeoPoint, parsePointString } from '../geo/geo-point.js';
import { parseClauseBody } from '../parse/clause-body.js';
import { ParseField, matchesAny, stripSuffix, toCamelCase } from '../parse/parse-field.js';
import { GeoDistanceRangeQueryBuilder, OPTIMIZE_BBOX_VALUES } from './geo-distance-range.js';
import type { GeoDistanceRangeFields, OptimizeBbox, PointInput } from './geo-distance-range.js';

const FROM_FIELD = new ParseField('from');
const TO_FIELD = new ParseField('to');
const INCLUDE_LOWER_FIELD = new ParseField('include_lower');
const INCLUDE_UPPER_FIELD = new ParseField('include_upper');
const GT_FIELD = new ParseField('gt');
const GTE_FIELD = new ParseField('gte', 'ge');
const LT_FIELD = new ParseField('lt');
const LTE_FIELD = new ParseField('lte', 'le');
const UNIT_FIELD = new ParseField('unit');
const DISTANCE_TYPE_FIELD = new ParseField('distance_type');
const NAME_FIELD = new ParseField('_name');
const BOOST_FIELD = new ParseField('boost');
const OPTIMIZE_BBOX_FIELD = new ParseField('optimize_bbox');
const COERCE_FIELD = new ParseField('coerce', 'normalize');
const IGNORE_MALFORMED_FIELD = new ParseField('ignore_malformed');

const SETTING_FIELDS: readonly ParseField[] = [
  FROM_FIELD,
  TO_FIELD,
  INCLUDE_LOWER_FIELD,
  INCLUDE_UPPER_FIELD,
  GT_FIELD,
  GTE_FIELD,
  LT_FIELD,
  LTE_FIELD,
  UNIT_FIELD,
  DISTANCE_TYPE_FIELD,
  NAME_FIELD,
  BOOST_FIELD,
  OPTIMIZE_BBOX_FIELD,
  COERCE_FIELD,
  IGNORE_MALFORMED_FIELD,
];

function optimizeBboxFromString(value: string): OptimizeBbox {
  const found = OPTIMIZE_BBOX_VALUES.find((option) => option === value.toLowerCase());
  if (found === undefined) {
    throw new MalformedValueError(
      null,
      'optimize_bbox',
      `[optimize_bbox] must be one of [${OPTIMIZE_BBOX_VALUES.join(', ')}] but was [${value}]`,
    );
  }
  return found;
}

/**
 * Parses geo_distance_range. Any field that is not a setting names the geo
 * point field, and the point may be given in several shapes:
 *
 * ```json
 * { "pin": [-70.0, 40.0] }
 * { "pin": { "lat": 40.0, "lon": -70.0 } }
 * { "pin": "40.0,-70.0" }
 * { "pin": "drm3btev3e86" }
 * { "pin.lat": 40.0, "pin.lon": -70.0 }
 * { "pin.geohash": "drm3btev3e86" }
 * ```
 *
 * Whichever shape comes last wins.
 */
export class GeoDistanceRangeQueryParser implements QueryParser<GeoDistanceRangeQueryBuilder> {
  names(): readonly string[] {
    return [GeoDistanceRangeQueryBuilder.NAME, toCamelCase(GeoDistanceRangeQueryBuilder.NAME)];
  }

  getBuilderPrototype(): GeoDistanceRangeQueryBuilder {
    return GeoDistanceRangeQueryBuilder.PROTOTYPE;
  }

  fromContent(context: QueryParseContext): GeoDistanceRangeQueryBuilder {
    const clause = GeoDistanceRangeQueryBuilder.NAME;
    const cursor = context.cursor;
    const fields: GeoDistanceRangeFields = {};

    // One point field per clause.
    const checkPointField = (name: string): void => {
      if (fields.fieldName !== undefined && fields.fieldName !== name) {
        throw new UnrecognizedFieldError(clause, name);
      }
    };

    const bindPointField = (name: string, point: PointInput): void => {
      checkPointField(name);
      fields.fieldName = name;
      fields.point = point;
    };

    // .lat and .lon halves of the same field combine; any other shape replaces the point.
    const setHalf = (base: string, half: 'lat' | 'lon', value: number): void => {
      const previous = fields.fieldName === base && fields.point?.kind === 'partial' ? fields.point : undefined;
      const partial: { kind: 'partial'; lat?: number; lon?: number } = { ...previous, kind: 'partial' };
      if (half === 'lat') {
        partial.lat = value;
      } else {
        partial.lon = value;
      }
      bindPointField(base, partial);
    };

    const readPointValue = (name: string): boolean => {
      const latBase = stripSuffix(name, LAT_SUFFIX);
      if (latBase !== null) {
        checkPointField(latBase);
        setHalf(latBase, 'lat', cursor.numberValue());
        return true;
      }
      const lonBase = stripSuffix(name, LON_SUFFIX);
      if (lonBase !== null) {
        checkPointField(lonBase);
        setHalf(lonBase, 'lon', cursor.numberValue());
        return true;
      }
      const geohashBase = stripSuffix(name, GEOHASH_SUFFIX);
      if (geohashBase !== null) {
        checkPointField(geohashBase);
        bindPointField(geohashBase, { kind: 'geohash', geohash: cursor.text() });
        return true;
      }
      if (cursor.currentToken() !== 'VALUE_STRING') {
        return false;
      }
      checkPointField(name);
      bindPointField(name, { kind: 'point', ...parsePointString(cursor.text()) });
      return true;
    };

    const readWholePoint = (name: string): boolean => {
      if (matchesAny(name, SETTING_FIELDS)) {
        return false;
      }
      checkPointField(name);
      bindPointField(name, { kind: 'point', ...parseGeoPoint(cursor, clause, name) });
      return true;
    };

    parseClauseBody(context, clause, {
      fields: SETTING_FIELDS,
      skipDeprecatedSettings: true,
      onArray: readWholePoint,
      onObject: readWholePoint,
      onValue: (name, is) => {
        if (is(FROM_FIELD)) {
          const bound = coerceBound(cursor);
          if (bound !== undefined) fields.from = bound;
        } else if (is(TO_FIELD)) {
          const bound = coerceBound(cursor);
          if (bound !== undefined) fields.to = bound;
        } else if (is(INCLUDE_LOWER_FIELD)) {
          fields.includeLower = cursor.booleanValue();
        } else if (is(INCLUDE_UPPER_FIELD)) {
          fields.includeUpper = cursor.booleanValue();
        } else if (is(GT_FIELD)) {
          const bound = coerceBound(cursor);
          if (bound !== undefined) fields.from = bound;
          fields.includeLower = false;
        } else if (is(GTE_FIELD)) {
          const bound = coerceBound(cursor);
          if (bound !== undefined) fields.from = bound;
          fields.includeLower = true;
        } else if (is(LT_FIELD)) {
          const bound = coerceBound(cursor);
          if (bound !== undefined) fields.to = bound;
          fields.includeUpper = false;
        } else if (is(LTE_FIELD)) {
          const bound = coerceBound(cursor);
          if (bound !== undefined) fields.to = bound;
          fields.includeUpper = true;
        } else if (is(UNIT_FIELD)) {
          fields.unit = distanceUnitFromString(cursor.text());
        } else if (is(DISTANCE_TYPE_FIELD)) {
          fields.distanceType = geoDistanceFromString(cursor.text());
        } else if (is(NAME_FIELD)) {
          fields.queryName = cursor.text();
        } else if (is(BOOST_FIELD)) {
          fields.boost = cursor.floatValue();
        } else if (is(OPTIMIZE_BBOX_FIELD)) {
          const optimizeBbox = cursor.textOrNull();
          if (optimizeBbox !== null) fields.optimizeBbox = optimizeBboxFromString(optimizeBbox);
        } else if (is(COERCE_FIELD)) {
          fields.coerce = cursor.booleanValue();
        } else if (is(IGNORE_MALFORMED_FIELD)) {
          fields.ignoreMalformed = cursor.booleanValue();
        } else {
          return readPointValue(name);
        }
        return true;
      },
    });

    return new GeoDistanceRangeQueryBuilder(fields);
  }
}
