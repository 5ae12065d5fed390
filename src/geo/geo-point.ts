import type { TokenCursor } from '../types.js';
import { IncompleteCompositeError, MalformedValueError, UnrecognizedFieldError } from '../errors.js';
import { decodeGeohash } from './geohash.js';

export interface GeoPoint {
  readonly lat: number;
  readonly lon: number;
}

export const LAT_SUFFIX = '.lat';
export const LON_SUFFIX = '.lon';
export const GEOHASH_SUFFIX = '.geohash';

const LAT_KEYS = new Set(['lat', 'latitude']);
const LON_KEYS = new Set(['lon', 'longitude']);
const GEOHASH_KEY = 'geohash';

function endOfContent(field: string): MalformedValueError {
  return new MalformedValueError(null, field, `unexpected end of content while reading point [${field}]`);
}

/**
 * Reads `[lon, lat]` or `[lon, lat, altitude]`. Anything after the
 * longitude and latitude is skipped.
 */
function parseArrayPoint(cursor: TokenCursor, clause: string, field: string): GeoPoint {
  const coordinates: number[] = [];
  for (;;) {
    const token = cursor.nextToken();
    if (token === null) throw endOfContent(field);
    if (token === 'END_ARRAY') break;
    if (coordinates.length >= 2) {
      cursor.skipChildren();
      continue;
    }
    if (token !== 'VALUE_NUMBER') {
      throw new MalformedValueError(clause, field, `numeric value expected in point [${field}] but found [${token}]`);
    }
    coordinates.push(cursor.numberValue());
  }
  const [lon, lat] = coordinates;
  if (lon === undefined) {
    throw new IncompleteCompositeError(clause, field, 'lon');
  }
  if (lat === undefined) {
    throw new IncompleteCompositeError(clause, field, 'lat');
  }
  return { lat, lon };
}

/** Reads `{ lat, lon }` (or latitude/longitude) or `{ geohash }`. */
function parseObjectPoint(cursor: TokenCursor, clause: string, field: string): GeoPoint {
  let lat: number | undefined;
  let lon: number | undefined;
  let geohash: string | undefined;
  for (;;) {
    const token = cursor.nextToken();
    if (token === null) throw endOfContent(field);
    if (token === 'END_OBJECT') break;
    if (token !== 'FIELD_NAME') {
      throw new MalformedValueError(clause, field, `unexpected token [${token}] in point [${field}]`);
    }
    const key = cursor.currentName() ?? '';
    if (cursor.nextToken() === null) throw endOfContent(field);
    if (LAT_KEYS.has(key)) {
      lat = cursor.numberValue();
    } else if (LON_KEYS.has(key)) {
      lon = cursor.numberValue();
    } else if (key === GEOHASH_KEY) {
      geohash = cursor.text();
    } else {
      throw new UnrecognizedFieldError(clause, `${field}.${key}`);
    }
  }

  if (geohash !== undefined) {
    if (lat !== undefined || lon !== undefined) {
      throw new MalformedValueError(clause, field, `point [${field}] must be given either as lat/lon or as a geohash, not both`);
    }
    return decodeGeohash(geohash);
  }
  if (lat === undefined) {
    throw new IncompleteCompositeError(clause, field, 'lat');
  }
  if (lon === undefined) {
    throw new IncompleteCompositeError(clause, field, 'lon');
  }
  return { lat, lon };
}

/** Reads `"lat,lon"` or a geohash. */
export function parsePointString(text: string): GeoPoint {
  const comma = text.indexOf(',');
  if (comma === -1) {
    return decodeGeohash(text.trim());
  }
  const latText = text.slice(0, comma).trim();
  const lonText = text.slice(comma + 1).trim();
  const lat = Number(latText);
  const lon = Number(lonText);
  if (latText === '' || lonText === '' || !Number.isFinite(lat) || !Number.isFinite(lon)) {
    throw new MalformedValueError(null, null, `[${text}] is not a valid "lat,lon" point`);
  }
  return { lat, lon };
}

/**
 * Reads a whole point from whichever shape the cursor is on: an array, an
 * object or a string. Leaves the cursor on the last token of the point.
 */
export function parseGeoPoint(cursor: TokenCursor, clause: string, field: string): GeoPoint {
  switch (cursor.currentToken()) {
    case 'START_ARRAY':
      return parseArrayPoint(cursor, clause, field);
    case 'START_OBJECT':
      return parseObjectPoint(cursor, clause, field);
    case 'VALUE_STRING':
      return parsePointString(cursor.text());
    default:
      throw new MalformedValueError(
        clause,
        field,
        `point [${field}] must be an array, an object or a string but found [${cursor.currentToken() ?? 'end of content'}]`,
      );
  }
}

function centeredModulus(dividend: number, divisor: number): number {
  let result = dividend % divisor;
  if (result <= 0) result += divisor;
  if (result > divisor / 2) result -= divisor;
  return result;
}

export function normalizeLon(lon: number): number {
  return lon >= -180 && lon <= 180 ? lon : centeredModulus(lon, 360);
}

/**
 * Wraps out-of-range coordinates back onto the globe. Latitudes past a pole
 * fold back and move the longitude half way round.
 */
export function normalizePoint(point: GeoPoint, normLat = true, normLon = true): GeoPoint {
  let { lat, lon } = point;
  const fixLat = normLat && (lat > 90 || lat < -90);
  const fixLon = normLon && (lon > 180 || lon < -180);

  if (fixLat) {
    lat = centeredModulus(lat, 360);
    let shift = true;
    if (lat < -90) {
      lat = -180 - lat;
    } else if (lat > 90) {
      lat = 180 - lat;
    } else {
      shift = false;
    }
    if (shift) {
      if (fixLon) {
        lon += 180;
      } else {
        // keep lon in the x + k*360 form the caller gave it
        lon += normalizeLon(lon) > 0 ? -180 : 180;
      }
    }
  }
  if (fixLon) {
    lon = centeredModulus(lon, 360);
  }
  return { lat, lon };
}

export function isValidLat(lat: number): boolean {
  return Number.isFinite(lat) && lat >= -90 && lat <= 90;
}

export function isValidLon(lon: number): boolean {
  return Number.isFinite(lon) && lon >= -180 && lon <= 180;
}
