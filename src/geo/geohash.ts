import ngeohash from 'ngeohash';
import type { GeoPoint } from './geo-point.js';
import { MalformedValueError } from '../errors.js';

const GEOHASH_PATTERN = /^[0-9b-hjkmnp-z]{1,12}$/;

export function isValidGeohash(geohash: string): boolean {
  return GEOHASH_PATTERN.test(geohash.toLowerCase());
}

/** Decodes a geohash to the centre of its cell. */
export function decodeGeohash(geohash: string): GeoPoint {
  const normalized = geohash.toLowerCase();
  if (!GEOHASH_PATTERN.test(normalized)) {
    throw new MalformedValueError(null, null, `[${geohash}] is not a valid geohash`);
  }
  const { latitude, longitude } = ngeohash.decode(normalized);
  return { lat: latitude, lon: longitude };
}

export function encodeGeohash(point: GeoPoint, precision = 12): string {
  return ngeohash.encode(point.lat, point.lon, precision);
}
