import { MalformedValueError } from '../errors.js';
import { toUnderscoreCase } from '../parse/parse-field.js';

export type DistanceUnit = 'in' | 'yd' | 'ft' | 'km' | 'nmi' | 'mm' | 'cm' | 'mi' | 'm';

interface DistanceUnitDefinition {
  readonly unit: DistanceUnit;
  readonly meters: number;
  readonly names: readonly string[];
}

// Order matters for suffix matching: "nmi" before "mi", anything ending in "m" before "m".
const UNITS: readonly DistanceUnitDefinition[] = [
  { unit: 'in', meters: 0.0254, names: ['in', 'inch'] },
  { unit: 'yd', meters: 0.9144, names: ['yd', 'yards'] },
  { unit: 'ft', meters: 0.3048, names: ['ft', 'feet'] },
  { unit: 'km', meters: 1000, names: ['km', 'kilometers'] },
  { unit: 'nmi', meters: 1852, names: ['NM', 'nmi', 'nauticalmiles'] },
  { unit: 'mm', meters: 0.001, names: ['mm', 'millimeters'] },
  { unit: 'cm', meters: 0.01, names: ['cm', 'centimeters'] },
  { unit: 'mi', meters: 1609.344, names: ['mi', 'miles'] },
  { unit: 'm', meters: 1, names: ['meters', 'm'] },
];

export const DEFAULT_DISTANCE_UNIT: DistanceUnit = 'm';

export interface Distance {
  readonly value: number;
  readonly unit: DistanceUnit;
}

function definition(unit: DistanceUnit): DistanceUnitDefinition {
  const found = UNITS.find((entry) => entry.unit === unit);
  if (found === undefined) {
    throw new Error(`unknown distance unit [${unit}]`);
  }
  return found;
}

export function distanceUnitFromString(name: string): DistanceUnit {
  const found = UNITS.find((entry) => entry.names.includes(name));
  if (found === undefined) {
    throw new MalformedValueError(null, null, `no distance unit match [${name}]`);
  }
  return found.unit;
}

/**
 * Reads a distance such as "12km" or "3.5". A string without a unit suffix
 * is taken in defaultUnit.
 */
export function parseDistance(text: string, defaultUnit: DistanceUnit): Distance {
  const trimmed = text.trim();
  let amount = trimmed;
  let unit = defaultUnit;
  outer: for (const entry of UNITS) {
    for (const name of entry.names) {
      if (trimmed.endsWith(name)) {
        amount = trimmed.slice(0, trimmed.length - name.length).trim();
        unit = entry.unit;
        break outer;
      }
    }
  }
  const value = Number(amount);
  if (amount === '' || !Number.isFinite(value)) {
    throw new MalformedValueError(null, null, `[${text}] is not a valid distance`);
  }
  return { value, unit };
}

export function toMeters(distance: Distance): number {
  return distance.value * definition(distance.unit).meters;
}

export type GeoDistanceType = 'plane' | 'factor' | 'arc' | 'sloppy_arc';

const GEO_DISTANCE_TYPES: readonly GeoDistanceType[] = ['plane', 'factor', 'arc', 'sloppy_arc'];

export const DEFAULT_GEO_DISTANCE: GeoDistanceType = 'sloppy_arc';

/** Accepts any letter case and camelCase, e.g. "sloppyArc". */
export function geoDistanceFromString(name: string): GeoDistanceType {
  const lower = toUnderscoreCase(name).toLowerCase();
  const found = GEO_DISTANCE_TYPES.find((type) => type === lower);
  if (found === undefined) {
    throw new MalformedValueError(null, null, `no geo distance type match [${name}]`);
  }
  return found;
}
