import type { DeprecationNotice } from '../types.js';
import { DeprecatedFieldError } from '../errors.js';

export interface FieldSpelling {
  readonly spelling: string;
  readonly deprecated: boolean;
}

export function toCamelCase(name: string): string {
  return name.replace(/(?<=[^_])_+([a-z0-9])/g, (_match, letter: string) => letter.toUpperCase());
}

export function toUnderscoreCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

function variants(name: string): string[] {
  const underscore = toUnderscoreCase(name);
  const camel = toCamelCase(underscore);
  return underscore === camel ? [underscore] : [underscore, camel];
}

function buildTable(
  name: string,
  deprecatedNames: readonly string[],
  allDeprecated: boolean,
): readonly FieldSpelling[] {
  const table: FieldSpelling[] = [];
  const seen = new Set<string>();
  const add = (spelling: string, deprecated: boolean): void => {
    if (seen.has(spelling)) return;
    seen.add(spelling);
    table.push({ spelling, deprecated });
  };
  for (const spelling of variants(name)) add(spelling, allDeprecated);
  for (const deprecatedName of deprecatedNames) {
    for (const spelling of variants(deprecatedName)) add(spelling, true);
  }
  return Object.freeze(table);
}

/**
 * One logical field and every spelling the DSL accepts for it. Each declared
 * name is accepted in snake_case and camelCase.
 *
 * @example
 * new ParseField('parent_type', 'type')            // "type" is deprecated
 * new ParseField('score_mode').withAllDeprecated('score')
 */
export class ParseField {
  readonly deprecatedNames: readonly string[];
  private readonly table: readonly FieldSpelling[];

  constructor(
    readonly name: string,
    ...deprecatedNames: string[]
  ) {
    this.deprecatedNames = deprecatedNames;
    this.table = buildTable(name, deprecatedNames, false);
  }

  /** Name suggested to authors who used a deprecated spelling. */
  get replacement(): string | null {
    return this.name;
  }

  spellings(): readonly FieldSpelling[] {
    return this.table;
  }

  /**
   * Returns a copy whose spellings are all deprecated. A null replacement
   * marks a setting that no longer has any effect.
   */
  withAllDeprecated(replacement: string | null): ParseField {
    return new AllDeprecatedParseField(this, replacement);
  }
}

class AllDeprecatedParseField extends ParseField {
  private readonly deprecatedTable: readonly FieldSpelling[];

  constructor(
    base: ParseField,
    private readonly replacedWith: string | null,
  ) {
    super(base.name, ...base.deprecatedNames);
    this.deprecatedTable = buildTable(base.name, base.deprecatedNames, true);
  }

  override get replacement(): string | null {
    return this.replacedWith;
  }

  override spellings(): readonly FieldSpelling[] {
    return this.deprecatedTable;
  }
}

function lookup(rawName: string, field: ParseField): FieldSpelling | undefined {
  return field.spellings().find((entry) => entry.spelling === rawName);
}

export function match(rawName: string, field: ParseField): boolean {
  return lookup(rawName, field) !== undefined;
}

export function isDeprecated(rawName: string, field: ParseField): boolean {
  return lookup(rawName, field)?.deprecated === true;
}

export function matchesAny(rawName: string, fields: readonly ParseField[]): boolean {
  return fields.some((field) => match(rawName, field));
}

/**
 * Returns the base name when rawName ends with suffix, e.g.
 * stripSuffix('pin.lat', '.lat') === 'pin'. Returns null otherwise.
 */
export function stripSuffix(rawName: string, suffix: string): string | null {
  if (rawName.length <= suffix.length || !rawName.endsWith(suffix)) {
    return null;
  }
  return rawName.slice(0, rawName.length - suffix.length);
}

export interface FieldMatcherPolicy {
  strict: boolean;
  onDeprecation: (notice: DeprecationNotice) => void;
}

/**
 * Matches raw field names under the caller's policy. Lenient matching
 * accepts deprecated spellings and reports them through onDeprecation;
 * strict matching rejects them.
 */
export class ParseFieldMatcher {
  constructor(private readonly policy: FieldMatcherPolicy) {}

  match(clause: string, rawName: string, field: ParseField): boolean {
    const entry = lookup(rawName, field);
    if (entry === undefined) {
      return false;
    }
    if (entry.deprecated) {
      if (this.policy.strict) {
        throw new DeprecatedFieldError(clause, rawName, field.replacement);
      }
      this.policy.onDeprecation({ clause, field: rawName, replacement: field.replacement });
    }
    return true;
  }
}
