function prefixed(clause: string | null, message: string): string {
  return clause === null ? message : `[${clause}] ${message}`;
}

/** Base class for every error raised while parsing a query clause. */
export class QueryParsingError extends Error {
  override readonly name: string = 'QueryParsingError';

  constructor(
    readonly clause: string | null,
    message: string,
    override readonly cause?: unknown,
  ) {
    super(prefixed(clause, message));
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnrecognizedFieldError extends QueryParsingError {
  override readonly name = 'UnrecognizedFieldError';

  constructor(
    clause: string,
    readonly field: string,
  ) {
    super(clause, `query does not support [${field}]`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedValueError extends QueryParsingError {
  override readonly name = 'MalformedValueError';

  constructor(
    clause: string | null,
    readonly field: string | null,
    readonly reason: string,
  ) {
    super(clause, reason);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Re-raises a cursor-level error under the clause that was being parsed. */
  withClause(clause: string): MalformedValueError {
    return new MalformedValueError(clause, this.field, this.reason);
  }
}

export class MissingRequiredFieldError extends QueryParsingError {
  override readonly name = 'MissingRequiredFieldError';

  constructor(
    clause: string,
    readonly field: string,
  ) {
    super(clause, `requires '${field}' field`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class IncompleteCompositeError extends QueryParsingError {
  override readonly name = 'IncompleteCompositeError';

  constructor(
    clause: string,
    readonly field: string,
    readonly missing: 'lat' | 'lon',
  ) {
    super(clause, `point [${field}] is missing its [${missing}] value`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NestedClauseError extends QueryParsingError {
  override readonly name = 'NestedClauseError';

  constructor(
    clause: string,
    readonly nestedClause: string,
    override readonly cause: QueryParsingError,
  ) {
    super(clause, `failed to parse nested [${nestedClause}] clause: ${cause.message}`, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DeprecatedFieldError extends QueryParsingError {
  override readonly name = 'DeprecatedFieldError';

  constructor(
    clause: string,
    readonly field: string,
    readonly replacement: string | null,
  ) {
    super(
      clause,
      replacement === null
        ? `Deprecated field [${field}] used, it no longer has any effect`
        : `Deprecated field [${field}] used, expected [${replacement}] instead`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownClauseError extends QueryParsingError {
  override readonly name = 'UnknownClauseError';

  constructor(
    clause: string | null,
    readonly requested: string,
  ) {
    super(clause, `no query registered for [${requested}]`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
