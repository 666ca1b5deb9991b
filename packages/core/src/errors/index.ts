export class QueryBuilderError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'QueryBuilderError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when a builder or a Separated view is used in a state that does not
 * accept the call, e.g. pushing after `build()`.
 */
export class BuilderStateError extends QueryBuilderError {
  constructor(message: string) {
    super(message, 'BUILDER_STATE');
    this.name = 'BuilderStateError';
  }
}

export class FormatError extends QueryBuilderError {
  constructor(message: string, cause?: Error) {
    super(message, 'FORMAT_ERROR', cause);
    this.name = 'FormatError';
  }
}

export class DialectMismatchError extends QueryBuilderError {
  constructor(public expected: string, public actual: string) {
    super(`Expected a ${expected} query but got ${actual}`, 'DIALECT_MISMATCH');
    this.name = 'DialectMismatchError';
  }
}

export class EncodeError extends QueryBuilderError {
  constructor(
    message: string,
    public dialect: string,
    public valueType: string,
    cause?: Error,
  ) {
    super(message, 'ENCODE_ERROR', cause);
    this.name = 'EncodeError';
  }
}

export class ParameterLimitError extends QueryBuilderError {
  constructor(public limit: number, public attempted: number, dialect: string) {
    super(
      `${dialect} supports at most ${limit} bind parameters per query, got ${attempted}`,
      'PARAMETER_LIMIT',
    );
    this.name = 'ParameterLimitError';
  }
}

export class ValidationError extends QueryBuilderError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

/**
 * Type name used in error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Date) {
    return 'Date';
  }
  if (value instanceof Uint8Array) {
    return 'bytes';
  }
  return typeof value;
}
