export class MetaQueryError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'MetaQueryError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The target dialect cannot express something the model asks for.
 * Callers usually react by picking another policy.
 */
export class UnsupportedConstructError extends MetaQueryError {
  constructor(public readonly feature: string, public readonly dialect?: string) {
    super(
      dialect
        ? `Construct "${feature}" is not supported by dialect "${dialect}"`
        : `Construct "${feature}" is not supported`,
      'UNSUPPORTED_CONSTRUCT',
    );
    this.name = 'UnsupportedConstructError';
  }
}

/**
 * The query model itself is malformed and must be fixed before it can render.
 */
export class QueryModelError extends MetaQueryError {
  constructor(message: string, code?: string, cause?: Error) {
    super(message, code, cause);
    this.name = 'QueryModelError';
  }
}

export class DuplicateJoinPathError extends QueryModelError {
  constructor(public readonly tableA: string, public readonly tableB: string) {
    super(`Additional join condition found between "${tableA}" and "${tableB}"`, 'DUPLICATE_JOIN_PATH');
    this.name = 'DuplicateJoinPathError';
  }
}

export class UnreachableJoinPathError extends QueryModelError {
  constructor(public readonly tableA: string, public readonly tableB: string) {
    super(`No join path found from "${tableA}" to "${tableB}"`, 'UNREACHABLE_JOIN_PATH');
    this.name = 'UnreachableJoinPathError';
  }
}

export class InvalidQueryModelError extends QueryModelError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'INVALID_QUERY_MODEL');
    this.name = 'InvalidQueryModelError';
  }
}

export class DialectNotFoundError extends MetaQueryError {
  constructor(public readonly dialect: string) {
    super(
      `No dialect policy registered for "${dialect}". ` +
        `Make sure you've imported the dialect package.`,
      'DIALECT_NOT_FOUND',
    );
    this.name = 'DialectNotFoundError';
  }
}

export class DialectConfigurationError extends MetaQueryError {
  constructor(message: string) {
    super(message, 'DIALECT_CONFIGURATION');
    this.name = 'DialectConfigurationError';
  }
}

export function isUnsupportedConstruct(error: unknown): error is UnsupportedConstructError {
  return error instanceof UnsupportedConstructError;
}

export function isQueryModelError(error: unknown): error is QueryModelError {
  return error instanceof QueryModelError;
}
