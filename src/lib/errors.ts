/**
 * Error classes for the ORM core
 *
 * Every error raised by the core derives from DALError and carries a stable
 * `code` so callers can branch without string-matching messages.
 */

export interface PostgresError extends Error {
  code?: string;
  detail?: string;
  constraint?: string;
  column?: string;
}

/**
 * Base DAL error class
 */
export class DALError extends Error {
  code: string | null;

  constructor(message: string, code: string | null = null) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Record not found error
 */
export class RecordNotFoundError extends DALError {
  constructor(message = 'Record not found') {
    super(message, 'RECORD_NOT_FOUND');
    this.name = 'RecordNotFoundError';
  }
}

/**
 * Validation error
 */
export class ValidationError extends DALError {
  field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Connection error
 */
export class ConnectionError extends DALError {
  constructor(message = 'Database connection error') {
    super(message, 'CONNECTION_ERROR');
    this.name = 'ConnectionError';
  }
}

/**
 * Transaction error
 */
export class TransactionError extends DALError {
  constructor(message = 'Transaction error') {
    super(message, 'TRANSACTION_ERROR');
    this.name = 'TransactionError';
  }
}

/**
 * Query error
 */
export class QueryError extends DALError {
  originalError: unknown;
  sql: string | null;
  parameters: unknown[];

  constructor(message: string, originalError: unknown = null) {
    super(message, 'QUERY_ERROR');
    this.name = 'QueryError';
    this.originalError = originalError;
    this.sql = null;
    this.parameters = [];
  }
}

/**
 * Constraint violation error
 */
export class ConstraintError extends DALError {
  constraint: string | null;

  constructor(message: string, constraint: string | null = null) {
    super(message, 'CONSTRAINT_ERROR');
    this.name = 'ConstraintError';
    this.constraint = constraint;
  }
}

/**
 * Raised while inferring relations from the registered model set. Always
 * fatal: the model set has to be fixed before the application can start.
 */
export class DiscoveryError extends DALError {
  constructor(message: string, code = 'DISCOVERY_ERROR') {
    super(message, code);
    this.name = 'DiscoveryError';
  }
}

/**
 * Two or more candidate property pairs between the same types could not be
 * told apart by a link identifier.
 */
export class DiscoveryAmbiguityError extends DiscoveryError {
  localType: string;
  foreignType: string;
  properties: string[];

  constructor(message: string, localType: string, foreignType: string, properties: string[] = []) {
    super(message, 'DISCOVERY_AMBIGUITY');
    this.name = 'DiscoveryAmbiguityError';
    this.localType = localType;
    this.foreignType = foreignType;
    this.properties = properties;
  }
}

/**
 * A relation property points at a type that is not part of the model set.
 */
export class UnknownModelError extends DiscoveryError {
  modelName: string;

  constructor(modelName: string, message = `Model '${modelName}' is not registered`) {
    super(message, 'UNKNOWN_MODEL');
    this.name = 'UnknownModelError';
    this.modelName = modelName;
  }
}

/**
 * A single-result accessor saw zero or several rows.
 */
export class CardinalityError extends DALError {
  expected: string;
  actual: number;

  constructor(message: string, expected: string, actual: number) {
    super(message, 'CARDINALITY_ERROR');
    this.name = 'CardinalityError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A raw driver value could not be converted to the property's type.
 */
export class TypeCoercionError extends DALError {
  field: string;
  value: unknown;

  constructor(message: string, field: string, value: unknown) {
    super(message, 'TYPE_COERCION_ERROR');
    this.name = 'TypeCoercionError';
    this.field = field;
    this.value = value;
  }
}

/**
 * Malformed predicate or assignment expression.
 */
export class ExpressionSyntaxError extends DALError {
  position: number;

  constructor(message: string, position = -1) {
    super(position >= 0 ? `${message} (at position ${position})` : message, 'EXPRESSION_SYNTAX');
    this.name = 'ExpressionSyntaxError';
    this.position = position;
  }
}

const isPostgresError = (value: unknown): value is PostgresError =>
  value instanceof Error || (typeof value === 'object' && value !== null && 'message' in value);

/**
 * Convert PostgreSQL errors to DAL errors
 * @param pgError - PostgreSQL error
 * @returns Converted DAL error
 */
export function convertPostgreSQLError(pgError: unknown): DALError {
  if (pgError instanceof DALError) {
    return pgError;
  }

  if (!isPostgresError(pgError)) {
    return new DALError('Unknown error');
  }

  const error = pgError;
  const message = typeof error.message === 'string' ? error.message : 'Unknown error';

  // PostgreSQL error codes: https://www.postgresql.org/docs/current/errcodes-appendix.html
  switch (error.code) {
    case '23505': // unique_violation
      return new ConstraintError(
        `Unique constraint violation: ${error.detail ?? message}`,
        error.constraint ?? null
      );

    case '23503': // foreign_key_violation
      return new ConstraintError(
        `Foreign key constraint violation: ${error.detail ?? message}`,
        error.constraint ?? null
      );

    case '23502': // not_null_violation
      return new ValidationError(
        `Not null constraint violation: ${error.column ?? message}`,
        error.column ?? null
      );

    case '23514': // check_violation
      return new ValidationError(
        `Check constraint violation: ${error.detail ?? message}`,
        error.constraint ?? null
      );

    case '08000': // connection_exception
    case '08003': // connection_does_not_exist
    case '08006': // connection_failure
      return new ConnectionError(message);

    case '42P01': // undefined_table
      return new QueryError(`Table does not exist: ${message}`, error);

    case '42703': // undefined_column
      return new QueryError(`Column does not exist: ${message}`, error);

    default:
      return new QueryError(message, error);
  }
}

const errors = {
  DALError,
  RecordNotFoundError,
  ValidationError,
  ConnectionError,
  TransactionError,
  QueryError,
  ConstraintError,
  DiscoveryError,
  DiscoveryAmbiguityError,
  UnknownModelError,
  CardinalityError,
  TypeCoercionError,
  ExpressionSyntaxError,
  convertPostgreSQLError,
} as const;

export default errors;
