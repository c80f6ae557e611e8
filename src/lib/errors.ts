/**
 * Error classes for the data mapper
 *
 * Driver errors (constraint violations, lost connections, bad SQL) are never
 * wrapped; only conditions the mapper detects itself get a class here.
 */

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
 * Every schema probe failed for a table
 */
export class SchemaUnavailable extends DALError {
  table: string;
  causes: unknown[];

  constructor(table: string, causes: unknown[] = []) {
    super(`Unable to load schema for table: ${table}`, 'SCHEMA_UNAVAILABLE');
    this.name = 'SchemaUnavailable';
    this.table = table;
    this.causes = causes;
  }
}

/**
 * Update or single-row delete without a primary key value
 */
export class MissingPrimaryKey extends DALError {
  table: string;
  primaryKey: string;

  constructor(table: string, primaryKey: string, action: 'update' | 'delete') {
    super(`Cannot ${action} ${table} record without primary key '${primaryKey}'`, 'MISSING_PRIMARY_KEY');
    this.name = 'MissingPrimaryKey';
    this.table = table;
    this.primaryKey = primaryKey;
  }
}

/**
 * Bulk delete called with no conditions
 */
export class EmptyCondition extends DALError {
  constructor(message = 'Delete conditions cannot be empty') {
    super(message, 'EMPTY_CONDITION');
    this.name = 'EmptyCondition';
  }
}

/**
 * Identifier, ORDER BY, LIMIT or join type text that cannot be rendered safely
 */
export class InvalidClauseError extends DALError {
  clause: string;

  constructor(message: string, clause: string) {
    super(message, 'INVALID_CLAUSE');
    this.name = 'InvalidClauseError';
    this.clause = clause;
  }
}

/**
 * Document not found error
 */
export class DocumentNotFound extends DALError {
  constructor(message = 'Document not found') {
    super(message, 'DOCUMENT_NOT_FOUND');
    this.name = 'DocumentNotFound';
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
 * Query error
 */
export class QueryError extends DALError {
  originalError: unknown;

  constructor(message: string, originalError: unknown = null) {
    super(message, 'QUERY_ERROR');
    this.name = 'QueryError';
    this.originalError = originalError;
  }
}

const errors = {
  DALError,
  SchemaUnavailable,
  MissingPrimaryKey,
  EmptyCondition,
  InvalidClauseError,
  DocumentNotFound,
  ValidationError,
  ConnectionError,
  QueryError,
} as const;

export default errors;
