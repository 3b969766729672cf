import { DomainError, getErrorMessage, type DomainErrorOptions } from '@postcast/core';

/**
 * Base class of the classified failures of an update transaction.
 * `constraint`, `table` and `column` are parsed from the driver message when present.
 */
abstract class SqlUpdateErrorBase extends DomainError {
  abstract readonly kind: 'unique' | 'foreign-key' | 'check' | 'unknown';
  readonly severity = 'error' as const;

  readonly constraint: string | undefined;
  readonly table: string | undefined;
  readonly column: string | undefined;

  constructor(message: string, target: ConstraintTarget, options?: DomainErrorOptions) {
    super(message, options);
    this.constraint = target.constraint;
    this.table = target.table;
    this.column = target.column;
  }
}

export class UniqueViolationError extends SqlUpdateErrorBase {
  readonly code = 'UNIQUE_VIOLATION';
  readonly kind = 'unique' as const;
}

export class ForeignKeyViolationError extends SqlUpdateErrorBase {
  readonly code = 'FOREIGN_KEY_VIOLATION';
  readonly kind = 'foreign-key' as const;
}

export class CheckViolationError extends SqlUpdateErrorBase {
  readonly code = 'CHECK_VIOLATION';
  readonly kind = 'check' as const;
}

export class UnknownSqlError extends SqlUpdateErrorBase {
  readonly code = 'UNKNOWN_SQL_ERROR';
  readonly kind = 'unknown' as const;
}

export type SqlUpdateError = UniqueViolationError | ForeignKeyViolationError | CheckViolationError | UnknownSqlError;

export interface ConstraintTarget {
  constraint: string | undefined;
  table: string | undefined;
  column: string | undefined;
}

const CONSTRAINT_NAME = /constraint failed:\s*([^\s,]+)/i;

/**
 * Extract what the failing constraint refers to from messages such as
 * `UNIQUE constraint failed: documents.search_key`.
 */
export function parseConstraintTarget(message: string): ConstraintTarget {
  const constraint = CONSTRAINT_NAME.exec(message)?.[1];
  if (!constraint) {
    return { constraint: undefined, table: undefined, column: undefined };
  }

  const parts = constraint.split('.');
  if (parts.length === 2 && parts[0] && parts[1]) {
    return { constraint, table: parts[0], column: parts[1] };
  }
  return { constraint, table: undefined, column: undefined };
}

/**
 * Classify a failed write by its message text. SQLite reports constraint
 * failures only as text, so this is best effort.
 */
export function classifySqlError(error: unknown): SqlUpdateError {
  const message = getErrorMessage(error);
  const target = parseConstraintTarget(message);
  const options = { cause: error };
  const lower = message.toLowerCase();

  if (lower.includes('unique constraint')) {
    return new UniqueViolationError(message, target, options);
  }
  if (lower.includes('foreign key constraint')) {
    return new ForeignKeyViolationError(message, target, options);
  }
  if (lower.includes('check constraint')) {
    return new CheckViolationError(message, target, options);
  }
  return new UnknownSqlError(message, target, options);
}

/**
 * Store-level failure. Write paths attach the classified constraint violation.
 */
export class DatabaseError extends DomainError {
  readonly code = 'DATABASE_ERROR';
  readonly severity = 'error' as const;
  readonly violation: SqlUpdateError | undefined;

  constructor(message: string, options?: DomainErrorOptions & { violation?: SqlUpdateError | undefined }) {
    super(message, options);
    this.violation = options?.violation;
  }
}

export class MigrationError extends DomainError {
  readonly code = 'MIGRATION_ERROR';
  readonly severity = 'error' as const;

  constructor(
    readonly migration: string | undefined,
    cause: unknown
  ) {
    super(
      migration
        ? `Migration "${migration}" failed: ${getErrorMessage(cause)}`
        : `Migration batch failed: ${getErrorMessage(cause)}`,
      { cause, context: { migration } }
    );
  }
}
