export { createSqliteDatabase, type CreateSqliteDatabaseOptions } from './database.js';
export { closeSqliteDatabase } from './close.js';
export {
  CheckViolationError,
  classifySqlError,
  DatabaseError,
  ForeignKeyViolationError,
  MigrationError,
  parseConstraintTarget,
  UniqueViolationError,
  UnknownSqlError,
  type ConstraintTarget,
  type SqlUpdateError,
} from './errors.js';
export {
  mapAll,
  mapFirst,
  TransactionManager,
  type CancelStatement,
  type RowMapper,
  type Statement,
  type TransactionManagerOptions,
  type TransactionOptions,
  type Tx,
} from './transaction-manager.js';
export {
  columnExists,
  countRows,
  ddlMigration,
  isColumnNullable,
  runMigrations,
  tableExists,
  type Migration,
  type MigrationReport,
} from './migrations.js';

// Re-export commonly used Kysely types so consumers don't need kysely as a direct dependency
export {
  Kysely,
  sql,
  type ColumnType,
  type ControlledTransaction,
  type Generated,
  type Insertable,
  type RawBuilder,
  type Selectable,
  type Updateable,
} from 'kysely';
