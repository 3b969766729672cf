import { getDefaultAdminCredentials } from '@postcast/env';
import { getLogger } from '@postcast/logger';
import {
  createSqliteDatabase,
  runMigrations,
  TransactionManager,
  type Migration,
  type MigrationReport,
  type TransactionManagerOptions,
} from '@postcast/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';

import { ScryptPasswordHasher, type PasswordHasher } from './auth/password-hasher.js';
import { createMigrations } from './migrations/index.js';
import type { DatabaseSchema } from './schema/database-schema.js';

export type DatabaseManager = TransactionManager<DatabaseSchema>;

const initLogger = getLogger('DatabaseInitialization');

export interface InitializeDatabaseOptions extends TransactionManagerOptions {
  /** Seed account; defaults to POSTCAST_ADMIN_USERNAME / POSTCAST_ADMIN_PASSWORD */
  admin?: { username: string; password: string } | undefined;
  passwordHasher?: PasswordHasher | undefined;
  /** Replaces the project's migration list */
  migrations?: readonly Migration<DatabaseSchema>[] | undefined;
  signal?: AbortSignal | undefined;
}

export function createDatabase(
  dbPath: string,
  options: TransactionManagerOptions = {}
): Result<DatabaseManager, Error> {
  const dbResult = createSqliteDatabase<DatabaseSchema>(dbPath);
  if (dbResult.isErr()) return err(dbResult.error);
  return ok(new TransactionManager(dbResult.value, options));
}

export function defaultMigrations(options: InitializeDatabaseOptions = {}): Migration<DatabaseSchema>[] {
  const admin = options.admin ?? getDefaultAdminCredentials();
  return createMigrations({
    adminUsername: admin.username,
    adminPassword: admin.password,
    passwordHasher: options.passwordHasher ?? new ScryptPasswordHasher(),
    now: () => new Date(),
    generateUuid: () => uuidv4(),
  });
}

/**
 * Open the database and bring its schema up to date. When migrations fail the
 * database is closed again and the error returned; callers must not serve
 * traffic in that case.
 */
export async function initializeDatabase(
  dbPath: string,
  options: InitializeDatabaseOptions = {}
): Promise<Result<DatabaseManager, Error>> {
  initLogger.debug('Initializing database...');

  const managerResult = createDatabase(dbPath, options);
  if (managerResult.isErr()) {
    return managerResult;
  }

  const manager = managerResult.value;
  const migrations = options.migrations ?? defaultMigrations(options);

  let migrationResult: Result<MigrationReport, Error>;
  try {
    migrationResult = await runMigrations(manager, migrations, { signal: options.signal });
  } catch (error) {
    await closeAfterFailure(manager);
    throw error;
  }

  if (migrationResult.isErr()) {
    await closeAfterFailure(manager);
    return err(migrationResult.error);
  }

  initLogger.debug({ applied: migrationResult.value.applied.length }, 'Database initialization completed');
  return ok(manager);
}

async function closeAfterFailure(manager: DatabaseManager): Promise<void> {
  const closeResult = await manager.destroy();
  if (closeResult.isErr()) {
    initLogger.warn({ error: closeResult.error }, 'Failed to close database after migration failure');
  }
}
