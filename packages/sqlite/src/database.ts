import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@postcast/core';
import { getLogger } from '@postcast/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

const logger = getLogger('SqliteDatabase');

export interface CreateSqliteDatabaseOptions {
  /** How long a statement waits on a locked database before failing (default 5000) */
  busyTimeoutMs?: number | undefined;
}

/**
 * Create and configure a SQLite-backed Kysely database instance.
 *
 * SqliteDialect keeps one connection behind a mutex, so every transaction
 * waits its turn for that connection.
 */
export function createSqliteDatabase<T>(
  dbPath: string,
  options?: CreateSqliteDatabaseOptions
): Result<Kysely<T>, Error> {
  try {
    const inMemory = dbPath === ':memory:';
    const dataDir = path.dirname(dbPath);
    if (!inMemory && !fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const sqliteDb = new Database(dbPath);

    sqliteDb.pragma('foreign_keys = ON');
    sqliteDb.pragma(`busy_timeout = ${options?.busyTimeoutMs ?? 5000}`);
    if (!inMemory) {
      sqliteDb.pragma('journal_mode = WAL');
      sqliteDb.pragma('synchronous = NORMAL');
    }

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    return ok(
      new Kysely<T>({
        dialect: new SqliteDialect({ database: sqliteDb }),
      })
    );
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}
