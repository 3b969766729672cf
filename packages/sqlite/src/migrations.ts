import { isAbortError } from '@postcast/core';
import { getLogger } from '@postcast/logger';
import { sql, type RawBuilder } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { MigrationError } from './errors.js';
import {
  mapAll,
  mapFirst,
  type Statement,
  type TransactionManager,
  type TransactionOptions,
  type Tx,
} from './transaction-manager.js';

const logger = getLogger('SqliteMigrations');

/**
 * A forward-only schema or data change. Whether it already ran is decided by
 * looking at the live database, never by a version table.
 */
export interface Migration<DB> {
  readonly name: string;
  isApplied(tx: Tx<DB>): Promise<boolean>;
  apply(tx: Tx<DB>): Promise<void>;
}

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

/**
 * Build a migration that runs a fixed list of DDL statements in order.
 */
export function ddlMigration<DB>(
  name: string,
  statements: (tx: Tx<DB>) => readonly Statement<unknown>[],
  isApplied: (tx: Tx<DB>) => Promise<boolean>
): Migration<DB> {
  return {
    name,
    isApplied,
    async apply(tx) {
      for (const statement of statements(tx)) {
        await tx.run(statement);
      }
    },
  };
}

/**
 * Apply every pending migration of `migrations`, in order, inside one
 * transaction. A failure rolls back the whole batch, including migrations
 * that already ran in this pass.
 */
export async function runMigrations<DB>(
  manager: TransactionManager<DB>,
  migrations: readonly Migration<DB>[],
  options: TransactionOptions = {}
): Promise<Result<MigrationReport, MigrationError>> {
  const progress: { current: string | undefined } = { current: undefined };

  try {
    logger.debug(`Running migrations (${migrations.length} registered)`);

    const report = await manager.withTransaction(async (tx) => {
      const applied: string[] = [];
      const skipped: string[] = [];

      for (const migration of migrations) {
        progress.current = migration.name;

        if (await migration.isApplied(tx)) {
          skipped.push(migration.name);
          continue;
        }

        await migration.apply(tx);
        applied.push(migration.name);
        logger.debug(`Migration "${migration.name}" executed successfully`);
      }

      progress.current = undefined;
      return { applied, skipped };
    }, options);

    if (report.applied.length > 0) {
      logger.info({ applied: report.applied }, `Applied ${report.applied.length} migration(s)`);
    } else {
      logger.debug('No pending migrations');
    }
    return ok(report);
  } catch (error) {
    if (isAbortError(error)) throw error;
    logger.error({ error, migration: progress.current }, 'Migration failed, batch rolled back');
    return err(new MigrationError(progress.current, error));
  }
}

export async function tableExists<DB>(tx: Tx<DB>, table: string): Promise<boolean> {
  const names = await tx.execute(
    sql<{ name: string }>`select name from sqlite_master where type = 'table' and name = ${table}`,
    mapAll((row) => row.name)
  );
  return names.length > 0;
}

export async function columnExists<DB>(tx: Tx<DB>, table: string, column: string): Promise<boolean> {
  const names = await tx.execute(
    sql<{ name: string }>`select name from pragma_table_info(${table}) where name = ${column}`,
    mapAll((row) => row.name)
  );
  return names.length > 0;
}

/**
 * `undefined` when the column does not exist.
 */
export async function isColumnNullable<DB>(tx: Tx<DB>, table: string, column: string): Promise<boolean | undefined> {
  return tx.execute(
    sql<{ notnull: number }>`select "notnull" from pragma_table_info(${table}) where name = ${column}`,
    mapFirst((row) => row.notnull === 0)
  );
}

export async function countRows<DB>(tx: Tx<DB>, table: string, where?: RawBuilder<unknown>): Promise<number> {
  const statement = where
    ? sql<{ count: number }>`select count(*) as count from ${sql.table(table)} where ${where}`
    : sql<{ count: number }>`select count(*) as count from ${sql.table(table)}`;
  const count = await tx.execute(statement, mapFirst((row) => Number(row.count)));
  return count ?? 0;
}
