import { wrapError } from '@postcast/core';
import { getLogger } from '@postcast/logger';
import type { Kysely } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

const logger = getLogger('SqliteDatabase');

/**
 * Close a Kysely database connection.
 */
export async function closeSqliteDatabase<DB>(db: Kysely<DB>): Promise<Result<void, Error>> {
  try {
    await db.destroy();
    logger.debug('Database connection closed');
    return ok();
  } catch (error) {
    logger.error({ error }, 'Error closing database');
    return wrapError(error, 'Failed to close database');
  }
}
