import { getErrorMessage, isAbortError } from '@postcast/core';
import { getLogger, type Logger } from '@postcast/logger';
import { DatabaseError, type TransactionManager, type TransactionOptions, type Tx } from '@postcast/sqlite';
import { err, ok, type Result } from 'neverthrow';

import type { DatabaseSchema } from '../schema/database-schema.js';

export abstract class BaseRepository {
  protected readonly manager: TransactionManager<DatabaseSchema>;
  protected readonly logger: Logger;

  constructor(manager: TransactionManager<DatabaseSchema>, repositoryName: string) {
    this.manager = manager;
    this.logger = getLogger(repositoryName);
  }

  /**
   * Run `body` in its own transaction. Failures become a DatabaseError;
   * cancellation rejects with the AbortError.
   */
  protected async inTransaction<T>(
    context: string,
    body: (tx: Tx<DatabaseSchema>) => Promise<T>,
    options: TransactionOptions = {}
  ): Promise<Result<T, DatabaseError>> {
    try {
      return ok(await this.manager.withTransaction(body, options));
    } catch (error) {
      if (isAbortError(error)) throw error;
      this.logger.error({ error }, context);
      return err(new DatabaseError(`${context}: ${getErrorMessage(error)}`, { cause: error }));
    }
  }
}
