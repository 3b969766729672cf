import { awaitWithCancellation, isAbortError, throwIfAborted } from '@postcast/core';
import { getLogger } from '@postcast/logger';
import type { Compilable, CompiledQuery, ControlledTransaction, Kysely, QueryResult, RawBuilder } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import { closeSqliteDatabase } from './close.js';
import { classifySqlError, type SqlUpdateError } from './errors.js';

const logger = getLogger('TransactionManager');

/**
 * Anything Kysely can bind and run: a query builder, an already compiled
 * query, or a `sql` template.
 */
export type Statement<R> = Compilable<R> | CompiledQuery<R> | RawBuilder<R>;

export type RowMapper<R, T> = (rows: R[]) => T;

export function mapAll<R, T>(mapRow: (row: R) => T): RowMapper<R, T[]> {
  return (rows) => rows.map(mapRow);
}

export function mapFirst<R, T>(mapRow: (row: R) => T): RowMapper<R, T | undefined> {
  return (rows) => {
    const first = rows[0];
    return first === undefined ? undefined : mapRow(first);
  };
}

export interface TransactionOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Transaction handle passed to a transaction body. Statements are built
 * with `db` and run through `execute` or `run` so that cancellation applies.
 */
export interface Tx<DB> {
  readonly db: ControlledTransaction<DB>;
  readonly signal: AbortSignal | undefined;
  execute<R, T>(statement: Statement<R>, mapper: RowMapper<R, T>): Promise<T>;
  /** Returns the number of affected rows. */
  run<R>(statement: Statement<R>): Promise<number>;
}

export type CancelStatement = () => void | Promise<void>;

export interface TransactionManagerOptions {
  /**
   * Best-effort interrupt of the running statement when a signal fires.
   * better-sqlite3 runs statements synchronously and exposes no interrupt,
   * so the default only records that the statement runs to completion.
   */
  onCancelStatement?: CancelStatement | undefined;
}

function executeStatement<DB, R>(trx: ControlledTransaction<DB>, statement: Statement<R>): Promise<QueryResult<R>> {
  if ('isRawBuilder' in statement) {
    return statement.execute(trx);
  }
  return trx.executeQuery(statement);
}

class ScopedTx<DB> implements Tx<DB> {
  constructor(
    readonly db: ControlledTransaction<DB>,
    readonly signal: AbortSignal | undefined,
    private readonly cancelStatement: CancelStatement
  ) {}

  async execute<R, T>(statement: Statement<R>, mapper: RowMapper<R, T>): Promise<T> {
    const result = await this.start(statement);
    return mapper(result.rows);
  }

  async run<R>(statement: Statement<R>): Promise<number> {
    const result = await this.start(statement);
    return Number(result.numAffectedRows ?? 0n);
  }

  private start<R>(statement: Statement<R>): Promise<QueryResult<R>> {
    throwIfAborted(this.signal);
    return awaitWithCancellation(executeStatement(this.db, statement), this.signal, this.cancelStatement, (error) =>
      logger.warn({ error }, 'Statement cancel failed')
    );
  }
}

/**
 * Scoped transactions over a Kysely database.
 *
 * The SQLite dialect serializes connection access, so transactions must not
 * be nested: a body that opens a second transaction waits on itself.
 */
export class TransactionManager<DB> {
  private readonly cancelStatement: CancelStatement;

  constructor(
    readonly db: Kysely<DB>,
    options: TransactionManagerOptions = {}
  ) {
    this.cancelStatement =
      options.onCancelStatement ??
      (() => logger.debug('SQLite statements cannot be interrupted, waiting for the running one to finish'));
  }

  /**
   * Run `body` in a transaction. Commits when it returns; rolls back when it
   * throws or the signal fires, then rethrows. The connection goes back to
   * the pool on every path.
   */
  async withTransaction<A>(body: (tx: Tx<DB>) => Promise<A>, options: TransactionOptions = {}): Promise<A> {
    const { signal } = options;
    throwIfAborted(signal);

    const trx = await this.db.startTransaction().execute();

    try {
      throwIfAborted(signal);
      const value = await body(new ScopedTx(trx, signal, this.cancelStatement));
      throwIfAborted(signal);
      await trx.commit().execute();
      return value;
    } catch (error) {
      try {
        await trx.rollback().execute();
      } catch (rollbackError) {
        logger.error({ rollbackError }, 'Failed to rollback transaction');
      }
      if (!isAbortError(error)) {
        logger.debug({ error }, 'Transaction rolled back');
      }
      throw error;
    }
  }

  /**
   * Same as `withTransaction`, with failures classified by constraint kind.
   * Cancellation is not classified: the AbortError is rethrown.
   */
  async transactionForUpdates<A>(
    body: (tx: Tx<DB>) => Promise<A>,
    options: TransactionOptions = {}
  ): Promise<Result<A, SqlUpdateError>> {
    try {
      return ok(await this.withTransaction(body, options));
    } catch (error) {
      if (isAbortError(error)) throw error;
      const classified = classifySqlError(error);
      logger.warn({ kind: classified.kind, constraint: classified.constraint }, 'Update transaction failed');
      return err(classified);
    }
  }

  destroy(): Promise<Result<void, Error>> {
    return closeSqliteDatabase(this.db);
  }
}
