import type { DatabaseError, TransactionManager, TransactionOptions } from '@postcast/sqlite';
import type { Result } from 'neverthrow';

import type { DatabaseSchema } from '../schema/database-schema.js';

import { BaseRepository } from './base-repository.js';
import { listDocuments, type Document, type DocumentOrder } from './document-store.js';

/**
 * Documents across every owner. Only the post repository's syndication read
 * holds one; the package index does not export it.
 */
export class SiteDocuments extends BaseRepository {
  constructor(manager: TransactionManager<DatabaseSchema>) {
    super(manager, 'SiteDocuments');
  }

  async getAllOfKind(
    kind: string,
    orderBy: DocumentOrder = 'createdAtDesc',
    options: TransactionOptions = {}
  ): Promise<Result<Document[], DatabaseError>> {
    return this.inTransaction(
      'Failed to list documents of all owners',
      (tx) => listDocuments(tx, kind, undefined, orderBy),
      options
    );
  }
}
