import { getDatabasePath } from '@postcast/env';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { initializeDatabase, type DatabaseManager, type InitializeDatabaseOptions } from './database.js';
import { DocumentStore, type DocumentStoreOptions } from './repositories/document-store.js';
import { PostRepository } from './repositories/post-repository.js';
import { SiteDocuments } from './repositories/site-documents.js';

/**
 * The repositories over one database.
 */
export class DataContext {
  /**
   * Open and migrate the database at `dbPath`, by default the configured
   * `POSTCAST_DATABASE_PATH` or `<data dir>/postcast.db`.
   */
  static async initialize(
    dbPath: string = getDatabasePath(),
    options: InitializeDatabaseOptions = {}
  ): Promise<Result<DataContext, Error>> {
    const initResult = await initializeDatabase(dbPath, options);
    if (initResult.isErr()) return err(initResult.error);
    return ok(new DataContext(initResult.value));
  }

  readonly documents: DocumentStore;
  readonly posts: PostRepository;

  constructor(
    readonly manager: DatabaseManager,
    options: DocumentStoreOptions = {}
  ) {
    this.documents = new DocumentStore(manager, options);
    this.posts = new PostRepository(this.documents, new SiteDocuments(manager));
  }

  close(): Promise<Result<void, Error>> {
    return this.manager.destroy();
  }
}
