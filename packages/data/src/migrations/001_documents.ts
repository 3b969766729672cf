import { ddlMigration, sql, tableExists } from '@postcast/sqlite';

import type { DatabaseSchema } from '../schema/database-schema.js';

/**
 * Replaces the legacy per-feature `posts` table with the generic documents table.
 */
export const documentsMigration = ddlMigration<DatabaseSchema>(
  '001_documents',
  (tx) => [
    sql`drop table if exists posts`,
    tx.db.schema
      .createTable('documents')
      .ifNotExists()
      .addColumn('uuid', 'text', (col) => col.primaryKey().notNull())
      .addColumn('search_key', 'text', (col) => col.notNull().unique())
      .addColumn('kind', 'text', (col) => col.notNull())
      .addColumn('payload', 'text', (col) => col.notNull())
      .addColumn('created_at', 'integer', (col) => col.notNull()),
    tx.db.schema.createIndex('documents_created_at').ifNotExists().on('documents').columns(['kind', 'created_at']),
  ],
  (tx) => tableExists(tx, 'documents')
);
