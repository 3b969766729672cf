import { ddlMigration, tableExists } from '@postcast/sqlite';

import type { DatabaseSchema } from '../schema/database-schema.js';

export const documentTagsMigration = ddlMigration<DatabaseSchema>(
  '002_document_tags',
  (tx) => [
    tx.db.schema
      .createTable('document_tags')
      .ifNotExists()
      .addColumn('document_uuid', 'text', (col) => col.notNull())
      .addColumn('name', 'text', (col) => col.notNull())
      .addColumn('kind', 'text', (col) => col.notNull())
      .addPrimaryKeyConstraint('document_tags_pk', ['document_uuid', 'name', 'kind']),
  ],
  (tx) => tableExists(tx, 'document_tags')
);
