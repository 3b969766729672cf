import { columnExists, ddlMigration } from '@postcast/sqlite';

import type { DatabaseSchema } from '../schema/database-schema.js';

export const documentOwnersMigration = ddlMigration<DatabaseSchema>(
  '008_document_owners',
  (tx) => [
    tx.db.schema.alterTable('documents').addColumn('owner_id', 'text'),
    tx.db.schema.alterTable('uploads').addColumn('owner_id', 'text'),
    tx.db.schema
      .createIndex('documents_owner_id')
      .ifNotExists()
      .on('documents')
      .columns(['owner_id', 'kind', 'created_at']),
    tx.db.schema.createIndex('uploads_owner_id').ifNotExists().on('uploads').columns(['owner_id', 'created_at']),
  ],
  (tx) => columnExists(tx, 'documents', 'owner_id')
);
