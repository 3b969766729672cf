import { ddlMigration, tableExists } from '@postcast/sqlite';

import type { DatabaseSchema } from '../schema/database-schema.js';

export const uploadsMigration = ddlMigration<DatabaseSchema>(
  '003_uploads',
  (tx) => [
    tx.db.schema
      .createTable('uploads')
      .ifNotExists()
      .addColumn('uuid', 'text', (col) => col.primaryKey().notNull())
      .addColumn('hash', 'text', (col) => col.notNull())
      .addColumn('original_name', 'text', (col) => col.notNull())
      .addColumn('mime_type', 'text')
      .addColumn('size', 'integer')
      .addColumn('alt_text', 'text')
      .addColumn('image_width', 'integer')
      .addColumn('image_height', 'integer')
      .addColumn('created_at', 'integer', (col) => col.notNull()),
    tx.db.schema.createIndex('uploads_created_at').ifNotExists().on('uploads').column('created_at'),
  ],
  (tx) => tableExists(tx, 'uploads')
);
