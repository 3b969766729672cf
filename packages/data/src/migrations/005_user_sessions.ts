import { ddlMigration, tableExists } from '@postcast/sqlite';

import type { DatabaseSchema } from '../schema/database-schema.js';

export const userSessionsMigration = ddlMigration<DatabaseSchema>(
  '005_user_sessions',
  (tx) => [
    tx.db.schema
      .createTable('user_sessions')
      .ifNotExists()
      .addColumn('uuid', 'text', (col) => col.primaryKey().notNull())
      .addColumn('user_uuid', 'text', (col) => col.notNull().references('users.uuid').onDelete('cascade'))
      .addColumn('token_hash', 'text', (col) => col.notNull().unique())
      .addColumn('refresh_token_hash', 'text')
      .addColumn('expires_at', 'integer', (col) => col.notNull())
      .addColumn('created_at', 'integer', (col) => col.notNull()),
    tx.db.schema.createIndex('user_sessions_expires_at').ifNotExists().on('user_sessions').column('expires_at'),
  ],
  (tx) => tableExists(tx, 'user_sessions')
);
