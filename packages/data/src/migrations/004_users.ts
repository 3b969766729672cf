import { ddlMigration, tableExists } from '@postcast/sqlite';

import type { DatabaseSchema } from '../schema/database-schema.js';

export const usersMigration = ddlMigration<DatabaseSchema>(
  '004_users',
  (tx) => [
    tx.db.schema
      .createTable('users')
      .ifNotExists()
      .addColumn('uuid', 'text', (col) => col.primaryKey().notNull())
      .addColumn('username', 'text', (col) => col.notNull().unique())
      .addColumn('password_hash', 'text', (col) => col.notNull())
      .addColumn('created_at', 'integer', (col) => col.notNull())
      .addColumn('updated_at', 'integer', (col) => col.notNull()),
  ],
  (tx) => tableExists(tx, 'users')
);
