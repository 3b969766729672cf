import { columnExists, ddlMigration } from '@postcast/sqlite';

import type { DatabaseSchema } from '../schema/database-schema.js';

export const userSettingsMigration = ddlMigration<DatabaseSchema>(
  '007_user_settings',
  (tx) => [tx.db.schema.alterTable('users').addColumn('settings', 'text')],
  (tx) => columnExists(tx, 'users', 'settings')
);
