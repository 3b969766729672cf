import type { Migration } from '@postcast/sqlite';

import type { PasswordHasher } from '../auth/password-hasher.js';
import type { DatabaseSchema } from '../schema/database-schema.js';

import { documentsMigration } from './001_documents.js';
import { documentTagsMigration } from './002_document_tags.js';
import { uploadsMigration } from './003_uploads.js';
import { usersMigration } from './004_users.js';
import { userSessionsMigration } from './005_user_sessions.js';
import { defaultAdminMigration } from './006_default_admin.js';
import { userSettingsMigration } from './007_user_settings.js';
import { documentOwnersMigration } from './008_document_owners.js';
import { ownerBackfillMigration } from './009_owner_backfill.js';

export interface MigrationOptions {
  adminUsername: string;
  adminPassword: string;
  passwordHasher: PasswordHasher;
  now: () => Date;
  generateUuid: () => string;
}

/**
 * The ordered migration list. Append only: shipped entries are never edited,
 * reordered or removed.
 */
export function createMigrations(options: MigrationOptions): Migration<DatabaseSchema>[] {
  return [
    documentsMigration,
    documentTagsMigration,
    uploadsMigration,
    usersMigration,
    userSessionsMigration,
    defaultAdminMigration({
      username: options.adminUsername,
      password: options.adminPassword,
      passwordHasher: options.passwordHasher,
      now: options.now,
      generateUuid: options.generateUuid,
    }),
    userSettingsMigration,
    documentOwnersMigration,
    ownerBackfillMigration(options.adminUsername),
  ];
}
