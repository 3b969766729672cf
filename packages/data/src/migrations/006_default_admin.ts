import { getLogger } from '@postcast/logger';
import { countRows, type Migration } from '@postcast/sqlite';

import type { PasswordHasher } from '../auth/password-hasher.js';
import type { DatabaseSchema } from '../schema/database-schema.js';

const logger = getLogger('Migrations');

export interface DefaultAdminOptions {
  username: string;
  password: string;
  passwordHasher: PasswordHasher;
  now: () => Date;
  generateUuid: () => string;
}

/**
 * Seeds one account on a database that has none.
 */
export function defaultAdminMigration(options: DefaultAdminOptions): Migration<DatabaseSchema> {
  return {
    name: '006_default_admin',
    isApplied: async (tx) => (await countRows(tx, 'users')) > 0,
    async apply(tx) {
      const uuid = options.generateUuid();
      const passwordHash = await options.passwordHasher.hash(options.password);
      const now = options.now().getTime();

      await tx.run(
        tx.db.insertInto('users').values({
          uuid,
          username: options.username,
          password_hash: passwordHash,
          created_at: now,
          updated_at: now,
        })
      );
      logger.info({ uuid, username: options.username }, 'Created default admin user, change its password');
    },
  };
}
