import { getLogger } from '@postcast/logger';
import { countRows, mapFirst, sql, type Migration } from '@postcast/sqlite';

import type { DatabaseSchema } from '../schema/database-schema.js';

const logger = getLogger('Migrations');

/**
 * Rows written before documents had owners go to the admin account, or to
 * the oldest account when no user has the admin name.
 */
export function ownerBackfillMigration(adminUsername: string): Migration<DatabaseSchema> {
  return {
    name: '009_owner_backfill',
    async isApplied(tx) {
      const orphanDocuments = await countRows(tx, 'documents', sql`owner_id is null`);
      const orphanUploads = await countRows(tx, 'uploads', sql`owner_id is null`);
      return orphanDocuments === 0 && orphanUploads === 0;
    },
    async apply(tx) {
      const ownerId =
        (await tx.execute(
          tx.db.selectFrom('users').select('uuid').where('username', '=', adminUsername).limit(1),
          mapFirst((row) => row.uuid)
        )) ??
        (await tx.execute(
          tx.db.selectFrom('users').select('uuid').orderBy('created_at').limit(1),
          mapFirst((row) => row.uuid)
        ));

      if (ownerId === undefined) {
        logger.warn('No user to assign existing documents to, skipping owner backfill');
        return;
      }

      const documents = await tx.run(
        tx.db.updateTable('documents').set({ owner_id: ownerId }).where('owner_id', 'is', null)
      );
      const uploads = await tx.run(
        tx.db.updateTable('uploads').set({ owner_id: ownerId }).where('owner_id', 'is', null)
      );
      logger.info({ ownerId, documents, uploads }, 'Assigned existing rows to owner');
    },
  };
}
