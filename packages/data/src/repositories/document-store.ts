import {
  DatabaseError,
  mapAll,
  mapFirst,
  sql,
  type Selectable,
  type TransactionManager,
  type TransactionOptions,
  type Tx,
} from '@postcast/sqlite';
import { err, ok, type Result } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';

import type { DatabaseSchema, DocumentsTable } from '../schema/database-schema.js';

import { BaseRepository } from './base-repository.js';

export interface Tag {
  name: string;
  /** `target`, `label`, or any caller-defined kind */
  kind: string;
}

export interface Document {
  uuid: string;
  searchKey: string;
  kind: string;
  payload: string;
  ownerId: string;
  createdAt: Date;
  tags: Tag[];
}

export interface DocumentInput {
  kind: string;
  payload: string;
  ownerId: string;
  searchKey?: string | undefined;
  tags?: readonly Tag[] | undefined;
}

export type DocumentOrder = 'createdAtDesc' | 'createdAtAsc';

export interface DocumentStoreOptions {
  now?: (() => Date) | undefined;
  generateUuid?: (() => string) | undefined;
}

type DocumentRow = Selectable<DocumentsTable>;
type DocTx = Tx<DatabaseSchema>;

// keeps well under SQLite's bound parameter limit
const TAG_BATCH_SIZE = 500;

function dedupeTags(tags: readonly Tag[]): Tag[] {
  const seen = new Set<string>();
  const unique: Tag[] = [];
  for (const tag of tags) {
    const key = `${tag.kind}\u0000${tag.name}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push({ name: tag.name, kind: tag.kind });
  }
  return unique;
}

function toDocument(row: DocumentRow, tags: Tag[]): Document {
  if (row.owner_id === null) {
    throw new Error(`Document ${row.uuid} has no owner`);
  }
  return {
    uuid: row.uuid,
    searchKey: row.search_key,
    kind: row.kind,
    payload: row.payload,
    ownerId: row.owner_id,
    createdAt: new Date(row.created_at),
    tags,
  };
}

async function loadTags(tx: DocTx, uuids: readonly string[]): Promise<Map<string, Tag[]>> {
  const byDocument = new Map<string, Tag[]>();

  for (let start = 0; start < uuids.length; start += TAG_BATCH_SIZE) {
    const batch = uuids.slice(start, start + TAG_BATCH_SIZE);
    const rows = await tx.execute(
      tx.db
        .selectFrom('document_tags')
        .select(['document_uuid', 'name', 'kind'])
        .where('document_uuid', 'in', batch)
        .orderBy(sql`rowid`),
      mapAll((row) => row)
    );

    for (const row of rows) {
      const tags = byDocument.get(row.document_uuid) ?? [];
      tags.push({ name: row.name, kind: row.kind });
      byDocument.set(row.document_uuid, tags);
    }
  }

  return byDocument;
}

/**
 * Documents of `kind`, for one owner or, with `ownerId` undefined, for all.
 */
export async function listDocuments(
  tx: DocTx,
  kind: string,
  ownerId: string | undefined,
  orderBy: DocumentOrder
): Promise<Document[]> {
  const direction = orderBy === 'createdAtDesc' ? 'desc' : 'asc';
  let query = tx.db.selectFrom('documents').selectAll().where('kind', '=', kind);
  if (ownerId !== undefined) {
    query = query.where('owner_id', '=', ownerId);
  }
  // rowid breaks ties between documents created in the same millisecond
  const rows = await tx.execute(
    query.orderBy('created_at', direction).orderBy(sql`rowid`, direction),
    mapAll((row) => row)
  );

  const tags = await loadTags(tx, rows.map((row) => row.uuid));
  return rows.map((row) => toDocument(row, tags.get(row.uuid) ?? []));
}

/**
 * Tenant-scoped store of tagged documents. Every call runs in its own
 * transaction; no connection is held between calls.
 */
export class DocumentStore extends BaseRepository {
  private readonly now: () => Date;
  private readonly generateUuid: () => string;

  constructor(manager: TransactionManager<DatabaseSchema>, options: DocumentStoreOptions = {}) {
    super(manager, 'DocumentStore');
    this.now = options.now ?? (() => new Date());
    this.generateUuid = options.generateUuid ?? uuidv4;
  }

  /**
   * Update the document with the same `(searchKey, ownerId)`, keeping its uuid
   * and creation time, or insert a new one. The tag set is replaced with
   * `input.tags` in both cases.
   *
   * The read-then-write relies on SQLite serializing writers.
   */
  async createOrUpdate(
    input: DocumentInput,
    options: TransactionOptions = {}
  ): Promise<Result<Document, DatabaseError>> {
    const tags = dedupeTags(input.tags ?? []);

    const result = await this.manager.transactionForUpdates(async (tx) => {
      const existing =
        input.searchKey === undefined
          ? undefined
          : await tx.execute(
              tx.db
                .selectFrom('documents')
                .selectAll()
                .where('search_key', '=', input.searchKey)
                .where('owner_id', '=', input.ownerId),
              mapFirst((row) => row)
            );

      if (existing) {
        await tx.run(tx.db.updateTable('documents').set({ payload: input.payload }).where('uuid', '=', existing.uuid));
        await this.replaceTags(tx, existing.uuid, tags);
        this.logger.debug({ uuid: existing.uuid, kind: existing.kind }, 'Updated document');
        return toDocument({ ...existing, payload: input.payload }, tags);
      }

      const uuid = this.generateUuid();
      const row: DocumentRow = {
        uuid,
        search_key: input.searchKey ?? `${input.kind}:${uuid}`,
        kind: input.kind,
        payload: input.payload,
        created_at: this.now().getTime(),
        owner_id: input.ownerId,
      };
      await tx.run(tx.db.insertInto('documents').values(row));
      await this.replaceTags(tx, uuid, tags);
      this.logger.debug({ uuid, kind: input.kind }, 'Created document');
      return toDocument(row, tags);
    }, options);

    if (result.isErr()) {
      const violation = result.error;
      this.logger.warn({ kind: input.kind, violation: violation.kind }, 'Failed to save document');
      return err(
        new DatabaseError(`Failed to save ${input.kind} document: ${violation.message}`, {
          cause: violation,
          violation,
        })
      );
    }
    return ok(result.value);
  }

  async searchByKey(
    searchKey: string,
    options: TransactionOptions = {}
  ): Promise<Result<Document | undefined, DatabaseError>> {
    return this.inTransaction(
      'Failed to search document by key',
      async (tx) => {
        const row = await tx.execute(
          tx.db.selectFrom('documents').selectAll().where('search_key', '=', searchKey),
          mapFirst((r) => r)
        );
        return row ? this.withTags(tx, row) : undefined;
      },
      options
    );
  }

  async searchByUuid(
    uuid: string,
    options: TransactionOptions = {}
  ): Promise<Result<Document | undefined, DatabaseError>> {
    return this.inTransaction(
      'Failed to search document by uuid',
      async (tx) => {
        const row = await tx.execute(
          tx.db.selectFrom('documents').selectAll().where('uuid', '=', uuid),
          mapFirst((r) => r)
        );
        return row ? this.withTags(tx, row) : undefined;
      },
      options
    );
  }

  /**
   * Documents of one kind and one owner.
   */
  async getAllForUser(
    kind: string,
    ownerId: string,
    orderBy: DocumentOrder = 'createdAtDesc',
    options: TransactionOptions = {}
  ): Promise<Result<Document[], DatabaseError>> {
    return this.inTransaction('Failed to list documents', (tx) => listDocuments(tx, kind, ownerId, orderBy), options);
  }

  private async withTags(tx: DocTx, row: DocumentRow): Promise<Document> {
    const tags = await loadTags(tx, [row.uuid]);
    return toDocument(row, tags.get(row.uuid) ?? []);
  }

  private async replaceTags(tx: DocTx, documentUuid: string, tags: readonly Tag[]): Promise<void> {
    await tx.run(tx.db.deleteFrom('document_tags').where('document_uuid', '=', documentUuid));
    if (tags.length === 0) return;

    await tx.run(
      tx.db
        .insertInto('document_tags')
        .values(tags.map((tag) => ({ document_uuid: documentUuid, name: tag.name, kind: tag.kind })))
    );
    this.logger.debug({ documentUuid, tags: tags.map((tag) => tag.name) }, 'Replaced document tags');
  }
}
