import { getErrorMessage } from '@postcast/core';
import { getLogger } from '@postcast/logger';
import { DatabaseError, type TransactionOptions } from '@postcast/sqlite';
import { err, ok, Result } from 'neverthrow';
import { z } from 'zod';

import type { Document, DocumentStore, Tag } from './document-store.js';
import type { SiteDocuments } from './site-documents.js';

export const POST_KIND = 'post';

export const PostPayloadSchema = z.object({
  content: z.string(),
  link: z.string().optional(),
  /** Free-form labels, hashtags for feed posts */
  tags: z.array(z.string()).optional(),
  language: z.string().optional(),
  /** Upload uuids */
  images: z.array(z.string()).optional(),
  replyToPostUuid: z.string().optional(),
});

export type PostPayload = z.infer<typeof PostPayloadSchema>;

export interface Post extends PostPayload {
  uuid: string;
  ownerId: string;
  createdAt: Date;
  /** Publish destinations, stored as `target` tags */
  targets: string[];
}

function decodePost(document: Document): Result<Post, DatabaseError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(document.payload);
  } catch (error) {
    return err(
      new DatabaseError(`Post ${document.uuid} has invalid JSON: ${getErrorMessage(error)}`, { cause: error })
    );
  }

  const payload = PostPayloadSchema.safeParse(parsed);
  if (!payload.success) {
    return err(
      new DatabaseError(`Post ${document.uuid} failed validation: ${payload.error.message}`, { cause: payload.error })
    );
  }

  return ok({
    ...payload.data,
    uuid: document.uuid,
    ownerId: document.ownerId,
    createdAt: document.createdAt,
    targets: document.tags.filter((tag) => tag.kind === 'target').map((tag) => tag.name),
  });
}

/**
 * Typed view of `post` documents.
 */
export class PostRepository {
  private readonly logger = getLogger('PostRepository');

  constructor(
    private readonly documents: DocumentStore,
    private readonly siteDocuments: SiteDocuments
  ) {}

  /**
   * Stores the payload and its targets as a single document write.
   */
  async create(
    payload: PostPayload,
    targets: readonly string[],
    ownerId: string,
    options: TransactionOptions = {}
  ): Promise<Result<Post, DatabaseError>> {
    const tags: Tag[] = [
      ...targets.map((name) => ({ name, kind: 'target' })),
      ...(payload.tags ?? []).map((name) => ({ name, kind: 'label' })),
    ];

    const result = await this.documents.createOrUpdate(
      { kind: POST_KIND, payload: JSON.stringify(payload), ownerId, tags },
      options
    );
    return result.andThen(decodePost);
  }

  async getAllForOwner(ownerId: string, options: TransactionOptions = {}): Promise<Result<Post[], DatabaseError>> {
    const result = await this.documents.getAllForUser(POST_KIND, ownerId, 'createdAtDesc', options);
    return result.andThen((documents) => Result.combine(documents.map(decodePost)));
  }

  /**
   * `undefined` unless the post exists and belongs to `ownerId`.
   */
  async getByUuid(
    uuid: string,
    ownerId: string,
    options: TransactionOptions = {}
  ): Promise<Result<Post | undefined, DatabaseError>> {
    const result = await this.documents.searchByUuid(uuid, options);
    if (result.isErr()) return err(result.error);

    const document = result.value;
    if (!document || document.kind !== POST_KIND) return ok(undefined);
    if (document.ownerId !== ownerId) {
      this.logger.debug({ uuid }, 'Denied post lookup by another owner');
      return ok(undefined);
    }
    return decodePost(document);
  }

  /**
   * Every owner's posts, newest first. For syndication only.
   */
  async getAllForFeed(options: TransactionOptions = {}): Promise<Result<Post[], DatabaseError>> {
    const result = await this.siteDocuments.getAllOfKind(POST_KIND, 'createdAtDesc', options);
    return result.andThen((documents) => Result.combine(documents.map(decodePost)));
  }
}
