import type { PostRepository } from '@postcast/data';
import { getPublicBaseUrl } from '@postcast/env';
import { getLogger } from '@postcast/logger';
import { err, ok, type Result } from 'neverthrow';

import { TargetFailedError } from '../errors.js';
import type { PublishContext, PublishedMessage, PublishResponse, PublishTarget, TargetRequest } from '../types.js';

const HASHTAG_PATTERN = /(?:^|\s)(#\w+)/g;

export function extractHashtags(content: string): string[] {
  const tags = new Set<string>();
  for (const match of content.matchAll(HASHTAG_PATTERN)) {
    const tag = match[1]?.trim().slice(1);
    if (tag) tags.add(tag);
  }
  return Array.from(tags);
}

export function feedItemUri(baseUrl: string, ownerId: string, uuid: string): string {
  return `${baseUrl}/feed/${encodeURIComponent(ownerId)}/${encodeURIComponent(uuid)}`;
}

/**
 * The local feed. Publishing stores the thread as posts, each message replying
 * to the one before it.
 */
export class FeedTarget implements PublishTarget {
  readonly name = 'feed';
  readonly displayName = 'Feed';

  private readonly logger = getLogger('FeedTarget');

  constructor(
    private readonly posts: PostRepository,
    private readonly baseUrl: string = getPublicBaseUrl()
  ) {}

  isConfigured(): boolean {
    return true;
  }

  async publish(request: TargetRequest, context: PublishContext): Promise<Result<PublishResponse, TargetFailedError>> {
    const messages: PublishedMessage[] = [];
    let replyToPostUuid: string | undefined;

    for (const message of request.messages) {
      const tags = extractHashtags(message.content);
      const result = await this.posts.create(
        {
          content: message.content,
          link: message.link,
          images: message.images,
          language: request.language,
          tags: tags.length > 0 ? tags : undefined,
          replyToPostUuid,
        },
        request.targets,
        context.ownerId,
        { signal: context.signal }
      );

      if (result.isErr()) {
        this.logger.error({ error: result.error, ownerId: context.ownerId }, 'Failed to save feed item');
        return err(
          new TargetFailedError(500, this.name, `Failed to save feed item: ${result.error.message}`, {
            cause: result.error,
          })
        );
      }

      const post = result.value;
      messages.push({
        id: post.uuid,
        uri: feedItemUri(this.baseUrl, context.ownerId, post.uuid),
        replyToId: replyToPostUuid,
      });
      replyToPostUuid = post.uuid;
    }

    this.logger.debug({ ownerId: context.ownerId, messages: messages.length }, 'Saved feed items');
    return ok({
      module: this.name,
      uri: messages[0]?.uri ?? `${this.baseUrl}/feed/${encodeURIComponent(context.ownerId)}`,
      messages,
    });
  }
}
