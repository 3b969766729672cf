import type { Post, PostRepository } from '@postcast/data';
import type { DatabaseError } from '@postcast/sqlite';
import type { Result } from 'neverthrow';

import { TargetRegistry } from './target-registry.js';

export type PresenceFilter = 'include' | 'exclude';

export interface ListPostsOptions {
  /** Omit for the site-wide feed */
  ownerId?: string | undefined;
  target?: string | undefined;
  /** `include` keeps only posts with a link, `exclude` only posts without */
  filterByLinks?: PresenceFilter | undefined;
  filterByImages?: PresenceFilter | undefined;
  signal?: AbortSignal | undefined;
}

function matchesPresence(present: boolean, filter: PresenceFilter | undefined): boolean {
  if (filter === undefined) return true;
  return filter === 'include' ? present : !present;
}

/**
 * Read path for feed pages and syndication.
 */
export class FeedReader {
  /** `registry` supplies the aliases publishing applied to stored targets */
  constructor(
    private readonly posts: PostRepository,
    private readonly registry: TargetRegistry = new TargetRegistry()
  ) {}

  async listPosts(options: ListPostsOptions = {}): Promise<Result<Post[], DatabaseError>> {
    const { ownerId, signal } = options;
    const result =
      ownerId === undefined
        ? await this.posts.getAllForFeed({ signal })
        : await this.posts.getAllForOwner(ownerId, { signal });

    const target = options.target === undefined ? undefined : this.registry.normalize([options.target])[0];
    return result.map((posts) =>
      posts.filter(
        (post) =>
          (!target || post.targets.includes(target)) &&
          matchesPresence(Boolean(post.link), options.filterByLinks) &&
          matchesPresence((post.images?.length ?? 0) > 0, options.filterByImages)
      )
    );
  }
}
