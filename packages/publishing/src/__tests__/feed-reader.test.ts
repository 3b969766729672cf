import type { DataContext, PostPayload } from '@postcast/data';
import { createTestDataContext } from '@postcast/data/test-utils';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FeedReader, type ListPostsOptions } from '../feed-reader.js';

const ALICE = 'user-alice';
const BOB = 'user-bob';
const START = Date.UTC(2024, 2, 1, 9, 0, 0);

describe('FeedReader', () => {
  let context: DataContext;
  let reader: FeedReader;

  beforeEach(async () => {
    let clock = START;
    let counter = 0;
    context = await createTestDataContext({
      now: () => new Date((clock += 1000)),
      generateUuid: () => `post-${++counter}`,
    });
    reader = new FeedReader(context.posts);

    const seed: [PostPayload, string[], string][] = [
      [{ content: 'plain' }, ['feed'], ALICE],
      [{ content: 'with link', link: 'https://example.test/a' }, ['feed', 'mastodon'], ALICE],
      [{ content: 'with image', images: ['upload-1'] }, ['feed'], BOB],
      [{ content: 'both', link: 'https://example.test/b', images: ['upload-2'] }, ['mastodon'], ALICE],
    ];
    for (const [payload, targets, owner] of seed) {
      (await context.posts.create(payload, targets, owner))._unsafeUnwrap();
    }
  });

  afterEach(async () => {
    await context.close();
  });

  async function list(options: ListPostsOptions): Promise<string[]> {
    return (await reader.listPosts(options))._unsafeUnwrap().map((post) => post.uuid);
  }

  it('lists every owner newest first', async () => {
    expect(await list({})).toEqual(['post-4', 'post-3', 'post-2', 'post-1']);
  });

  it('lists one owner', async () => {
    expect(await list({ ownerId: ALICE })).toEqual(['post-4', 'post-2', 'post-1']);
    expect(await list({ ownerId: 'user-nobody' })).toEqual([]);
  });

  it('filters by target, ignoring case', async () => {
    expect(await list({ target: ' Mastodon' })).toEqual(['post-4', 'post-2']);
  });

  it('resolves target aliases the way publishing does', async () => {
    expect(await list({ target: 'RSS' })).toEqual(['post-3', 'post-2', 'post-1']);
  });

  it('treats a blank target as no filter', async () => {
    expect(await list({ ownerId: ALICE, target: '  ' })).toEqual(['post-4', 'post-2', 'post-1']);
  });

  it('filters by link presence', async () => {
    expect(await list({ filterByLinks: 'include' })).toEqual(['post-4', 'post-2']);
    expect(await list({ filterByLinks: 'exclude' })).toEqual(['post-3', 'post-1']);
  });

  it('filters by image presence', async () => {
    expect(await list({ ownerId: ALICE, filterByImages: 'include' })).toEqual(['post-4']);
    expect(await list({ filterByImages: 'exclude' })).toEqual(['post-2', 'post-1']);
  });

  it('combines filters', async () => {
    expect(await list({ target: 'feed', filterByLinks: 'exclude' })).toEqual(['post-3', 'post-1']);
  });
});
