import { DatabaseError } from '@postcast/sqlite';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { DataContext } from '../../data-context.js';
import { createTestDataContext } from '../../test-utils.js';

const ALICE = 'user-alice';
const BOB = 'user-bob';
const START = Date.UTC(2024, 6, 15, 8, 30, 0);

describe('PostRepository', () => {
  let context: DataContext;
  let clock: number;

  beforeEach(async () => {
    clock = START;
    let counter = 0;
    context = await createTestDataContext({
      now: () => new Date(clock),
      generateUuid: () => `post-${++counter}`,
    });
  });

  afterEach(async () => {
    await context.close();
  });

  it('stores content and targets in one document', async () => {
    const post = (
      await context.posts.create(
        { content: 'Release notes are out #changelog', link: 'https://example.org/notes', tags: ['changelog'] },
        ['feed', 'mastodon'],
        ALICE
      )
    )._unsafeUnwrap();

    expect(post).toEqual({
      uuid: 'post-1',
      ownerId: ALICE,
      createdAt: new Date(START),
      targets: ['feed', 'mastodon'],
      content: 'Release notes are out #changelog',
      link: 'https://example.org/notes',
      tags: ['changelog'],
    });

    const document = (await context.documents.searchByUuid('post-1'))._unsafeUnwrap();
    expect(document?.kind).toBe('post');
    expect(document?.searchKey).toBe('post:post-1');
    expect(document?.tags).toEqual([
      { name: 'feed', kind: 'target' },
      { name: 'mastodon', kind: 'target' },
      { name: 'changelog', kind: 'label' },
    ]);
  });

  it('reads a post back for its owner', async () => {
    await context.posts.create({ content: 'hello', language: 'en', images: ['upload-1'] }, ['feed'], ALICE);

    const post = (await context.posts.getByUuid('post-1', ALICE))._unsafeUnwrap();

    expect(post).toEqual({
      uuid: 'post-1',
      ownerId: ALICE,
      createdAt: new Date(START),
      targets: ['feed'],
      content: 'hello',
      language: 'en',
      images: ['upload-1'],
    });
  });

  it('denies lookups by another owner', async () => {
    await context.posts.create({ content: 'private to alice' }, ['feed'], ALICE);

    expect((await context.documents.searchByUuid('post-1'))._unsafeUnwrap()).toBeDefined();
    expect((await context.posts.getByUuid('post-1', BOB))._unsafeUnwrap()).toBeUndefined();
  });

  it('ignores documents of another kind', async () => {
    await context.documents.createOrUpdate({ kind: 'note', payload: '{"content":"note"}', ownerId: ALICE });

    expect((await context.posts.getByUuid('post-1', ALICE))._unsafeUnwrap()).toBeUndefined();
  });

  it('lists only the owner posts, newest first', async () => {
    await context.posts.create({ content: 'alice 1' }, ['feed'], ALICE);
    clock += 1000;
    await context.posts.create({ content: 'bob 1' }, ['feed'], BOB);
    clock += 1000;
    await context.posts.create({ content: 'alice 2' }, ['feed', 'bluesky'], ALICE);

    const posts = (await context.posts.getAllForOwner(ALICE))._unsafeUnwrap();

    expect(posts.map((post) => [post.content, post.targets])).toEqual([
      ['alice 2', ['feed', 'bluesky']],
      ['alice 1', ['feed']],
    ]);
  });

  it('lists every owner for the feed', async () => {
    await context.posts.create({ content: 'alice' }, ['feed'], ALICE);
    clock += 1000;
    await context.posts.create({ content: 'bob' }, ['feed'], BOB);

    const posts = (await context.posts.getAllForFeed())._unsafeUnwrap();

    expect(posts.map((post) => post.content)).toEqual(['bob', 'alice']);
  });

  it('fails with a DatabaseError when a stored payload does not decode', async () => {
    await context.documents.createOrUpdate({ kind: 'post', payload: 'not json', ownerId: ALICE });
    await context.documents.createOrUpdate({ kind: 'post', payload: '{"link":"x"}', ownerId: BOB });

    const invalidJson = (await context.posts.getAllForOwner(ALICE))._unsafeUnwrapErr();
    const invalidShape = (await context.posts.getAllForOwner(BOB))._unsafeUnwrapErr();

    expect(invalidJson).toBeInstanceOf(DatabaseError);
    expect(invalidJson.message).toMatch(/^Post post-1 has invalid JSON/);
    expect(invalidShape.message).toMatch(/^Post post-2 failed validation/);
  });
});
