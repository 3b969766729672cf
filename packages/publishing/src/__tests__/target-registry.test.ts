import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { TargetRegistry } from '../target-registry.js';
import type { PublishTarget } from '../types.js';

function target(name: string, displayName: string, configured = true): PublishTarget {
  return {
    name,
    displayName,
    isConfigured: () => configured,
    publish: () => Promise.resolve(ok({ module: name, messages: [] })),
  };
}

describe('TargetRegistry', () => {
  it('normalizes names and keeps the first occurrence order', () => {
    const registry = new TargetRegistry();

    expect(registry.normalize([' Mastodon', 'FEED', 'mastodon', '', 'rss', 'LinkedIn'])).toEqual([
      'mastodon',
      'feed',
      'linkedin',
    ]);
    expect(registry.normalize(null)).toEqual([]);
  });

  it('passes names shared with Object.prototype through untouched', () => {
    const registry = new TargetRegistry();

    expect(registry.normalize(['constructor', '__proto__', 'toString'])).toEqual([
      'constructor',
      '__proto__',
      'tostring',
    ]);
    expect(registry.displayName('constructor')).toBe('Constructor');
    expect(registry.resolve('__proto__')).toEqual({
      kind: 'unconfigured',
      name: '__proto__',
      displayName: '__proto__',
    });
  });

  it('uses custom aliases', () => {
    const registry = new TargetRegistry([], { x: 'twitter' });

    expect(registry.normalize(['X', 'rss'])).toEqual(['twitter', 'rss']);
  });

  it('resolves configured, unconfigured and unknown targets', () => {
    const mastodon = target('mastodon', 'Mastodon');
    const registry = new TargetRegistry([mastodon, target('bluesky', 'Bluesky Social', false)]);

    expect(registry.resolve('mastodon')).toEqual({ kind: 'configured', name: 'mastodon', target: mastodon });
    expect(registry.resolve('bluesky')).toEqual({
      kind: 'unconfigured',
      name: 'bluesky',
      displayName: 'Bluesky Social',
    });
    expect(registry.resolve('linkedin')).toEqual({ kind: 'unconfigured', name: 'linkedin', displayName: 'LinkedIn' });
    expect(registry.resolve('pixelfed')).toEqual({ kind: 'unconfigured', name: 'pixelfed', displayName: 'Pixelfed' });
  });

  it('rejects duplicate registrations', () => {
    const registry = new TargetRegistry([target('feed', 'Feed')]);

    expect(() => registry.register(target('Feed', 'Other feed'))).toThrow(
      'Target "feed" is already registered. Each target must have a unique name.'
    );
    expect(registry.getNames()).toEqual(['feed']);
  });
});
