import type { PublishTarget } from './types.js';

// keyed by untrusted target names, hence a Map
const KNOWN_DISPLAY_NAMES: ReadonlyMap<string, string> = new Map([
  ['bluesky', 'Bluesky'],
  ['feed', 'Feed'],
  ['linkedin', 'LinkedIn'],
  ['mastodon', 'Mastodon'],
  ['twitter', 'Twitter'],
]);

const DEFAULT_ALIASES: Record<string, string> = {
  rss: 'feed',
};

export type ResolvedTarget =
  | { kind: 'configured'; name: string; target: PublishTarget }
  | { kind: 'unconfigured'; name: string; displayName: string };

/**
 * Publish targets by normalized name.
 */
export class TargetRegistry {
  private readonly targets = new Map<string, PublishTarget>();
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(targets: readonly PublishTarget[] = [], aliases: Record<string, string> = DEFAULT_ALIASES) {
    this.aliases = new Map(Object.entries(aliases));
    for (const target of targets) {
      this.register(target);
    }
  }

  register(target: PublishTarget): void {
    const name = target.name.toLowerCase();
    if (this.targets.has(name)) {
      throw new Error(`Target "${name}" is already registered. Each target must have a unique name.`);
    }
    this.targets.set(name, target);
  }

  /**
   * Trim, lower-case and resolve aliases, dropping blanks and duplicates.
   * First occurrences keep their position.
   */
  normalize(names: readonly string[] | null | undefined): string[] {
    const normalized: string[] = [];
    for (const raw of names ?? []) {
      const lower = raw.trim().toLowerCase();
      if (!lower) continue;
      const name = this.aliases.get(lower) ?? lower;
      if (!normalized.includes(name)) {
        normalized.push(name);
      }
    }
    return normalized;
  }

  resolve(name: string): ResolvedTarget {
    const target = this.targets.get(name);
    if (target?.isConfigured()) {
      return { kind: 'configured', name, target };
    }
    return { kind: 'unconfigured', name, displayName: this.displayName(name) };
  }

  displayName(name: string): string {
    const known = this.targets.get(name)?.displayName ?? KNOWN_DISPLAY_NAMES.get(name);
    return known ?? name.charAt(0).toUpperCase() + name.slice(1);
  }

  getNames(): string[] {
    return Array.from(this.targets.keys());
  }
}
