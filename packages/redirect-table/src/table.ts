import {randomUUID} from 'node:crypto';

import {createNoopLogger, type BoundLogger} from '@hostplane/logging';

import {
  RedirectTableSettingsSchema,
  type RedirectEntry,
  type RedirectFallback,
  type RedirectResolution,
  type RedirectTableOptions,
  type RedirectTableSettings
} from './contracts';
import {RedirectTableError} from './errors';

type StoredEntry = {
  upstreamPrefix: string;
  expiresAtMs: number;
  allocation: string;
};

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const hashKey = (key: string) => {
  let hash = FNV_OFFSET_BASIS;
  for (let index = 0; index < key.length; index += 1) {
    hash ^= key.charCodeAt(index);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
};

const allocationKey = (sessionPrefix: string, upstreamPrefix: string) => `${sessionPrefix}\n${upstreamPrefix}`;

/**
 * Every prefix of `path` that ends in `/`, longest first. Redirect keys always
 * end in `/`, so these are the only keys that can match the path.
 */
export const slashPrefixesOf = (path: string): string[] => {
  const prefixes: string[] = [];
  let index = path.lastIndexOf('/');
  while (index >= 0) {
    prefixes.push(path.slice(0, index + 1));
    index = index === 0 ? -1 : path.lastIndexOf('/', index - 1);
  }
  return prefixes;
};

const assertPrefix = (label: string, value: string, {rooted}: {rooted: boolean}) => {
  if (value.length === 0 || !value.endsWith('/') || (rooted && !value.startsWith('/'))) {
    throw new RedirectTableError(
      'invalid_prefix',
      rooted ? `${label} must start and end with "/"` : `${label} must end with "/"`
    );
  }
};

/**
 * Expiring prefix-to-upstream map consulted before the static routing table.
 *
 * Entries live in `shardCount` maps picked by key hash. Lookups probe the
 * `/`-terminated prefixes of the requested path longest first, so a lookup
 * costs one map probe per path segment regardless of how many redirects exist.
 * Every method is synchronous: a caller sees an entry either fully written or
 * absent.
 */
export class RedirectTable {
  private readonly settings: RedirectTableSettings;
  private readonly shards: Map<string, StoredEntry>[];
  private readonly allocations = new Map<string, string>();
  private readonly now: () => number;
  private readonly generateId: () => string;
  private readonly logger: BoundLogger;
  private lastSweepAtMs = Number.NEGATIVE_INFINITY;

  public constructor(options: RedirectTableOptions = {}) {
    const {now, generateId, logger, ...settings} = options;
    this.settings = RedirectTableSettingsSchema.parse(settings);
    this.shards = Array.from({length: this.settings.shardCount}, () => new Map<string, StoredEntry>());
    this.now = now ?? Date.now;
    this.generateId = generateId ?? randomUUID;
    this.logger = (logger ?? createNoopLogger()).child({component: 'redirect.table'});
  }

  public get ttlSeconds() {
    return this.settings.ttlSeconds;
  }

  public resolve(path: string, fallback: RedirectFallback): RedirectResolution {
    if (!path.startsWith('/')) {
      throw new RedirectTableError('invalid_path', 'Resolved paths must start with "/"');
    }

    const now = this.now();
    this.sweepIfDue(now);

    for (const candidate of slashPrefixesOf(path)) {
      const entry = this.shardFor(candidate).get(candidate);
      if (!entry || entry.expiresAtMs <= now) {
        continue;
      }

      entry.expiresAtMs = now + this.ttlMs();
      return {
        upstream: entry.upstreamPrefix,
        remainder: path.slice(candidate.length - 1),
        key: candidate
      };
    }

    return {upstream: fallback.upstream, remainder: fallback.remainder, key: null};
  }

  public allocate(sessionPrefix: string, upstreamPrefix: string): string {
    assertPrefix('sessionPrefix', sessionPrefix, {rooted: true});
    assertPrefix('upstreamPrefix', upstreamPrefix, {rooted: false});

    const now = this.now();
    this.sweepIfDue(now);

    const allocation = allocationKey(sessionPrefix, upstreamPrefix);
    const existingKey = this.allocations.get(allocation);
    if (existingKey !== undefined) {
      const existing = this.shardFor(existingKey).get(existingKey);
      if (existing && existing.expiresAtMs > now && existing.upstreamPrefix === upstreamPrefix) {
        existing.expiresAtMs = now + this.ttlMs();
        this.logger.debug({event: 'redirect.allocate.reused', metadata: {key: existingKey}});
        return existingKey;
      }
    }

    const key = `${sessionPrefix}redir-${this.generateId()}/`;
    const shard = this.shardFor(key);
    const displaced = shard.get(key);
    if (displaced) {
      this.forgetAllocation(key, displaced);
    }

    shard.set(key, {upstreamPrefix, expiresAtMs: now + this.ttlMs(), allocation});
    this.allocations.set(allocation, key);
    this.logger.debug({event: 'redirect.allocate.minted', metadata: {key, upstream_prefix: upstreamPrefix}});
    return key;
  }

  public flush(sessionPrefix: string): number {
    assertPrefix('sessionPrefix', sessionPrefix, {rooted: true});

    let removed = 0;
    for (const shard of this.shards) {
      for (const [key, entry] of shard) {
        if (key.startsWith(sessionPrefix)) {
          shard.delete(key);
          this.forgetAllocation(key, entry);
          removed += 1;
        }
      }
    }

    if (removed > 0) {
      this.logger.info({event: 'redirect.flush.completed', metadata: {session_prefix: sessionPrefix, removed}});
    }
    return removed;
  }

  /** Drops every entry already expired at the time of the call. */
  public sweep(): number {
    const now = this.now();
    this.lastSweepAtMs = now;

    let removed = 0;
    for (const shard of this.shards) {
      for (const [key, entry] of shard) {
        if (entry.expiresAtMs <= now) {
          shard.delete(key);
          this.forgetAllocation(key, entry);
          removed += 1;
        }
      }
    }

    if (removed > 0) {
      this.logger.debug({event: 'redirect.sweep.completed', metadata: {removed}});
    }
    return removed;
  }

  public size(): number {
    const now = this.now();
    let live = 0;
    for (const shard of this.shards) {
      for (const entry of shard.values()) {
        if (entry.expiresAtMs > now) {
          live += 1;
        }
      }
    }
    return live;
  }

  public entries(): RedirectEntry[] {
    const now = this.now();
    const snapshot: RedirectEntry[] = [];
    for (const shard of this.shards) {
      for (const [key, entry] of shard) {
        if (entry.expiresAtMs > now) {
          snapshot.push({key, upstreamPrefix: entry.upstreamPrefix, expiresAtMs: entry.expiresAtMs});
        }
      }
    }
    return snapshot.sort((left, right) => left.key.localeCompare(right.key));
  }

  private ttlMs() {
    return this.settings.ttlSeconds * 1_000;
  }

  private shardFor(key: string): Map<string, StoredEntry> {
    const shard = this.shards[hashKey(key) % this.shards.length];
    if (!shard) {
      throw new RedirectTableError('invalid_prefix', 'Redirect table has no shards');
    }
    return shard;
  }

  private sweepIfDue(now: number) {
    if (now - this.lastSweepAtMs >= this.settings.sweepIntervalMs) {
      this.sweep();
    }
  }

  private forgetAllocation(key: string, entry: StoredEntry) {
    if (this.allocations.get(entry.allocation) === key) {
      this.allocations.delete(entry.allocation);
    }
  }
}
