import { createHash } from 'node:crypto';

import { config } from './config.js';
import { stableStringify } from './json.js';
import { logDebug } from './observability.js';

interface CacheEntry<T> {
  readonly value: T;
  readonly insertedAt: number;
}

export interface ContentCacheOptions {
  readonly enabled?: boolean;
  readonly ttlMs?: number;
  readonly maxEntries?: number;
  /** Milliseconds since the epoch; injectable for tests. */
  readonly now?: () => number;
}

export type CacheKeyParts = Readonly<Record<string, unknown>>;

export function createCacheFingerprint(parts: CacheKeyParts): string {
  return createHash('sha256').update(stableStringify(parts)).digest('hex');
}

/**
 * In-memory TTL cache keyed by a fingerprint of the key parts. Over
 * capacity, the oldest insertions are evicted first.
 */
export class ContentCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly enabled: boolean;
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: ContentCacheOptions = {}) {
    this.enabled = options.enabled ?? config.cache.enabled;
    this.ttlMs = options.ttlMs ?? config.cache.ttlSeconds * 1000;
    this.maxEntries = Math.max(1, options.maxEntries ?? config.cache.maxEntries);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(parts: CacheKeyParts): T | undefined {
    if (!this.enabled) return undefined;

    const key = createCacheFingerprint(parts);
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.insertedAt >= this.ttlMs) {
      this.entries.delete(key);
      logDebug('Cache entry expired', { key });
      return undefined;
    }
    return entry.value;
  }

  set(parts: CacheKeyParts, value: T): void {
    if (!this.enabled) return;

    const key = createCacheFingerprint(parts);
    // Re-inserting moves the key to the end of the Map's insertion order.
    this.entries.delete(key);
    this.entries.set(key, { value, insertedAt: this.now() });
    this.evictOverflow();
  }

  clear(): void {
    this.entries.clear();
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.findOldestKey();
      if (oldest === undefined) return;
      this.entries.delete(oldest);
      logDebug('Cache entry evicted', { key: oldest });
    }
  }

  private findOldestKey(): string | undefined {
    let oldestKey: string | undefined;
    let oldestAt = Number.POSITIVE_INFINITY;
    for (const [key, entry] of this.entries) {
      if (entry.insertedAt < oldestAt) {
        oldestAt = entry.insertedAt;
        oldestKey = key;
      }
    }
    return oldestKey;
  }
}
