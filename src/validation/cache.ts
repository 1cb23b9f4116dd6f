import type { ValidationResult } from './types.js';

export const CACHE_KEY_PREFIX = 'tenant-validation:';

export interface CacheEntry {
  key: string;
  value: ValidationResult;
  expiresAt: Date;
}

/**
 * Namespaced by type before name. Both parts are lower-cased (the graph
 * query matches case-insensitively) and URI-encoded so a ':' inside either
 * part cannot collide with the separator.
 */
export function cacheKey(resourceType: string, resourceName: string): string {
  const type = encodeURIComponent(resourceType.toLowerCase());
  const name = encodeURIComponent(resourceName.toLowerCase());
  return `${CACHE_KEY_PREFIX}${type}:${name}`;
}

/**
 * LRU map of validation results with per-entry expiry.
 *
 * `invalidateAll` bumps a generation counter; `set` calls tagged with an
 * older generation are dropped.
 */
export class ValidationCache {
  private cache = new Map<string, CacheEntry>();
  private maxSize: number;
  private currentGeneration = 0;

  constructor(maxSize: number) {
    this.maxSize = maxSize;
  }

  get generation(): number {
    return this.currentGeneration;
  }

  get(resourceType: string, resourceName: string): ValidationResult | undefined {
    const key = cacheKey(resourceType, resourceName);
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= new Date()) {
      this.cache.delete(key);
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  set(
    resourceType: string,
    resourceName: string,
    value: ValidationResult,
    ttlMinutes: number,
    generation: number = this.currentGeneration
  ): boolean {
    if (generation !== this.currentGeneration) {
      return false;
    }

    const key = cacheKey(resourceType, resourceName);
    this.cache.delete(key);

    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next().value;
      if (oldest !== undefined) {
        this.cache.delete(oldest);
      }
    }

    this.cache.set(key, {
      key,
      value,
      expiresAt: new Date(Date.now() + ttlMinutes * 60_000),
    });
    return true;
  }

  /**
   * Remove every key starting with `prefix`. A trailing `*` is accepted as
   * a wildcard marker and ignored.
   */
  invalidateAll(prefix: string = CACHE_KEY_PREFIX): number {
    const match = prefix.endsWith('*') ? prefix.slice(0, -1) : prefix;
    this.currentGeneration++;

    let removed = 0;
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(match)) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  cleanupExpired(): number {
    const now = new Date();
    let deleted = 0;

    for (const [key, entry] of this.cache) {
      if (entry.expiresAt <= now) {
        this.cache.delete(key);
        deleted++;
      }
    }

    return deleted;
  }

  size(): number {
    return this.cache.size;
  }
}
