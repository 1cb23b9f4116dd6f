import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ValidationCache, cacheKey, CACHE_KEY_PREFIX } from '../src/validation/cache.js';
import { performed, notPerformed } from '../src/validation/types.js';

const STORAGE = 'Microsoft.Storage/storageAccounts';
const VM = 'Microsoft.Compute/virtualMachines';

describe('cacheKey', () => {
  it('should namespace by type before name', () => {
    expect(cacheKey(STORAGE, 'storageacct01')).toBe(
      'tenant-validation:microsoft.storage%2Fstorageaccounts:storageacct01'
    );
  });

  it('should be case-insensitive', () => {
    expect(cacheKey(STORAGE, 'StorageAcct01')).toBe(cacheKey(STORAGE.toUpperCase(), 'storageacct01'));
  });

  it('should not collide when a separator appears inside a part', () => {
    expect(cacheKey('a:b', 'c')).not.toBe(cacheKey('a', 'b:c'));
  });
});

describe('ValidationCache', () => {
  let cache: ValidationCache;

  beforeEach(() => {
    cache = new ValidationCache(3);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('basic operations', () => {
    it('should store and retrieve results', () => {
      const result = performed(['/subscriptions/sub-1/id-1']);
      cache.set(STORAGE, 'storageacct01', result, 60);

      expect(cache.get(STORAGE, 'storageacct01')).toBe(result);
    });

    it('should return undefined for unknown keys', () => {
      expect(cache.get(STORAGE, 'missing')).toBeUndefined();
    });

    it('should keep entries of different types apart', () => {
      cache.set(STORAGE, 'shared-name', performed(['id-storage']), 60);

      expect(cache.get(VM, 'shared-name')).toBeUndefined();
    });
  });

  describe('expiry', () => {
    it('should miss once the TTL has passed', () => {
      vi.useFakeTimers();
      cache.set(STORAGE, 'storageacct01', performed([]), 5);

      vi.advanceTimersByTime(4 * 60_000);
      expect(cache.get(STORAGE, 'storageacct01')).toBeDefined();

      vi.advanceTimersByTime(60_000);
      expect(cache.get(STORAGE, 'storageacct01')).toBeUndefined();
      expect(cache.size()).toBe(0);
    });

    it('should prune expired entries', () => {
      vi.useFakeTimers();
      cache.set(STORAGE, 'short', performed([]), 1);
      cache.set(STORAGE, 'long', performed([]), 60);

      vi.advanceTimersByTime(2 * 60_000);

      expect(cache.cleanupExpired()).toBe(1);
      expect(cache.size()).toBe(1);
      expect(cache.get(STORAGE, 'long')).toBeDefined();
    });
  });

  describe('LRU eviction', () => {
    it('should evict the least recently used entry at capacity', () => {
      cache.set(STORAGE, 'a', performed([]), 60);
      cache.set(STORAGE, 'b', performed([]), 60);
      cache.set(STORAGE, 'c', performed([]), 60);

      cache.get(STORAGE, 'a');
      cache.set(STORAGE, 'd', performed([]), 60);

      expect(cache.size()).toBe(3);
      expect(cache.get(STORAGE, 'a')).toBeDefined();
      expect(cache.get(STORAGE, 'b')).toBeUndefined();
    });

    it('should not evict when updating an existing key', () => {
      cache.set(STORAGE, 'a', performed([]), 60);
      cache.set(STORAGE, 'b', performed([]), 60);
      cache.set(STORAGE, 'c', performed([]), 60);

      const updated = performed(['id-a']);
      cache.set(STORAGE, 'a', updated, 60);

      expect(cache.size()).toBe(3);
      expect(cache.get(STORAGE, 'a')).toBe(updated);
      expect(cache.get(STORAGE, 'b')).toBeDefined();
    });
  });

  describe('invalidateAll', () => {
    it('should remove every entry under the prefix', () => {
      cache.set(STORAGE, 'a', performed([]), 60);
      cache.set(VM, 'b', notPerformed('x'), 60);

      expect(cache.invalidateAll(`${CACHE_KEY_PREFIX}*`)).toBe(2);
      expect(cache.size()).toBe(0);
    });

    it('should only remove keys matching a narrower prefix', () => {
      cache.set(STORAGE, 'a', performed([]), 60);
      cache.set(VM, 'b', performed([]), 60);

      const removed = cache.invalidateAll(`${CACHE_KEY_PREFIX}microsoft.compute`);

      expect(removed).toBe(1);
      expect(cache.get(STORAGE, 'a')).toBeDefined();
      expect(cache.get(VM, 'b')).toBeUndefined();
    });

    it('should drop writes tagged with an older generation', () => {
      const generation = cache.generation;
      cache.invalidateAll();

      expect(cache.set(STORAGE, 'late', performed([]), 60, generation)).toBe(false);
      expect(cache.get(STORAGE, 'late')).toBeUndefined();
      expect(cache.set(STORAGE, 'fresh', performed([]), 60)).toBe(true);
    });
  });
});
