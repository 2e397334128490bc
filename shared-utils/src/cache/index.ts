/**
 * Generic in-memory cache with TTL support
 *
 * Matches the service cache ports: get<T>(key) and set(key, val, ttlSec).
 * Expired entries are dropped when read.
 */

type CacheEntry = {
  value: unknown;
  expiresAt: number; // epoch ms
};

export class MemoryCache {
  private store = new Map<string, CacheEntry>();

  constructor(private now: () => number = Date.now) {}

  async get<T = unknown>(key: string): Promise<T | null> {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    // Values are stored as given; callers read back the type they wrote.
    return entry.value as T;
  }

  async set(key: string, val: unknown, ttlSec: number): Promise<void> {
    const expiresAt = this.now() + ttlSec * 1000;
    this.store.set(key, { value: val, expiresAt });
  }
}
