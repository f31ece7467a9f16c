import { ICache } from '@/utils/cache';

/** In-process stand-in for `SqliteCache`, for tests that need no database. */
export class MemoryCache implements ICache<unknown> {
  readonly entries = new Map<string, { value: unknown; expires: number }>();

  async get(key: string): Promise<unknown | null> {
    const entry = this.entries.get(key);
    if (!entry || Date.now() > entry.expires) {
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: unknown, ttlSeconds = 600): Promise<void> {
    this.entries.set(key, { value, expires: Date.now() + ttlSeconds * 1000 });
  }
}
