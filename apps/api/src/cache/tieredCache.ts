import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { CacheEntry, CacheHealth, CacheTier, ResultSet } from '../types.js';
import { withTimeout } from '../utils/timing.js';
import { isExpired, type CacheStore, type StoredEntry } from './store.js';

const logger = createLogger('cache');

export interface TieredCacheOptions {
  /** Fast remote tier; `null` runs the cache from the secondary only. */
  primary: CacheStore | null;
  secondary: CacheStore;
  primaryTimeoutMs: number;
  now?: () => number;
}

/**
 * Two-level cache. Reads go to the primary first and fall through to the
 * secondary when the primary misses or is unreachable; writes go to both.
 * No method ever rejects: a dead cache behaves like an empty one.
 */
export class TieredCache {
  private readonly primary: CacheStore | null;
  private readonly secondary: CacheStore;
  private readonly primaryTimeoutMs: number;
  private readonly now: () => number;
  private primaryDegraded = false;

  constructor(options: TieredCacheOptions) {
    this.primary = options.primary;
    this.secondary = options.secondary;
    this.primaryTimeoutMs = options.primaryTimeoutMs;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    if (this.primary) {
      try {
        const stored = await withTimeout(this.primary.get(key), this.primaryTimeoutMs, `${this.primary.name} get`);
        this.markPrimaryUp();
        const entry = this.fresh(this.primary, stored, 'primary');
        if (entry) return entry;
      } catch (err) {
        this.markPrimaryDown('get', key, err);
      }
    }

    try {
      const stored = await this.secondary.get(key);
      return this.fresh(this.secondary, stored, 'secondary');
    } catch (err) {
      logger.warn('secondary read failed; treating as miss', { key, error: errorMessage(err) });
      return undefined;
    }
  }

  async set(key: string, value: ResultSet, ttlMs: number): Promise<void> {
    const entry: StoredEntry = { key, value, createdAt: this.now(), ttlMs };

    const writes: Array<{ tier: CacheTier; store: CacheStore; write: Promise<void> }> = [];
    if (this.primary) {
      writes.push({
        tier: 'primary',
        store: this.primary,
        write: withTimeout(this.primary.set(entry), this.primaryTimeoutMs, `${this.primary.name} set`)
      });
    }
    writes.push({ tier: 'secondary', store: this.secondary, write: this.secondary.set(entry) });

    const results = await Promise.allSettled(writes.map((w) => w.write));
    let stored = 0;
    results.forEach((result, i) => {
      const { tier, store } = writes[i];
      if (result.status === 'fulfilled') {
        stored++;
        if (tier === 'primary') this.markPrimaryUp();
        return;
      }
      if (tier === 'primary') {
        this.markPrimaryDown('set', key, result.reason);
      } else {
        logger.warn('secondary write failed', { key, store: store.name, error: errorMessage(result.reason) });
      }
    });

    if (stored === 0) {
      logger.error('cache write dropped: no tier accepted it', { key });
    }
  }

  async delete(key: string): Promise<void> {
    const stores = [this.primary, this.secondary].filter((s): s is CacheStore => s !== null);
    await Promise.all(stores.map((store) => this.evict(store, key)));
  }

  async healthCheck(): Promise<CacheHealth> {
    const [primaryUp, secondaryUp] = await Promise.all([
      this.primary ? this.ping(this.primary, this.primaryTimeoutMs) : Promise.resolve(false),
      this.ping(this.secondary)
    ]);
    return { primaryUp, secondaryUp };
  }

  async close(): Promise<void> {
    const stores = [this.primary, this.secondary].filter((s): s is CacheStore => s !== null);
    const results = await Promise.allSettled(stores.map((store) => store.close()));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        logger.warn('failed to close cache store', { store: stores[i].name, error: errorMessage(result.reason) });
      }
    });
  }

  private fresh(store: CacheStore, stored: StoredEntry | undefined, tier: CacheTier): CacheEntry | undefined {
    if (!stored) return undefined;
    if (isExpired(stored, this.now())) {
      void this.evict(store, stored.key);
      return undefined;
    }
    return { ...stored, tier };
  }

  private async evict(store: CacheStore, key: string): Promise<void> {
    try {
      await store.delete(key);
    } catch (err) {
      logger.debug('evict failed', { key, store: store.name, error: errorMessage(err) });
    }
  }

  private async ping(store: CacheStore, timeoutMs?: number): Promise<boolean> {
    try {
      const check = store.ping();
      return await (timeoutMs ? withTimeout(check, timeoutMs, `${store.name} ping`) : check);
    } catch (err) {
      logger.warn('health check failed', { store: store.name, error: errorMessage(err) });
      return false;
    }
  }

  private markPrimaryDown(op: 'get' | 'set', key: string, err: unknown): void {
    if (!this.primaryDegraded) {
      logger.warn('primary cache unavailable; serving from secondary (degraded mode)', {
        op,
        key,
        error: errorMessage(err)
      });
    } else {
      logger.debug('primary cache still unavailable', { op, key, error: errorMessage(err) });
    }
    this.primaryDegraded = true;
  }

  private markPrimaryUp(): void {
    if (this.primaryDegraded) {
      logger.info('primary cache recovered; leaving degraded mode');
    }
    this.primaryDegraded = false;
  }
}
