import { CacheUnavailableError } from '../errors.js';
import { createLogger } from '../logger.js';
import { isExpired, type CacheStore, type StoredEntry } from './store.js';

const logger = createLogger('cache:memory');

export interface MemoryCacheStoreOptions {
  maxEntries?: number;
  /** 0 disables the periodic sweep; expiry is then only enforced on read. */
  sweepIntervalMs?: number;
  now?: () => number;
}

/** In-process tier. Least recently used entries are evicted past `maxEntries`. */
export class MemoryCacheStore implements CacheStore {
  readonly name = 'memory';

  private readonly entries = new Map<string, StoredEntry>();
  private readonly maxEntries: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | undefined;
  private closed = false;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 500);
    this.now = options.now ?? Date.now;

    const interval = options.sweepIntervalMs ?? 0;
    if (interval > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), interval);
      this.sweepTimer.unref();
    }
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<StoredEntry | undefined> {
    this.assertOpen();
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (isExpired(entry, this.now())) {
      this.entries.delete(key);
      return undefined;
    }

    // Re-insert to mark as most recently used.
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  async set(entry: StoredEntry): Promise<void> {
    this.assertOpen();
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async ping(): Promise<boolean> {
    return !this.closed;
  }

  /** Drop every expired entry. Returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) logger.debug('sweep removed expired entries', { removed, remaining: this.entries.size });
    return removed;
  }

  async close(): Promise<void> {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
    this.entries.clear();
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) throw new CacheUnavailableError(this.name, 'store is closed');
  }
}
