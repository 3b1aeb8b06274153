import { describe, expect, it } from 'vitest';
import { MemoryCacheStore } from '../src/cache/memoryStore.js';
import type { CacheStore, StoredEntry } from '../src/cache/store.js';
import { TieredCache } from '../src/cache/tieredCache.js';
import { makeResultSet } from './helpers.js';

/** In-memory store whose availability the test controls. */
class FlakyStore implements CacheStore {
  readonly name = 'flaky';
  readonly entries = new Map<string, StoredEntry>();
  mode: 'up' | 'down' | 'hang' = 'up';
  closed = false;

  private async gate(): Promise<void> {
    if (this.mode === 'down') throw new Error('connection refused');
    if (this.mode === 'hang') await new Promise<never>(() => undefined);
  }

  async get(key: string) {
    await this.gate();
    return this.entries.get(key);
  }

  async set(entry: StoredEntry) {
    await this.gate();
    this.entries.set(entry.key, entry);
  }

  async delete(key: string) {
    await this.gate();
    this.entries.delete(key);
  }

  async ping() {
    await this.gate();
    return true;
  }

  async close() {
    this.closed = true;
  }
}

function setup(now: () => number = () => 0) {
  const primary = new FlakyStore();
  const secondary = new MemoryCacheStore({ now });
  const cache = new TieredCache({ primary, secondary, primaryTimeoutMs: 25, now });
  return { primary, secondary, cache };
}

describe('TieredCache', () => {
  it('writes to both tiers and reads from the primary first', async () => {
    const { primary, secondary, cache } = setup();
    await cache.set('fp_a', makeResultSet({ fingerprint: 'fp_a' }), 1000);

    expect(primary.entries.has('fp_a')).toBe(true);
    expect(secondary.size).toBe(1);

    const hit = await cache.get('fp_a');
    expect(hit?.tier).toBe('primary');
    expect(hit?.value.fingerprint).toBe('fp_a');
  });

  it('consults the secondary on a clean primary miss', async () => {
    const { primary, cache } = setup();
    await cache.set('fp_a', makeResultSet(), 1000);
    primary.entries.clear();

    expect((await cache.get('fp_a'))?.tier).toBe('secondary');
  });

  it('serves from the secondary when the primary is down', async () => {
    const { primary, cache } = setup();
    await cache.set('fp_a', makeResultSet(), 1000);
    primary.mode = 'down';

    expect((await cache.get('fp_a'))?.tier).toBe('secondary');
    expect(await cache.healthCheck()).toEqual({ primaryUp: false, secondaryUp: true });
  });

  it('gives up on a primary that does not answer in time', async () => {
    const { primary, cache } = setup();
    await cache.set('fp_a', makeResultSet(), 1000);
    primary.mode = 'hang';

    const started = Date.now();
    expect((await cache.get('fp_a'))?.tier).toBe('secondary');
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('still stores in the secondary when the primary rejects writes', async () => {
    const { primary, secondary, cache } = setup();
    primary.mode = 'down';
    await cache.set('fp_a', makeResultSet(), 1000);

    expect(secondary.size).toBe(1);
    expect((await cache.get('fp_a'))?.tier).toBe('secondary');
  });

  it('never rejects when no tier accepts a write', async () => {
    const { primary, secondary, cache } = setup();
    primary.mode = 'down';
    await secondary.close();

    await expect(cache.set('fp_a', makeResultSet(), 1000)).resolves.toBeUndefined();
    await expect(cache.get('fp_a')).resolves.toBeUndefined();
  });

  it('treats entries past their TTL as misses', async () => {
    let now = 0;
    const { primary, cache } = setup(() => now);
    await cache.set('fp_a', makeResultSet(), 1000);

    now = 999;
    expect(await cache.get('fp_a')).toBeDefined();

    now = 1000;
    expect(await cache.get('fp_a')).toBeUndefined();
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(primary.entries.has('fp_a')).toBe(false);
  });

  it('runs from the secondary alone without a primary', async () => {
    const secondary = new MemoryCacheStore();
    const cache = new TieredCache({ primary: null, secondary, primaryTimeoutMs: 25 });
    await cache.set('fp_a', makeResultSet(), 1000);

    expect((await cache.get('fp_a'))?.tier).toBe('secondary');
    expect(await cache.healthCheck()).toEqual({ primaryUp: false, secondaryUp: true });
  });

  it('closes every store', async () => {
    const { primary, secondary, cache } = setup();
    await cache.close();
    expect(primary.closed).toBe(true);
    expect(await secondary.ping()).toBe(false);
  });
});
