import { describe, expect, it } from 'vitest';
import { getEnv, getPipelineConfig } from '../src/env.js';

describe('getEnv', () => {
  it('applies defaults', () => {
    const env = getEnv({});
    expect(env).toMatchObject({
      PORT: 4000,
      CACHE_PRIMARY: 'firestore',
      ADAPTERS: 'zap,vivareal',
      ADAPTER_TIMEOUT_MS: 8000,
      FETCH_BUDGET_MS: 12000,
      FALLBACK_DETERMINISTIC: true,
      PERSISTENCE_ENABLED: true,
      LOG_LEVEL: 'info'
    });
  });

  it('parses flags and numbers', () => {
    const env = getEnv({ FALLBACK_DETERMINISTIC: '0', PERSISTENCE_ENABLED: 'false', FETCH_CONCURRENCY: '2' });
    expect(env.FALLBACK_DETERMINISTIC).toBe(false);
    expect(env.PERSISTENCE_ENABLED).toBe(false);
    expect(env.FETCH_CONCURRENCY).toBe(2);
  });

  it('rejects an adapter timeout that does not fit in the budget', () => {
    expect(() => getEnv({ ADAPTER_TIMEOUT_MS: '5000', FETCH_BUDGET_MS: '5000' })).toThrow('ADAPTER_TIMEOUT_MS');
  });

  it('rejects malformed values', () => {
    expect(() => getEnv({ CACHE_PRIMARY: 'redis' })).toThrow('Invalid environment variables');
  });
});

describe('getPipelineConfig', () => {
  it('groups settings and normalizes the adapter list', () => {
    const config = getPipelineConfig(getEnv({ ADAPTERS: ' ZAP, vivareal,zap,', CACHE_TTL_LIVE_MS: '60000' }));
    expect(config.adapters).toEqual(['zap', 'vivareal']);
    expect(config.cache.ttl).toEqual({ liveMs: 60000, partialMs: 120000, fallbackMs: 30000 });
    expect(config.fetch.retry).toEqual({ maxAttempts: 3, baseDelayMs: 250, maxDelayMs: 2000 });
    expect(config.dedup).toEqual({ priceTolerance: 0.02, sizeTolerance: 0.05 });
  });
});
