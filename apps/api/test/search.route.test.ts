import { describe, expect, it, vi } from 'vitest';
import request from 'supertest';
import { createApp } from '../src/app.js';
import { getEnv } from '../src/env.js';
import type { SearchOutcome } from '../src/pipeline/coordinator.js';
import type { CacheHealth, SearchFilters } from '../src/types.js';
import { makeResultSet } from './helpers.js';

function fakeService(outcome: Partial<SearchOutcome> = {}) {
  return {
    searchWithMeta: vi.fn(async (_filters: SearchFilters): Promise<SearchOutcome> => ({
      resultSet: makeResultSet(),
      origin: 'assembled',
      ...outcome
    })),
    cacheHealth: vi.fn(async (): Promise<CacheHealth> => ({ primaryUp: true, secondaryUp: true }))
  };
}

const env = getEnv({ PORT: '4000' });

describe('POST /v1/search', () => {
  it('returns 400 on invalid body', async () => {
    const service = fakeService();
    const res = await request(createApp(service, env)).post('/v1/search').send({ minPrice: -5 });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('VALIDATION_ERROR');
    expect(res.body.details).toEqual(
      expect.arrayContaining([expect.objectContaining({ path: 'city' }), expect.objectContaining({ path: 'minPrice' })])
    );
    expect(service.searchWithMeta).not.toHaveBeenCalled();
  });

  it('returns the assembled result set', async () => {
    const service = fakeService();
    const res = await request(createApp(service, env))
      .post('/v1/search')
      .send({ city: 'São Paulo', minPrice: 300000, maxPrice: 500000, bedrooms: 2 });

    expect(res.status).toBe(200);
    expect(res.headers['x-cache']).toBe('MISS');
    expect(res.body).toMatchObject({ fingerprint: 'fp_test', provenance: 'live', cached: false });
    expect(res.body.records).toHaveLength(1);
    expect(res.body.pagination).toEqual({ page: 1, pageSize: 20 });

    const filters = service.searchWithMeta.mock.calls[0][0];
    expect(filters.price).toEqual({ min: 300000, max: 500000 });
    expect(filters.bedrooms).toEqual({ min: 2, max: 2 });
  });

  it('marks cache hits and shared assemblies', async () => {
    const hit = await request(createApp(fakeService({ origin: 'cache' }), env)).post('/v1/search').send({ city: 'Salvador' });
    expect(hit.headers['x-cache']).toBe('HIT');
    expect(hit.body.cached).toBe(true);

    const shared = await request(createApp(fakeService({ origin: 'in-flight' }), env))
      .post('/v1/search')
      .send({ city: 'Salvador' });
    expect(shared.headers['x-cache']).toBe('SHARED');
    expect(shared.body.cached).toBe(false);
  });

  it('returns 500 when the pipeline throws', async () => {
    const service = fakeService();
    service.searchWithMeta.mockRejectedValueOnce(new Error('reference data missing'));

    const res = await request(createApp(service, env)).post('/v1/search').send({ city: 'Salvador' });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'SEARCH_FAILED', message: 'reference data missing' });
  });
});

describe('GET /v1/search', () => {
  it('reads filters from the query string', async () => {
    const service = fakeService();
    const res = await request(createApp(service, env)).get('/v1/search').query({
      city: 'Rio de Janeiro',
      state: 'RJ',
      maxPrice: '800000',
      propertyType: 'apartment',
      sort: 'price_desc'
    });

    expect(res.status).toBe(200);
    const filters = service.searchWithMeta.mock.calls[0][0];
    expect(filters).toMatchObject({
      city: 'Rio de Janeiro',
      state: 'rj',
      price: { min: null, max: 800000 },
      propertyType: 'apartment',
      sort: 'price_desc'
    });
  });
});

describe('health', () => {
  it('reports liveness', async () => {
    const res = await request(createApp(fakeService(), env)).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('reports cache tiers', async () => {
    const service = fakeService();
    service.cacheHealth.mockResolvedValueOnce({ primaryUp: false, secondaryUp: true });
    const res = await request(createApp(service, env)).get('/health/cache');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, primaryUp: false, secondaryUp: true });
  });

  it('returns 503 when no cache tier is reachable', async () => {
    const service = fakeService();
    service.cacheHealth.mockResolvedValueOnce({ primaryUp: false, secondaryUp: false });
    const res = await request(createApp(service, env)).get('/health/cache');

    expect(res.status).toBe(503);
    expect(res.body.ok).toBe(false);
  });
});

describe('CORS', () => {
  it('only allows configured origins', async () => {
    const restricted = getEnv({ CORS_ORIGIN: 'https://app.example.com/' });
    const app = createApp(fakeService(), restricted);

    const allowed = await request(app).get('/health').set('Origin', 'https://app.example.com');
    expect(allowed.headers['access-control-allow-origin']).toBe('https://app.example.com');

    const denied = await request(app).get('/health').set('Origin', 'https://other.example.com');
    expect(denied.headers['access-control-allow-origin']).toBeUndefined();
  });
});
