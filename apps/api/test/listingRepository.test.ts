import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../src/firebase.js', async () => {
  const { fakeDb } = await import('./fakeFirestore.js');
  return { getFirestore: () => fakeDb };
});

import { FirestoreListingRepository, listingDocId, saveSearchResults } from '../src/repositories/listingRepository.js';
import { fakeDb } from './fakeFirestore.js';
import { makeFilters, makeRecord, makeResultSet } from './helpers.js';

describe('listingRepository', () => {
  beforeEach(() => fakeDb.reset());

  it('writes the search and its live listings in one batch', async () => {
    const resultSet = makeResultSet({
      fingerprint: 'fp_abc',
      records: [makeRecord({ sourceId: 'zap:1' }), makeRecord({ sourceId: 'zap:2', price: 410000 })]
    });

    const { searchId, listings } = await saveSearchResults(resultSet, makeFilters());

    expect(listings).toBe(2);
    expect(fakeDb.commits).toEqual([3]);

    const search = fakeDb.docs.get(`searches/${searchId}`);
    expect(search).toMatchObject({ fingerprint: 'fp_abc', city: 'São Paulo', state: 'sp', provenance: 'live', resultCount: 2 });

    const listing = fakeDb.docs.get(`searches/${searchId}/listings/zap:2`);
    expect(listing).toMatchObject({ sourceId: 'zap:2', price: 410000, searchId });
  });

  it('skips synthetic records', async () => {
    const resultSet = makeResultSet({
      records: [makeRecord(), makeRecord({ source: 'synthetic', sourceId: 'synthetic:abc-1', provenance: 'synthetic' })]
    });

    const { listings } = await saveSearchResults(resultSet, makeFilters());

    expect(listings).toBe(1);
  });

  it('caps listings at one batch', async () => {
    const records = Array.from({ length: 500 }, (_, i) => makeRecord({ sourceId: `zap:${i}` }));

    const { listings } = await saveSearchResults(makeResultSet({ records }), makeFilters());

    expect(listings).toBe(449);
    expect(fakeDb.commits).toEqual([450]);
  });

  it('derives stable ids for records without one', () => {
    const record = makeRecord({ sourceId: null });
    expect(listingDocId(record)).toMatch(/^zap:[0-9a-f]{20}$/);
    expect(listingDocId(record)).toBe(listingDocId({ ...record }));
    expect(listingDocId(makeRecord({ sourceId: 'site:a/b' }))).toBe('site:a_b');
  });

  it('propagates write failures to the caller', async () => {
    fakeDb.down = true;
    await expect(new FirestoreListingRepository().persist(makeResultSet(), makeFilters())).rejects.toThrow('UNAVAILABLE');
  });
});
