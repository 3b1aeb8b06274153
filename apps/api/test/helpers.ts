import type { SourceAdapter } from '../src/adapters/sourceAdapter.js';
import type { ListingRecord, ResultSet, SearchFilters } from '../src/types.js';

export function makeFilters(overrides: Partial<SearchFilters> = {}): SearchFilters {
  return {
    city: 'São Paulo',
    state: 'sp',
    transactionType: 'sale',
    price: { min: null, max: null },
    size: { min: null, max: null },
    bedrooms: { min: null, max: null },
    sort: 'price_asc',
    page: 1,
    pageSize: 20,
    ...overrides
  };
}

export function makeRecord(overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    source: 'zap',
    sourceId: 'zap:1001',
    url: 'https://www.zapimoveis.com.br/imovel/venda-apartamento-id-1001/',
    title: 'Apartamento com 2 quartos em Pinheiros',
    price: 400000,
    size: 70,
    bedrooms: 2,
    bathrooms: 1,
    parkingSpaces: 1,
    propertyType: 'apartment',
    address: 'Rua dos Pinheiros, 100 - Pinheiros, São Paulo - SP',
    neighborhood: 'Pinheiros',
    city: 'São Paulo',
    state: 'SP',
    fetchedAt: '2024-05-01T12:00:00.000Z',
    provenance: 'live',
    ...overrides
  };
}

export function makeResultSet(overrides: Partial<ResultSet> = {}): ResultSet {
  const records = overrides.records ?? [makeRecord()];
  return {
    fingerprint: 'fp_test',
    provenance: 'live',
    records,
    stats: {
      count: records.length,
      minPrice: 400000,
      maxPrice: 400000,
      avgPrice: 400000,
      avgSize: 70,
      avgPricePerSqm: 5714,
      byType: { apartment: records.length },
      bySource: { zap: records.length }
    },
    sources: [{ adapter: 'zap', status: 'ok', records: records.length, attempts: 1, durationMs: 5 }],
    pagination: { page: 1, pageSize: 20 },
    assembledAt: '2024-05-01T12:00:00.000Z',
    ...overrides
  };
}

/** Adapter whose behaviour is a plain function of the call. */
export function fakeAdapter(
  name: string,
  behaviour: (signal: AbortSignal, call: number) => Promise<ListingRecord[]>
): SourceAdapter & { calls: number } {
  const adapter: SourceAdapter & { calls: number } = {
    name,
    calls: 0,
    async fetch(_filters, options) {
      adapter.calls++;
      return { records: await behaviour(options.signal, adapter.calls) };
    }
  };
  return adapter;
}

/** Never settles on its own; rejects once `signal` aborts. */
export function hang(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
