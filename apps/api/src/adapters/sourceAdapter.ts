import type { ListingRecord, SearchFilters } from '../types.js';

export interface AdapterFetchOptions {
  /** Budget for this attempt; `signal` aborts when it runs out. */
  timeoutMs: number;
  signal: AbortSignal;
}

export interface AdapterResult {
  records: ListingRecord[];
}

/**
 * Contract every listing source implements. Implementations reject with an
 * AdapterError (or anything `toAdapterError` can classify) on failure.
 */
export interface SourceAdapter {
  /** Unique source name, also used as the `sourceId` namespace (e.g. "zap"). */
  readonly name: string;
  fetch(filters: SearchFilters, options: AdapterFetchOptions): Promise<AdapterResult>;
}
