import type { AdapterErrorKind } from './errors.js';

export const PROPERTY_TYPES = ['apartment', 'house', 'condo', 'penthouse', 'studio', 'loft'] as const;
export type PropertyType = (typeof PROPERTY_TYPES)[number];

export const SORT_ORDERS = ['price_asc', 'price_desc', 'size_asc', 'size_desc', 'newest'] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export type TransactionType = 'sale' | 'rent';

/** Inclusive numeric bounds; `null` means the side is open. */
export interface Range {
  min: number | null;
  max: number | null;
}

export interface SearchFilters {
  city: string;
  state: string;
  neighborhood?: string;
  transactionType: TransactionType;
  price: Range;
  size: Range; // m²
  bedrooms: Range;
  propertyType?: PropertyType;
  sort: SortOrder;
  page: number;
  pageSize: number;
}

export type QueryFingerprint = string;

export type RecordProvenance = 'live' | 'synthetic';
export type ResultProvenance = 'live' | 'partial-live' | 'synthetic';

export interface ListingRecord {
  source: string;
  sourceId: string | null; // namespaced by source, e.g. "zap:2581234"
  url: string | null;

  title: string;
  price: number | null;
  size: number | null;
  bedrooms: number | null;
  bathrooms: number | null;
  parkingSpaces: number | null;
  propertyType: PropertyType | null;

  address: string | null;
  neighborhood: string | null;
  city: string | null;
  state: string | null;

  fetchedAt: string; // ISO
  provenance: RecordProvenance;
}

export interface ResultStats {
  count: number;
  minPrice: number | null;
  maxPrice: number | null;
  avgPrice: number | null;
  avgSize: number | null;
  avgPricePerSqm: number | null;
  byType: Record<string, number>;
  bySource: Record<string, number>;
}

export interface SourceSummary {
  adapter: string;
  status: 'ok' | 'failed';
  errorKind?: AdapterErrorKind;
  detail?: string;
  records: number;
  attempts: number;
  durationMs: number;
}

export interface ResultSet {
  fingerprint: QueryFingerprint;
  provenance: ResultProvenance;
  records: ListingRecord[];
  stats: ResultStats;
  sources: SourceSummary[];
  pagination: { page: number; pageSize: number };
  assembledAt: string; // ISO
}

export type CacheTier = 'primary' | 'secondary';

export interface CacheEntry {
  key: string;
  value: ResultSet;
  createdAt: number; // epoch ms
  ttlMs: number;
  tier: CacheTier;
}

export interface CacheHealth {
  primaryUp: boolean;
  secondaryUp: boolean;
}
