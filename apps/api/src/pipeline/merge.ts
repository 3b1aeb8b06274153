import type {
  ListingRecord,
  QueryFingerprint,
  ResultProvenance,
  ResultSet,
  ResultStats,
  SearchFilters,
  SortOrder,
  SourceSummary
} from '../types.js';
import { stripAccents } from '../utils/text.js';
import { inRange } from './filters.js';
import type { AdapterOutcome } from './scheduler.js';

export interface DedupTolerances {
  priceTolerance: number;
  sizeTolerance: number;
}

export const DEFAULT_TOLERANCES: DedupTolerances = { priceTolerance: 0.02, sizeTolerance: 0.05 };

const ABBREVIATIONS: Array<[RegExp, string]> = [
  [/\br\b/g, 'rua'],
  [/\bav\b/g, 'avenida'],
  [/\bal\b/g, 'alameda'],
  [/\btv\b/g, 'travessa'],
  [/\bpc\b/g, 'praca'],
  [/\bestr\b/g, 'estrada']
];

/** Accent-, case- and punctuation-insensitive form of an address or title. */
export function normalizeKey(value: string | null): string {
  if (!value) return '';
  let key = stripAccents(value)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
  for (const [pattern, replacement] of ABBREVIATIONS) {
    key = key.replace(pattern, replacement);
  }
  return key.replace(/\s+/g, ' ');
}

function contentKey(record: ListingRecord): string {
  const { fetchedAt: _fetchedAt, ...content } = record;
  return JSON.stringify(content);
}

function withinTolerance(a: number, b: number, tolerance: number): boolean {
  const larger = Math.max(Math.abs(a), Math.abs(b));
  if (larger === 0) return true;
  return Math.abs(a - b) <= tolerance * larger;
}

/** Whether two records describe the same property. */
export function isSameListing(a: ListingRecord, b: ListingRecord, tolerances: DedupTolerances): boolean {
  if (a.sourceId !== null && a.sourceId === b.sourceId) return true;
  if (a.url !== null && a.url === b.url) return true;
  if (contentKey(a) === contentKey(b)) return true;
  // Two ids from one source that differ are two listings, however alike.
  if (a.sourceId !== null && b.sourceId !== null && a.source === b.source) return false;

  const keyA = a.address && b.address ? normalizeKey(a.address) : normalizeKey(a.title);
  const keyB = a.address && b.address ? normalizeKey(b.address) : normalizeKey(b.title);
  if (keyA.length === 0 || keyA !== keyB) return false;

  if (a.price === null || b.price === null) return false;
  if (!withinTolerance(a.price, b.price, tolerances.priceTolerance)) return false;

  if (a.size === null || b.size === null) return true;
  return withinTolerance(a.size, b.size, tolerances.sizeTolerance);
}

function recordKey(record: ListingRecord): string {
  return `${record.source}/${record.sourceId ?? ''}/${record.url ?? ''}`;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function canonicalOrder(a: ListingRecord, b: ListingRecord): number {
  return (
    compareText(recordKey(a), recordKey(b)) ||
    compareText(a.title, b.title) ||
    (a.price ?? -1) - (b.price ?? -1) ||
    compareText(a.fetchedAt, b.fetchedAt)
  );
}

const DESCRIPTIVE_FIELDS = [
  'sourceId',
  'url',
  'price',
  'size',
  'bedrooms',
  'bathrooms',
  'parkingSpaces',
  'propertyType',
  'address',
  'neighborhood'
] as const satisfies ReadonlyArray<keyof ListingRecord>;

function completeness(record: ListingRecord): number {
  return DESCRIPTIVE_FIELDS.filter((field) => record[field] !== null).length;
}

/** Negative when `a` should survive over `b`. */
function survivorOrder(a: ListingRecord, b: ListingRecord): number {
  return (
    completeness(b) - completeness(a) ||
    compareText(b.fetchedAt, a.fetchedAt) ||
    compareText(recordKey(a), recordKey(b))
  );
}

/** Whether two clusters hold different ids from the same source. */
function idsConflict(a: Map<string, string>, b: Map<string, string>): boolean {
  for (const [source, id] of b) {
    const other = a.get(source);
    if (other !== undefined && other !== id) return true;
  }
  return false;
}

/**
 * Collapse duplicates into one survivor per listing. Matching is closed
 * transitively, except that a cluster never holds two different ids from
 * one source.
 */
export function dedupe(records: ListingRecord[], tolerances: DedupTolerances = DEFAULT_TOLERANCES): ListingRecord[] {
  const ordered = [...records].sort(canonicalOrder);
  const parent = ordered.map((_, i) => i);
  const ids = ordered.map((record) => {
    const known = new Map<string, string>();
    if (record.sourceId !== null) known.set(record.source, record.sourceId);
    return known;
  });
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  for (let i = 0; i < ordered.length; i++) {
    for (let j = i + 1; j < ordered.length; j++) {
      const rootI = find(i);
      const rootJ = find(j);
      if (rootI === rootJ) continue;
      if (idsConflict(ids[rootI], ids[rootJ])) continue;
      if (isSameListing(ordered[i], ordered[j], tolerances)) {
        parent[rootJ] = rootI;
        for (const [source, id] of ids[rootJ]) ids[rootI].set(source, id);
      }
    }
  }

  const clusters = new Map<number, ListingRecord[]>();
  ordered.forEach((record, i) => {
    const root = find(i);
    const members = clusters.get(root) ?? [];
    members.push(record);
    clusters.set(root, members);
  });

  return Array.from(clusters.values(), (members) => [...members].sort(survivorOrder)[0]);
}

function compareNullable(a: number | null, b: number | null, direction: 1 | -1): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return (a - b) * direction;
}

function tieBreak(a: ListingRecord, b: ListingRecord): number {
  if (a.sourceId !== b.sourceId) {
    if (a.sourceId === null) return 1;
    if (b.sourceId === null) return -1;
    return compareText(a.sourceId, b.sourceId);
  }
  return compareText(a.url ?? '', b.url ?? '') || canonicalOrder(a, b);
}

export function sortRecords(records: ListingRecord[], order: SortOrder): ListingRecord[] {
  const primary = (a: ListingRecord, b: ListingRecord): number => {
    switch (order) {
      case 'price_asc':
        return compareNullable(a.price, b.price, 1);
      case 'price_desc':
        return compareNullable(a.price, b.price, -1);
      case 'size_asc':
        return compareNullable(a.size, b.size, 1);
      case 'size_desc':
        return compareNullable(a.size, b.size, -1);
      case 'newest':
        return compareText(b.fetchedAt, a.fetchedAt);
    }
  };
  return [...records].sort((a, b) => primary(a, b) || tieBreak(a, b));
}

/** Records whose known values contradict the filters are not results. */
export function matchesFilters(record: ListingRecord, filters: SearchFilters): boolean {
  if (!inRange(record.price, filters.price)) return false;
  if (!inRange(record.size, filters.size)) return false;
  if (!inRange(record.bedrooms, filters.bedrooms)) return false;
  if (filters.propertyType && record.propertyType !== null && record.propertyType !== filters.propertyType) {
    return false;
  }
  if (
    filters.neighborhood &&
    record.neighborhood !== null &&
    !normalizeKey(record.neighborhood).includes(normalizeKey(filters.neighborhood))
  ) {
    return false;
  }
  return true;
}

export function mergeRecords(
  records: ListingRecord[],
  filters: SearchFilters,
  tolerances: DedupTolerances = DEFAULT_TOLERANCES
): ListingRecord[] {
  const matching = records.filter((record) => matchesFilters(record, filters));
  return sortRecords(dedupe(matching, tolerances), filters.sort);
}

export interface MergedListings {
  records: ListingRecord[];
  sources: SourceSummary[];
  /** True when at least one adapter failed. */
  degraded: boolean;
}

export function summarizeOutcome(outcome: AdapterOutcome): SourceSummary {
  const summary: SourceSummary = {
    adapter: outcome.adapter,
    status: outcome.status,
    records: outcome.records.length,
    attempts: outcome.attempts,
    durationMs: outcome.durationMs
  };
  if (outcome.errorKind) summary.errorKind = outcome.errorKind;
  if (outcome.detail) summary.detail = outcome.detail;
  return summary;
}

/** Combine the scheduler's outcomes into one deduplicated, ordered page of at most `pageSize` records. */
export function mergeResults(
  outcomes: AdapterOutcome[],
  filters: SearchFilters,
  tolerances: DedupTolerances = DEFAULT_TOLERANCES
): MergedListings {
  const live = outcomes.filter((o) => o.status === 'ok').flatMap((o) => o.records);
  return {
    records: mergeRecords(live, filters, tolerances).slice(0, filters.pageSize),
    sources: outcomes.map(summarizeOutcome),
    degraded: outcomes.some((o) => o.status === 'failed')
  };
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function countBy(records: ListingRecord[], key: (record: ListingRecord) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of records) {
    const k = key(record);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export function computeStats(records: ListingRecord[]): ResultStats {
  const prices = records.flatMap((r) => (r.price === null ? [] : [r.price]));
  const sizes = records.flatMap((r) => (r.size === null || r.size <= 0 ? [] : [r.size]));
  const perSqm = records.flatMap((r) => (r.price !== null && r.size !== null && r.size > 0 ? [r.price / r.size] : []));

  const avgPrice = average(prices);
  const avgSize = average(sizes);
  const avgPricePerSqm = average(perSqm);

  return {
    count: records.length,
    minPrice: prices.length > 0 ? Math.min(...prices) : null,
    maxPrice: prices.length > 0 ? Math.max(...prices) : null,
    avgPrice: avgPrice === null ? null : round(avgPrice, 0),
    avgSize: avgSize === null ? null : round(avgSize, 1),
    avgPricePerSqm: avgPricePerSqm === null ? null : round(avgPricePerSqm, 0),
    byType: countBy(records, (r) => r.propertyType ?? 'unknown'),
    bySource: countBy(records, (r) => r.source)
  };
}

export interface BuildResultSetInput {
  fingerprint: QueryFingerprint;
  filters: SearchFilters;
  records: ListingRecord[];
  sources: SourceSummary[];
  provenance: ResultProvenance;
  assembledAt?: Date;
}

export function buildResultSet(input: BuildResultSetInput): ResultSet {
  return {
    fingerprint: input.fingerprint,
    provenance: input.provenance,
    records: input.records,
    stats: computeStats(input.records),
    sources: input.sources,
    pagination: { page: input.filters.page, pageSize: input.filters.pageSize },
    assembledAt: (input.assembledAt ?? new Date()).toISOString()
  };
}
