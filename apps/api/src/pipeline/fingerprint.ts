import { createHash } from 'node:crypto';
import type { QueryFingerprint, Range, SearchFilters } from '../types.js';

const OPEN_BOUND = '*';
const FINGERPRINT_VERSION = 'v1';

function canonicalText(value: string | undefined): string {
  if (value === undefined) return '';
  return value.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

function canonicalRange(range: Range): string {
  const min = range.min === null ? OPEN_BOUND : String(range.min);
  const max = range.max === null ? OPEN_BOUND : String(range.max);
  return `${min}..${max}`;
}

/**
 * The canonical key/value form of a filter set. Keys are emitted in sorted
 * order and every field is present, so two equal filter sets always serialize
 * to the same string.
 */
export function canonicalFilters(filters: SearchFilters): string {
  const fields: Record<string, string> = {
    bedrooms: canonicalRange(filters.bedrooms),
    city: canonicalText(filters.city),
    neighborhood: canonicalText(filters.neighborhood),
    page: String(filters.page),
    pageSize: String(filters.pageSize),
    price: canonicalRange(filters.price),
    propertyType: canonicalText(filters.propertyType),
    size: canonicalRange(filters.size),
    sort: filters.sort,
    state: canonicalText(filters.state),
    transactionType: filters.transactionType
  };

  return Object.keys(fields)
    .sort()
    .map((key) => `${key}=${fields[key]}`)
    .join('|');
}

export function fingerprint(filters: SearchFilters): QueryFingerprint {
  const digest = createHash('sha256')
    .update(`${FINGERPRINT_VERSION}|${canonicalFilters(filters)}`)
    .digest('hex');
  return `fp_${digest}`;
}
