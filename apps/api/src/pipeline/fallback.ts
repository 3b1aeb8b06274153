import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { PROPERTY_TYPES, type ListingRecord, type PropertyType, type QueryFingerprint, type Range, type SearchFilters } from '../types.js';
import { slugify } from '../utils/text.js';

const REFERENCE_FILE = new URL('../../data/market-reference.json', import.meta.url);

const span = z.object({ min: z.number().nonnegative(), max: z.number().nonnegative() }).refine((s) => s.min <= s.max, {
  message: 'min must not exceed max'
});

const profileSchema = z.object({
  name: z.string().nullable(),
  basePrice: z.number().positive(),
  neighborhoods: z.array(z.string().min(1)).min(1)
});

const referenceSchema = z.object({
  version: z.literal(1),
  defaults: z.object({
    priceMultiplier: span,
    size: span,
    count: span,
    bedrooms: span,
    bathrooms: span,
    parkingSpaces: span,
    rentToPriceRatio: z.number().positive(),
    typeMix: z.record(z.string(), z.number().nonnegative())
  }),
  fallbackProfile: profileSchema,
  cities: z.record(z.string(), profileSchema)
});

export type MarketReference = z.infer<typeof referenceSchema>;
type Span = z.infer<typeof span>;

let cachedReference: MarketReference | undefined;

export function loadMarketReference(): MarketReference {
  if (!cachedReference) {
    const raw: unknown = JSON.parse(readFileSync(REFERENCE_FILE, 'utf8'));
    cachedReference = referenceSchema.parse(raw);
  }
  return cachedReference;
}

export type Random = () => number;

/** Small seedable PRNG; same seed, same sequence. */
export function mulberry32(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function seedFromFingerprint(fp: QueryFingerprint): number {
  const hex = fp.replace(/^fp_/, '').slice(0, 8);
  const seed = Number.parseInt(hex, 16);
  return Number.isFinite(seed) ? seed : 0;
}

/**
 * Narrow a reference span to what the filter allows. When the two do not
 * overlap the filter wins, widened by `stretch` on its open side.
 */
export function boundedSpan(reference: Span, filter: Range, stretch = 1.3): Span {
  const min = Math.max(reference.min, filter.min ?? -Infinity);
  const max = Math.min(reference.max, filter.max ?? Infinity);
  if (min <= max) return { min, max };

  if (filter.min !== null && filter.max !== null) return { min: filter.min, max: filter.max };
  if (filter.min !== null) return { min: filter.min, max: filter.min * stretch };
  const upper = filter.max ?? reference.max;
  return { min: upper / stretch, max: upper };
}

function clamp(value: number, bounds: Span): number {
  return Math.min(bounds.max, Math.max(bounds.min, value));
}

function between(random: Random, bounds: Span): number {
  return bounds.min + random() * (bounds.max - bounds.min);
}

function integerBetween(random: Random, bounds: Span): number {
  const min = Math.ceil(bounds.min);
  const max = Math.floor(bounds.max);
  if (max < min) return clamp(Math.round(bounds.min), bounds);
  return min + Math.floor(random() * (max - min + 1));
}

function roundedBetween(random: Random, bounds: Span, step: number): number {
  const value = Math.round(between(random, bounds) / step) * step;
  return clamp(value, bounds);
}

function pickType(random: Random, mix: Record<string, number>): PropertyType {
  const weighted = Object.entries(mix).flatMap(([name, weight]) => {
    const type = PROPERTY_TYPES.find((t) => t === name);
    return type && weight > 0 ? [{ type, weight }] : [];
  });
  const total = weighted.reduce((sum, w) => sum + w.weight, 0);
  if (total === 0) return 'apartment';

  let roll = random() * total;
  for (const { type, weight } of weighted) {
    roll -= weight;
    if (roll < 0) return type;
  }
  return weighted[weighted.length - 1].type;
}

const TYPE_LABELS: Record<PropertyType, string> = {
  apartment: 'Apartamento',
  house: 'Casa',
  condo: 'Casa em condomínio',
  penthouse: 'Cobertura',
  studio: 'Studio',
  loft: 'Loft'
};

export interface FallbackOptions {
  fingerprint: QueryFingerprint;
  /** Seed from the fingerprint so the same query yields the same records. */
  deterministic: boolean;
  reference?: MarketReference;
  now?: () => Date;
}

/**
 * Market-based synthetic listings for when no live source produced anything.
 * Every record honours the query's price, size and bedroom bounds, and at
 * least one record is always returned.
 */
export function generateFallback(filters: SearchFilters, options: FallbackOptions): ListingRecord[] {
  const reference = options.reference ?? loadMarketReference();
  const { defaults } = reference;
  const profile = reference.cities[slugify(filters.city)] ?? reference.fallbackProfile;
  const random = mulberry32(options.deterministic ? seedFromFingerprint(options.fingerprint) : Math.floor(Math.random() * 2 ** 32));
  const fetchedAt = (options.now ?? (() => new Date()))().toISOString();

  const rent = filters.transactionType === 'rent';
  const priceScale = profile.basePrice * (rent ? defaults.rentToPriceRatio : 1);
  const priceSpan = boundedSpan(
    { min: priceScale * defaults.priceMultiplier.min, max: priceScale * defaults.priceMultiplier.max },
    filters.price
  );
  const sizeSpan = boundedSpan(defaults.size, filters.size);
  const bedroomSpan = boundedSpan(defaults.bedrooms, filters.bedrooms, 1);

  const cityName = profile.name ?? filters.city;
  const state = filters.state.toUpperCase();
  const idPrefix = `synthetic:${options.fingerprint.replace(/^fp_/, '').slice(0, 12)}`;
  const count = Math.max(1, integerBetween(random, defaults.count));

  const records: ListingRecord[] = [];
  for (let i = 0; i < count; i++) {
    const propertyType = filters.propertyType ?? pickType(random, defaults.typeMix);
    const neighborhood = filters.neighborhood ?? profile.neighborhoods[i % profile.neighborhoods.length];
    const bedrooms = integerBetween(random, bedroomSpan);
    const bathrooms = Math.min(integerBetween(random, defaults.bathrooms), bedrooms + 1);

    records.push({
      source: 'synthetic',
      sourceId: `${idPrefix}-${i + 1}`,
      url: null,
      title: `${TYPE_LABELS[propertyType]} com ${bedrooms} ${bedrooms === 1 ? 'quarto' : 'quartos'} em ${neighborhood}`,
      price: roundedBetween(random, priceSpan, rent ? 10 : 1000),
      size: roundedBetween(random, sizeSpan, 1),
      bedrooms,
      bathrooms: Math.max(1, bathrooms),
      parkingSpaces: integerBetween(random, defaults.parkingSpaces),
      propertyType,
      address: `${neighborhood}, ${cityName} - ${state}`,
      neighborhood,
      city: cityName,
      state,
      fetchedAt,
      provenance: 'synthetic'
    });
  }
  return records;
}
