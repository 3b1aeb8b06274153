import { z } from 'zod';
import { InputError, type InputIssue } from '../errors.js';
import { PROPERTY_TYPES, SORT_ORDERS, type Range, type SearchFilters } from '../types.js';

const DEFAULT_STATE = 'sp';
const DEFAULT_PAGE_SIZE = 20;
const MAX_PAGE_SIZE = 100;

function blankToUndefined(value: unknown): unknown {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' && value.trim().length === 0) return undefined;
  return value;
}

function normalizeWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

const bound = (integer: boolean) => {
  const base = z.coerce.number().finite().nonnegative();
  return z.preprocess(blankToUndefined, (integer ? base.int() : base).optional());
};

const rangeObject = (integer: boolean) =>
  z.object({
    min: bound(integer),
    max: bound(integer)
  });

const text = (max: number) =>
  z.preprocess(blankToUndefined, z.string().transform(normalizeWhitespace).pipe(z.string().min(1).max(max)).optional());

function lowerTrim(value: unknown): unknown {
  const v = blankToUndefined(value);
  return typeof v === 'string' ? v.trim().toLowerCase() : v;
}

const rawFiltersSchema = z.object({
  city: z.preprocess(
    (value) => (typeof value === 'string' ? normalizeWhitespace(value) : value),
    z.string({ required_error: 'city is required' }).min(2, 'city must have at least 2 characters').max(100)
  ),
  state: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(/^[A-Za-z]{2}$/, 'state must be a two-letter code')
      .optional()
  ),
  neighborhood: text(100),
  transactionType: z.preprocess(lowerTrim, z.enum(['sale', 'rent']).optional()),

  minPrice: bound(false),
  maxPrice: bound(false),
  price: z.preprocess(blankToUndefined, rangeObject(false).optional()),

  minSize: bound(false),
  maxSize: bound(false),
  size: z.preprocess(blankToUndefined, rangeObject(false).optional()),

  minBedrooms: bound(true),
  maxBedrooms: bound(true),
  bedrooms: z.preprocess(
    blankToUndefined,
    z.union([z.coerce.number().finite().int().nonnegative(), rangeObject(true)]).optional()
  ),

  propertyType: z.preprocess(lowerTrim, z.enum(PROPERTY_TYPES).optional()),
  sort: z.preprocess(lowerTrim, z.enum(SORT_ORDERS).optional()),

  page: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(1000).optional()),
  pageSize: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional())
});

type RawFilters = z.infer<typeof rawFiltersSchema>;

/** Picks one bound out of the flat (`minPrice`) and nested (`price.min`) encodings. */
function resolveBound(
  flat: number | undefined,
  nested: number | undefined,
  path: string,
  issues: InputIssue[]
): number | null {
  if (flat !== undefined && nested !== undefined && flat !== nested) {
    issues.push({ path, message: `conflicting values ${flat} and ${nested}` });
  }
  return flat ?? nested ?? null;
}

function resolveRange(
  name: string,
  flatMin: number | undefined,
  flatMax: number | undefined,
  nested: { min?: number; max?: number } | undefined,
  issues: InputIssue[]
): Range {
  const range: Range = {
    min: resolveBound(flatMin, nested?.min, `${name}.min`, issues),
    max: resolveBound(flatMax, nested?.max, `${name}.max`, issues)
  };
  if (range.min !== null && range.max !== null && range.min > range.max) {
    issues.push({ path: name, message: `minimum ${range.min} is greater than maximum ${range.max}` });
  }
  return range;
}

function toFilters(raw: RawFilters): SearchFilters {
  const issues: InputIssue[] = [];

  const bedrooms = typeof raw.bedrooms === 'number' ? { min: raw.bedrooms, max: raw.bedrooms } : raw.bedrooms;

  const filters: SearchFilters = {
    city: raw.city,
    state: (raw.state ?? DEFAULT_STATE).toLowerCase(),
    transactionType: raw.transactionType ?? 'sale',
    price: resolveRange('price', raw.minPrice, raw.maxPrice, raw.price, issues),
    size: resolveRange('size', raw.minSize, raw.maxSize, raw.size, issues),
    bedrooms: resolveRange('bedrooms', raw.minBedrooms, raw.maxBedrooms, bedrooms, issues),
    sort: raw.sort ?? 'price_asc',
    page: raw.page ?? 1,
    pageSize: raw.pageSize ?? DEFAULT_PAGE_SIZE
  };
  if (raw.neighborhood) filters.neighborhood = raw.neighborhood;
  if (raw.propertyType) filters.propertyType = raw.propertyType;

  if (issues.length > 0) {
    throw new InputError('Invalid search filters', issues);
  }
  return filters;
}

/**
 * Validate raw search input (JSON body or query string) into canonical filters.
 * Throws InputError for anything malformed.
 */
export function parseSearchFilters(input: unknown): SearchFilters {
  const parsed = rawFiltersSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
      message: issue.message
    }));
    throw new InputError('Invalid search filters', issues);
  }
  return toFilters(parsed.data);
}

export function inRange(value: number | null, range: Range): boolean {
  if (value === null) return true;
  if (range.min !== null && value < range.min) return false;
  if (range.max !== null && value > range.max) return false;
  return true;
}
