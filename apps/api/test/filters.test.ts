import { describe, expect, it } from 'vitest';
import { InputError } from '../src/errors.js';
import { inRange, parseSearchFilters } from '../src/pipeline/filters.js';

function issuesOf(input: unknown): string[] {
  try {
    parseSearchFilters(input);
  } catch (err) {
    if (err instanceof InputError) return err.issues.map((i) => i.path);
    throw err;
  }
  return [];
}

describe('parseSearchFilters', () => {
  it('applies defaults', () => {
    expect(parseSearchFilters({ city: 'São Paulo' })).toEqual({
      city: 'São Paulo',
      state: 'sp',
      transactionType: 'sale',
      price: { min: null, max: null },
      size: { min: null, max: null },
      bedrooms: { min: null, max: null },
      sort: 'price_asc',
      page: 1,
      pageSize: 20
    });
  });

  it('coerces query-string values and collapses whitespace', () => {
    const filters = parseSearchFilters({
      city: '  Rio   de Janeiro ',
      state: 'RJ',
      minPrice: '300000',
      maxPrice: '500000',
      bedrooms: '2',
      propertyType: 'Apartment',
      sort: 'PRICE_DESC',
      pageSize: '10'
    });
    expect(filters.city).toBe('Rio de Janeiro');
    expect(filters.state).toBe('rj');
    expect(filters.price).toEqual({ min: 300000, max: 500000 });
    expect(filters.bedrooms).toEqual({ min: 2, max: 2 });
    expect(filters.propertyType).toBe('apartment');
    expect(filters.sort).toBe('price_desc');
    expect(filters.pageSize).toBe(10);
  });

  it('accepts nested ranges', () => {
    const filters = parseSearchFilters({ city: 'Salvador', size: { min: 50 }, bedrooms: { max: 3 } });
    expect(filters.size).toEqual({ min: 50, max: null });
    expect(filters.bedrooms).toEqual({ min: null, max: 3 });
  });

  it('treats blank values as absent', () => {
    const filters = parseSearchFilters({ city: 'Fortaleza', minPrice: '', neighborhood: '  ' });
    expect(filters.price.min).toBeNull();
    expect(filters.neighborhood).toBeUndefined();
  });

  it('rejects a missing city', () => {
    expect(issuesOf({})).toEqual(['city']);
  });

  it('rejects min greater than max', () => {
    expect(issuesOf({ city: 'Salvador', minPrice: 500, maxPrice: 100 })).toEqual(['price']);
  });

  it('rejects flat and nested encodings that disagree', () => {
    expect(issuesOf({ city: 'Salvador', minPrice: 100, price: { min: 200 } })).toEqual(['price.min']);
  });

  it('rejects negative numbers, unknown types and oversized pages', () => {
    expect(issuesOf({ city: 'Salvador', minSize: -1 })).toEqual(['minSize']);
    expect(issuesOf({ city: 'Salvador', propertyType: 'castle' })).toEqual(['propertyType']);
    expect(issuesOf({ city: 'Salvador', pageSize: 500 })).toEqual(['pageSize']);
  });

  it('rejects non-integer bedroom counts', () => {
    expect(issuesOf({ city: 'Salvador', minBedrooms: 1.5 })).toEqual(['minBedrooms']);
  });
});

describe('inRange', () => {
  it('treats unknown values and open bounds as matching', () => {
    expect(inRange(null, { min: 1, max: 2 })).toBe(true);
    expect(inRange(5, { min: null, max: null })).toBe(true);
    expect(inRange(5, { min: 5, max: 5 })).toBe(true);
    expect(inRange(4, { min: 5, max: null })).toBe(false);
    expect(inRange(6, { min: null, max: 5 })).toBe(false);
  });
});
