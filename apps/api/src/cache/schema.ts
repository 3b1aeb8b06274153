import { z } from 'zod';
import { PROPERTY_TYPES, type ResultSet } from '../types.js';

const listingRecordSchema = z.object({
  source: z.string(),
  sourceId: z.string().nullable(),
  url: z.string().nullable(),
  title: z.string(),
  price: z.number().nullable(),
  size: z.number().nullable(),
  bedrooms: z.number().nullable(),
  bathrooms: z.number().nullable(),
  parkingSpaces: z.number().nullable(),
  propertyType: z.enum(PROPERTY_TYPES).nullable(),
  address: z.string().nullable(),
  neighborhood: z.string().nullable(),
  city: z.string().nullable(),
  state: z.string().nullable(),
  fetchedAt: z.string(),
  provenance: z.enum(['live', 'synthetic'])
});

const resultSetSchema = z.object({
  fingerprint: z.string(),
  provenance: z.enum(['live', 'partial-live', 'synthetic']),
  records: z.array(listingRecordSchema),
  stats: z.object({
    count: z.number(),
    minPrice: z.number().nullable(),
    maxPrice: z.number().nullable(),
    avgPrice: z.number().nullable(),
    avgSize: z.number().nullable(),
    avgPricePerSqm: z.number().nullable(),
    byType: z.record(z.number()),
    bySource: z.record(z.number())
  }),
  sources: z.array(
    z.object({
      adapter: z.string(),
      status: z.enum(['ok', 'failed']),
      errorKind: z.enum(['timeout', 'transient', 'permanent']).optional(),
      detail: z.string().optional(),
      records: z.number(),
      attempts: z.number(),
      durationMs: z.number()
    })
  ),
  pagination: z.object({ page: z.number(), pageSize: z.number() }),
  assembledAt: z.string()
});

/** Parse a serialized ResultSet; undefined when the payload is not one. */
export function parseResultSet(payload: string): ResultSet | undefined {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    return undefined;
  }
  const parsed = resultSetSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}
