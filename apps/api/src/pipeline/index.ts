import { createAdapters } from '../adapters/index.js';
import type { SourceAdapter } from '../adapters/sourceAdapter.js';
import { FirestoreCacheStore } from '../cache/firestoreStore.js';
import { MemoryCacheStore } from '../cache/memoryStore.js';
import { TieredCache } from '../cache/tieredCache.js';
import type { PipelineConfig } from '../env.js';
import { FirestoreListingRepository } from '../repositories/listingRepository.js';
import { SearchCoordinator, type PersistenceSink } from './coordinator.js';

export interface PipelineOverrides {
  adapters?: SourceAdapter[];
  persistence?: PersistenceSink | null;
}

/** Wire the coordinator from configuration. */
export function createPipeline(config: PipelineConfig, overrides: PipelineOverrides = {}): SearchCoordinator {
  const cache = new TieredCache({
    primary: config.cache.primary === 'firestore' ? new FirestoreCacheStore() : null,
    secondary: new MemoryCacheStore({
      maxEntries: config.cache.memoryMaxEntries,
      sweepIntervalMs: config.cache.sweepIntervalMs
    }),
    primaryTimeoutMs: config.cache.primaryTimeoutMs
  });

  const persistence =
    overrides.persistence !== undefined
      ? overrides.persistence
      : config.persistence.enabled
        ? new FirestoreListingRepository()
        : null;

  return new SearchCoordinator({
    adapters: overrides.adapters ?? createAdapters(config.adapters),
    cache,
    config: {
      fetch: config.fetch,
      dedup: config.dedup,
      fallback: config.fallback,
      ttl: config.cache.ttl
    },
    persistence
  });
}
