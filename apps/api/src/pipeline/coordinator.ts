import type { SourceAdapter } from '../adapters/sourceAdapter.js';
import type { TieredCache } from '../cache/tieredCache.js';
import type { PipelineConfig } from '../env.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { CacheHealth, QueryFingerprint, ResultProvenance, ResultSet, SearchFilters, SourceSummary } from '../types.js';
import { generateFallback } from './fallback.js';
import { fingerprint } from './fingerprint.js';
import { buildResultSet, mergeResults, sortRecords } from './merge.js';
import { runAdapters } from './scheduler.js';

const logger = createLogger('coordinator');

/** Receives every assembled result set that holds live records. */
export interface PersistenceSink {
  persist(resultSet: ResultSet, filters: SearchFilters): Promise<void>;
}

export type SearchOrigin = 'cache' | 'assembled' | 'in-flight';

export interface SearchOutcome {
  resultSet: ResultSet;
  origin: SearchOrigin;
}

export type CoordinatorConfig = Pick<PipelineConfig, 'fetch' | 'dedup' | 'fallback'> & {
  ttl: PipelineConfig['cache']['ttl'];
};

export interface SearchCoordinatorOptions {
  adapters: SourceAdapter[];
  cache: TieredCache;
  config: CoordinatorConfig;
  persistence?: PersistenceSink | null;
  now?: () => Date;
  /** Jitter source for retry backoff. */
  random?: () => number;
}

/**
 * Serves searches from cache, or assembles them from the adapters. At most
 * one assembly runs per fingerprint; concurrent callers for the same
 * fingerprint share its result.
 */
export class SearchCoordinator {
  private readonly adapters: SourceAdapter[];
  private readonly cache: TieredCache;
  private readonly config: CoordinatorConfig;
  private readonly persistence: PersistenceSink | null;
  private readonly now: () => Date;
  private readonly random: (() => number) | undefined;

  private readonly inFlight = new Map<QueryFingerprint, Promise<ResultSet>>();
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(options: SearchCoordinatorOptions) {
    this.adapters = options.adapters;
    this.cache = options.cache;
    this.config = options.config;
    this.persistence = options.persistence ?? null;
    this.now = options.now ?? (() => new Date());
    this.random = options.random;
  }

  async search(filters: SearchFilters): Promise<ResultSet> {
    const { resultSet } = await this.searchWithMeta(filters);
    return resultSet;
  }

  async searchWithMeta(filters: SearchFilters): Promise<SearchOutcome> {
    const fp = fingerprint(filters);

    const running = this.inFlight.get(fp);
    if (running) return { resultSet: await running, origin: 'in-flight' };

    const cached = await this.cache.get(fp);
    if (cached) {
      logger.debug('cache hit', { fp, tier: cached.tier });
      return { resultSet: cached.value, origin: 'cache' };
    }

    // Another caller may have started assembling while we read the cache.
    const started = this.inFlight.get(fp);
    if (started) return { resultSet: await started, origin: 'in-flight' };

    const assembly = this.assembleAndStore(fp, filters).finally(() => {
      this.inFlight.delete(fp);
    });
    this.inFlight.set(fp, assembly);
    return { resultSet: await assembly, origin: 'assembled' };
  }

  cacheHealth(): Promise<CacheHealth> {
    return this.cache.healthCheck();
  }

  /** Number of assemblies currently running. */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Wait for background persistence started so far. */
  async drain(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.allSettled(Array.from(this.pendingWrites));
    }
  }

  async close(): Promise<void> {
    await Promise.allSettled(Array.from(this.inFlight.values()));
    await this.drain();
    await this.cache.close();
  }

  private async assembleAndStore(fp: QueryFingerprint, filters: SearchFilters): Promise<ResultSet> {
    const resultSet = await this.assemble(fp, filters);
    await this.cache.set(fp, resultSet, this.ttlFor(resultSet.provenance));
    if (resultSet.provenance !== 'synthetic') this.persistInBackground(resultSet, filters);
    return resultSet;
  }

  private async assemble(fp: QueryFingerprint, filters: SearchFilters): Promise<ResultSet> {
    try {
      const outcomes = await runAdapters(fp, filters, this.adapters, { ...this.config.fetch, random: this.random });
      const merged = mergeResults(outcomes, filters, this.config.dedup);

      if (merged.records.length === 0) {
        logger.warn('no live records; serving fallback', {
          fp,
          failed: merged.sources.filter((s) => s.status === 'failed').map((s) => s.adapter)
        });
        return this.fallback(fp, filters, merged.sources);
      }

      const provenance: ResultProvenance = merged.degraded ? 'partial-live' : 'live';
      logger.info('search assembled', { fp, provenance, records: merged.records.length });
      return buildResultSet({
        fingerprint: fp,
        filters,
        records: merged.records,
        sources: merged.sources,
        provenance,
        assembledAt: this.now()
      });
    } catch (err) {
      logger.error('assembly failed; serving fallback', { fp, error: errorMessage(err) });
      return this.fallback(fp, filters, []);
    }
  }

  private fallback(fp: QueryFingerprint, filters: SearchFilters, sources: SourceSummary[]): ResultSet {
    const records = generateFallback(filters, {
      fingerprint: fp,
      deterministic: this.config.fallback.deterministic,
      now: this.now
    });
    return buildResultSet({
      fingerprint: fp,
      filters,
      records: sortRecords(records, filters.sort).slice(0, filters.pageSize),
      sources,
      provenance: 'synthetic',
      assembledAt: this.now()
    });
  }

  private ttlFor(provenance: ResultProvenance): number {
    switch (provenance) {
      case 'live':
        return this.config.ttl.liveMs;
      case 'partial-live':
        return this.config.ttl.partialMs;
      case 'synthetic':
        return this.config.ttl.fallbackMs;
    }
  }

  private persistInBackground(resultSet: ResultSet, filters: SearchFilters): void {
    const sink = this.persistence;
    if (!sink) return;

    const write: Promise<void> = sink
      .persist(resultSet, filters)
      .catch((err: unknown) => {
        logger.error('failed to persist search results', { fp: resultSet.fingerprint, error: errorMessage(err) });
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });
    this.pendingWrites.add(write);
  }
}
