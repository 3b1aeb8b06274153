import { Router, type Response } from 'express';
import { errorMessage, InputError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { SearchOrigin, SearchOutcome } from '../pipeline/coordinator.js';
import { parseSearchFilters } from '../pipeline/filters.js';
import type { CacheHealth, SearchFilters } from '../types.js';

const logger = createLogger('http');

/** What the HTTP layer needs from the pipeline. */
export interface SearchService {
  searchWithMeta(filters: SearchFilters): Promise<SearchOutcome>;
  cacheHealth(): Promise<CacheHealth>;
}

const CACHE_HEADER: Record<SearchOrigin, string> = {
  cache: 'HIT',
  assembled: 'MISS',
  'in-flight': 'SHARED'
};

export function createSearchRouter(service: SearchService): Router {
  const router = Router();

  const handleSearch = async (input: unknown, res: Response) => {
    try {
      const filters = parseSearchFilters(input);
      const { resultSet, origin } = await service.searchWithMeta(filters);
      res.setHeader('X-Cache', CACHE_HEADER[origin]);
      return res.json({
        fingerprint: resultSet.fingerprint,
        provenance: resultSet.provenance,
        stats: resultSet.stats,
        sources: resultSet.sources,
        records: resultSet.records,
        pagination: resultSet.pagination,
        cached: origin === 'cache'
      });
    } catch (err) {
      if (err instanceof InputError) {
        return res.status(400).json({ error: 'VALIDATION_ERROR', message: err.message, details: err.issues });
      }
      logger.error('search failed', { error: errorMessage(err) });
      return res.status(500).json({ error: 'SEARCH_FAILED', message: errorMessage(err) });
    }
  };

  router.get('/v1/search', (req, res) => handleSearch(req.query, res));
  router.post('/v1/search', (req, res) => handleSearch(req.body, res));

  router.get('/health/cache', async (_req, res) => {
    try {
      const health = await service.cacheHealth();
      const ok = health.primaryUp || health.secondaryUp;
      return res.status(ok ? 200 : 503).json({ ok, ...health });
    } catch (err) {
      return res.status(503).json({ ok: false, error: 'CACHE_UNAVAILABLE', message: errorMessage(err) });
    }
  });

  return router;
}
