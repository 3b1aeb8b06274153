import express from 'express';
import cors from 'cors';
import { createSearchRouter, type SearchService } from './routes/search.js';
import { getEnv, type Env } from './env.js';

export function createApp(service: SearchService, env: Env = getEnv()) {
  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        // Unconfigured means any origin.
        if (allowedOrigins.length === 0) return callback(null, true);

        return callback(null, allowedOrigins.includes(normalizeOrigin(origin)));
      }
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(createSearchRouter(service));

  return app;
}
