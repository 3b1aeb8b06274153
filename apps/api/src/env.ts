import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  PORT: positiveInt.default(4000),
  CORS_ORIGIN: z.string().optional(),

  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_PATH: z.string().optional(),

  CACHE_PRIMARY: z.enum(['firestore', 'none']).default('firestore'),
  CACHE_PRIMARY_TIMEOUT_MS: positiveInt.default(750),
  CACHE_TTL_LIVE_MS: positiveInt.default(5 * 60 * 1000),
  CACHE_TTL_PARTIAL_MS: positiveInt.default(2 * 60 * 1000),
  CACHE_TTL_FALLBACK_MS: positiveInt.default(30 * 1000),
  CACHE_MEMORY_MAX_ENTRIES: positiveInt.default(500),
  CACHE_SWEEP_INTERVAL_MS: z.coerce.number().int().nonnegative().default(60 * 1000),

  ADAPTERS: z.string().default('zap,vivareal'),
  ADAPTER_TIMEOUT_MS: positiveInt.default(8000),
  FETCH_BUDGET_MS: positiveInt.default(12000),
  FETCH_CONCURRENCY: positiveInt.default(4),
  RETRY_MAX_ATTEMPTS: positiveInt.default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(250),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),

  DEDUP_PRICE_TOLERANCE: z.coerce.number().min(0).max(1).default(0.02),
  DEDUP_SIZE_TOLERANCE: z.coerce.number().min(0).max(1).default(0.05),

  FALLBACK_DETERMINISTIC: booleanFlag.default('true'),
  PERSISTENCE_ENABLED: booleanFlag.default('true'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  if (parsed.data.ADAPTER_TIMEOUT_MS >= parsed.data.FETCH_BUDGET_MS) {
    throw new Error('Invalid environment variables: ADAPTER_TIMEOUT_MS must be lower than FETCH_BUDGET_MS');
  }
  return parsed.data;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface PipelineConfig {
  adapters: string[];
  fetch: {
    adapterTimeoutMs: number;
    globalBudgetMs: number;
    concurrency: number;
    retry: RetryPolicy;
  };
  cache: {
    primary: 'firestore' | 'none';
    primaryTimeoutMs: number;
    memoryMaxEntries: number;
    sweepIntervalMs: number;
    ttl: {
      liveMs: number;
      partialMs: number;
      fallbackMs: number;
    };
  };
  dedup: {
    priceTolerance: number;
    sizeTolerance: number;
  };
  fallback: {
    deterministic: boolean;
  };
  persistence: {
    enabled: boolean;
  };
}

export function getPipelineConfig(env: Env = getEnv()): PipelineConfig {
  const adapters = env.ADAPTERS.split(',')
    .map((name) => name.trim().toLowerCase())
    .filter(Boolean);

  return {
    adapters: Array.from(new Set(adapters)),
    fetch: {
      adapterTimeoutMs: env.ADAPTER_TIMEOUT_MS,
      globalBudgetMs: env.FETCH_BUDGET_MS,
      concurrency: env.FETCH_CONCURRENCY,
      retry: {
        maxAttempts: env.RETRY_MAX_ATTEMPTS,
        baseDelayMs: env.RETRY_BASE_DELAY_MS,
        maxDelayMs: env.RETRY_MAX_DELAY_MS
      }
    },
    cache: {
      primary: env.CACHE_PRIMARY,
      primaryTimeoutMs: env.CACHE_PRIMARY_TIMEOUT_MS,
      memoryMaxEntries: env.CACHE_MEMORY_MAX_ENTRIES,
      sweepIntervalMs: env.CACHE_SWEEP_INTERVAL_MS,
      ttl: {
        liveMs: env.CACHE_TTL_LIVE_MS,
        partialMs: env.CACHE_TTL_PARTIAL_MS,
        fallbackMs: env.CACHE_TTL_FALLBACK_MS
      }
    },
    dedup: {
      priceTolerance: env.DEDUP_PRICE_TOLERANCE,
      sizeTolerance: env.DEDUP_SIZE_TOLERANCE
    },
    fallback: {
      deterministic: env.FALLBACK_DETERMINISTIC
    },
    persistence: {
      enabled: env.PERSISTENCE_ENABLED
    }
  };
}
