import pLimit from 'p-limit';
import type { SourceAdapter } from '../adapters/sourceAdapter.js';
import type { RetryPolicy } from '../env.js';
import { AdapterError, toAdapterError, type AdapterErrorKind } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ListingRecord, QueryFingerprint, SearchFilters } from '../types.js';
import { sleep, TimeoutError } from '../utils/timing.js';

const logger = createLogger('scheduler');

export interface SchedulerOptions {
  adapterTimeoutMs: number;
  globalBudgetMs: number;
  concurrency: number;
  retry: RetryPolicy;
  /** Source of jitter, [0, 1). */
  random?: () => number;
}

export interface AdapterOutcome {
  adapter: string;
  status: 'ok' | 'failed';
  records: ListingRecord[];
  errorKind?: AdapterErrorKind;
  detail?: string;
  attempts: number;
  durationMs: number;
}

export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  const jitter = random() * policy.baseDelayMs;
  return Math.min(policy.maxDelayMs, exponential + jitter);
}

/** Settle with `work`, or reject with the signal's reason as soon as it aborts. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () =>
      reject(signal.reason instanceof Error ? signal.reason : new TimeoutError('operation aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

interface AttemptContext {
  adapter: SourceAdapter;
  filters: SearchFilters;
  timeoutMs: number;
  budget: AbortSignal;
}

async function attemptOnce({ adapter, filters, timeoutMs, budget }: AttemptContext): Promise<ListingRecord[]> {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new TimeoutError(`${adapter.name} did not answer within ${timeoutMs}ms`));
  }, timeoutMs);
  const onBudgetAbort = () => controller.abort(budget.reason);
  budget.addEventListener('abort', onBudgetAbort, { once: true });

  try {
    const work = Promise.resolve().then(() => adapter.fetch(filters, { timeoutMs, signal: controller.signal }));
    const result = await raceAbort(work, controller.signal);
    return result.records;
  } finally {
    clearTimeout(timer);
    budget.removeEventListener('abort', onBudgetAbort);
  }
}

/**
 * Run every adapter for one query under a shared concurrency cap and a hard
 * global deadline. Always resolves with one outcome per adapter, in input
 * order; adapters never reject past this point.
 */
export async function runAdapters(
  fp: QueryFingerprint,
  filters: SearchFilters,
  adapters: SourceAdapter[],
  options: SchedulerOptions
): Promise<AdapterOutcome[]> {
  const random = options.random ?? Math.random;
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency)));
  const startedAt = Date.now();
  const deadline = startedAt + options.globalBudgetMs;

  const budget = new AbortController();
  const budgetTimer = setTimeout(() => {
    budget.abort(new TimeoutError(`fetch budget of ${options.globalBudgetMs}ms exhausted`));
  }, options.globalBudgetMs);

  const runOne = async (adapter: SourceAdapter): Promise<AdapterOutcome> => {
    const began = Date.now();
    const outcome = (attempts: number, fields: Pick<AdapterOutcome, 'status' | 'records' | 'errorKind' | 'detail'>) => ({
      adapter: adapter.name,
      attempts,
      durationMs: Date.now() - began,
      ...fields
    });

    let attempts = 0;
    let lastError: AdapterError = new AdapterError('timeout', 'fetch budget exhausted before the adapter started');

    while (attempts < options.retry.maxAttempts && !budget.signal.aborted) {
      attempts++;
      const timeoutMs = Math.max(1, Math.min(options.adapterTimeoutMs, deadline - Date.now()));
      try {
        const records = await attemptOnce({ adapter, filters, timeoutMs, budget: budget.signal });
        return outcome(attempts, { status: 'ok', records });
      } catch (err) {
        lastError = budget.signal.aborted
          ? new AdapterError('timeout', 'fetch budget exhausted', { cause: err })
          : toAdapterError(err);
      }

      if (!lastError.retryable || attempts >= options.retry.maxAttempts || budget.signal.aborted) break;

      const delay = backoffDelay(attempts, options.retry, random);
      logger.debug('retrying adapter', { fp, adapter: adapter.name, attempt: attempts, delayMs: delay, error: lastError.message });
      await sleep(delay, budget.signal);
    }

    if (budget.signal.aborted && lastError.kind !== 'timeout') {
      lastError = new AdapterError('timeout', 'fetch budget exhausted', { cause: lastError });
    }

    logger.warn('adapter failed', {
      fp,
      adapter: adapter.name,
      kind: lastError.kind,
      detail: lastError.detail,
      attempts
    });
    return outcome(attempts, { status: 'failed', records: [], errorKind: lastError.kind, detail: lastError.detail });
  };

  try {
    return await Promise.all(adapters.map((adapter) => limit(() => runOne(adapter))));
  } finally {
    clearTimeout(budgetTimer);
    logger.debug('scheduler finished', { fp, adapters: adapters.length, durationMs: Date.now() - startedAt });
  }
}
