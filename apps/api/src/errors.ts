export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export interface InputIssue {
  path: string;
  message: string;
}

/** Malformed search filters. The only failure a caller of the pipeline ever sees. */
export class InputError extends Error {
  readonly issues: InputIssue[];

  constructor(message: string, issues: InputIssue[] = []) {
    super(message);
    this.name = 'InputError';
    this.issues = issues;
  }
}

export type AdapterErrorKind = 'timeout' | 'transient' | 'permanent';

export class AdapterError extends Error {
  readonly kind: AdapterErrorKind;
  readonly detail: string;
  readonly status?: number;

  constructor(kind: AdapterErrorKind, detail: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${kind}: ${detail}`, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AdapterError';
    this.kind = kind;
    this.detail = detail;
    this.status = options.status;
  }

  get retryable(): boolean {
    return this.kind !== 'permanent';
  }
}

export class CacheUnavailableError extends Error {
  readonly tier: string;

  constructor(tier: string, detail: string) {
    super(`${tier} cache unavailable: ${detail}`);
    this.name = 'CacheUnavailableError';
    this.tier = tier;
  }
}

const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET']);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string') return code;
  const cause = 'cause' in err ? err.cause : undefined;
  return cause === err ? undefined : errorCode(cause);
}

export function statusToErrorKind(status: number): AdapterErrorKind {
  if (status === 408 || status === 425 || status === 429 || status >= 500) return 'transient';
  return 'permanent';
}

/** Map anything an adapter throws onto the adapter error taxonomy. */
export function toAdapterError(err: unknown): AdapterError {
  if (err instanceof AdapterError) return err;

  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
    return new AdapterError('timeout', err.message || 'request aborted', { cause: err });
  }

  const code = errorCode(err);
  if (code && TRANSIENT_NETWORK_CODES.has(code)) {
    return new AdapterError('transient', `${code}: ${errorMessage(err)}`, { cause: err });
  }
  if (err instanceof TypeError && err.message === 'fetch failed') {
    return new AdapterError('transient', err.message, { cause: err });
  }

  return new AdapterError('permanent', errorMessage(err), { cause: err });
}
