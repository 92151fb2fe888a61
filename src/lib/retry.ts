const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'socket hang up',
  'fetch failed',
  'service unavailable',
  'bad gateway',
];

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error) => void;
}

function readNumber(source: unknown, key: string): number | null {
  if (typeof source !== 'object' || source === null || !(key in source)) return null;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : null;
}

function getStatusCode(error: unknown): number | null {
  const direct = readNumber(error, 'status') ?? readNumber(error, 'statusCode');
  if (direct != null) return direct;
  if (typeof error === 'object' && error !== null && 'response' in error) {
    return readNumber(error.response, 'status');
  }
  return null;
}

function getErrorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  return typeof error.code === 'string' ? error.code.toUpperCase() : null;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function isTransient(error: Error, rawError?: unknown): boolean {
  if (isAbortError(rawError ?? error)) return false;

  const status = getStatusCode(rawError ?? error);
  if (status != null && TRANSIENT_STATUSES.has(status)) return true;

  const code = getErrorCode(rawError ?? error);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = error.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Status text embedded in message ("API error 503: ...")
  return /\b(408|425|429|500|502|503|504|529)\b/.test(msg);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Runs `fn` until it succeeds, fails with a non-transient error, or the
 * attempt budget is spent. Aborted signals stop further attempts.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;
  const signal = options?.signal;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || signal?.aborted || !isTransient(lastError, err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const delay = baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await sleep(delay, signal);
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}
