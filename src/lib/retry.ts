const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'aborted due to timeout',
  'timed out',
  'timeout',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];

export type Sleep = (ms: number) => Promise<void>;

/** Error carrying the HTTP status so retry classification can read it. */
export type HttpStatusError = Error & { status: number };

export function httpStatusError(service: string, status: number, body: string): HttpStatusError {
  const detail = body.trim() || 'no error details provided by server';
  return Object.assign(new Error(`${service} API error ${status}: ${detail.slice(0, 500)}`), { status });
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function readProp(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  const prop: unknown = Reflect.get(value, key);
  return prop;
}

function readHeader(headers: unknown, name: string): string | null {
  if (!headers) return null;
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  if (typeof headers !== 'object') return null;
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? readProp(headers, key) : undefined;
  return typeof value === 'string' ? value : null;
}

function getStatusCode(error: unknown): number | null {
  const status = readProp(error, 'status');
  if (typeof status === 'number') return status;
  const statusCode = readProp(error, 'statusCode');
  if (typeof statusCode === 'number') return statusCode;

  const responseStatus = readProp(readProp(error, 'response'), 'status');
  return typeof responseStatus === 'number' ? responseStatus : null;
}

function getErrorCode(error: unknown): string | null {
  const code = readProp(error, 'code') ?? readProp(readProp(error, 'cause'), 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

/**
 * Whether an error from an inference backend or HTTP call is worth retrying.
 */
export function isTransient(error: Error, rawError?: unknown): boolean {
  const candidate = rawError ?? error;
  const status = getStatusCode(candidate);
  if (status != null) return TRANSIENT_STATUSES.has(status);

  const code = getErrorCode(candidate);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = error.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Status text embedded in message ("Ollama API error 503: ...")
  return /\b(408|425|429|500|502|503|504|529)\b/.test(msg);
}

/**
 * Extract a Retry-After delay from error headers, in milliseconds (0 if absent).
 */
function getRetryAfterMs(error: unknown): number {
  const retryAfter = readHeader(readProp(error, 'headers'), 'retry-after')
    ?? readHeader(readProp(readProp(error, 'response'), 'headers'), 'retry-after');
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    // Cap at 60s
    return Math.min(seconds, 60) * 1000;
  }
  return 0;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  sleep?: Sleep;
  random?: () => number;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, options?.maxAttempts ?? 3);
  const baseDelay = options?.baseDelay ?? 1000;
  const sleep = options?.sleep ?? defaultSleep;
  const random = options?.random ?? Math.random;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !isTransient(lastError, err)) {
        throw lastError;
      }

      // Prefer server-specified Retry-After; fall back to jittered exponential backoff
      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + random());

      options?.onRetry?.(attempt, lastError, delay);
      await sleep(delay);
    }
  }

  throw lastError ?? new Error('withRetry exhausted without an error');
}
