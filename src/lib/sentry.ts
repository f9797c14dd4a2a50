import { createRequire } from 'node:module';
import logger from './logger.js';

type SentryEvent = Record<string, unknown>;

interface SentryLike {
  init: (options: {
    dsn: string;
    environment?: string;
    tracesSampleRate?: number;
    beforeSend?: (event: SentryEvent) => SentryEvent | null;
  }) => void;
  withScope: (callback: (scope: { setExtra: (key: string, value: unknown) => void }) => void) => void;
  captureException: (err: unknown) => void;
  flush: (timeoutMs?: number) => Promise<unknown>;
}

const require = createRequire(import.meta.url);

// Set only after a successful init; every other export is a no-op until then.
let sentry: SentryLike | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSentryLike(value: unknown): value is SentryLike {
  return isRecord(value)
    && typeof value.init === 'function'
    && typeof value.withScope === 'function'
    && typeof value.captureException === 'function'
    && typeof value.flush === 'function';
}

function loadSentry(): SentryLike | null {
  try {
    const loaded: unknown = require('@sentry/node');
    return isSentryLike(loaded) ? loaded : null;
  } catch {
    return null;
  }
}

const SENSITIVE_KEY = /key|token|secret|authorization|dsn|redis_url|personal|skills|prompt/i;

function redactRecord(record: Record<string, unknown>): void {
  for (const key of Object.keys(record)) {
    if (SENSITIVE_KEY.test(key)) record[key] = '[REDACTED]';
  }
}

/** Strips credentials, the candidate profile and prompts from `extra` and breadcrumb data. */
export function redactEvent(event: SentryEvent): SentryEvent {
  if (isRecord(event.extra)) redactRecord(event.extra);
  if (Array.isArray(event.breadcrumbs)) {
    for (const crumb of event.breadcrumbs) {
      if (isRecord(crumb) && isRecord(crumb.data)) redactRecord(crumb.data);
    }
  }
  return event;
}

export function initSentry(dsn: string | undefined = process.env.SENTRY_DSN): void {
  if (!dsn) {
    logger.debug('SENTRY_DSN not set, Sentry disabled');
    return;
  }
  const loaded = loadSentry();
  if (!loaded) {
    logger.warn('Sentry requested but @sentry/node could not be loaded, continuing without Sentry');
    return;
  }

  loaded.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'development',
    tracesSampleRate: 0,
    beforeSend: redactEvent,
  });
  sentry = loaded;
  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  const client = sentry;
  if (!client) return;
  client.withScope((scope) => {
    for (const [key, value] of Object.entries(context ?? {})) {
      scope.setExtra(key, value);
    }
    client.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!sentry) return;
  try {
    await sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Sentry flush failed during shutdown');
  }
}
