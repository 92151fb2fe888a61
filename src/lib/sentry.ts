import { createRequire } from 'node:module';
import logger from './logger.js';

type SentryScope = { setExtra: (key: string, value: unknown) => void };

type SentryLike = {
  init: (options: {
    dsn: string;
    environment?: string;
    tracesSampleRate?: number;
    beforeSend?: (event: Record<string, unknown>) => Record<string, unknown> | null;
  }) => void;
  withScope: (callback: (scope: SentryScope) => void) => void;
  captureException: (err: unknown) => void;
  flush: (timeoutMs?: number) => Promise<unknown>;
};

const require = createRequire(import.meta.url);
let sentryModule: SentryLike | null | undefined;

function isSentryLike(value: unknown): value is SentryLike {
  return typeof value === 'object' && value !== null
    && 'init' in value && typeof value.init === 'function'
    && 'withScope' in value && typeof value.withScope === 'function'
    && 'captureException' in value && typeof value.captureException === 'function'
    && 'flush' in value && typeof value.flush === 'function';
}

function getSentry(): SentryLike | null {
  if (sentryModule !== undefined) return sentryModule;
  try {
    const loaded: unknown = require('@sentry/node');
    sentryModule = isSentryLike(loaded) ? loaded : null;
  } catch {
    sentryModule = null;
  }
  return sentryModule;
}

const SENSITIVE_ENV_KEYS = [
  'ANTHROPIC_API_KEY',
  'GROQ_API_KEY',
  'SENTRY_DSN',
];

function redactExtra(event: Record<string, unknown>): Record<string, unknown> {
  const extra = event.extra;
  if (!extra || typeof extra !== 'object' || Array.isArray(extra)) return event;
  const scrubbed: Record<string, unknown> = { ...extra };
  for (const key of SENSITIVE_ENV_KEYS) {
    if (key in scrubbed) {
      scrubbed[key] = '[REDACTED]';
    }
  }
  return { ...event, extra: scrubbed };
}

export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    logger.info('SENTRY_DSN not set, Sentry disabled');
    return;
  }
  const Sentry = getSentry();
  if (!Sentry) {
    logger.warn('Sentry requested but @sentry/node could not be loaded, continuing without Sentry');
    return;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'development',
    tracesSampleRate: 0.1,
    beforeSend: redactExtra,
  });

  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  if (!process.env.SENTRY_DSN) return;
  const Sentry = getSentry();
  if (!Sentry) return;

  Sentry.withScope((scope) => {
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        scope.setExtra(key, value);
      }
    }
    Sentry.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!process.env.SENTRY_DSN) return;
  const Sentry = getSentry();
  if (!Sentry) return;
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Sentry flush failed');
  }
}
