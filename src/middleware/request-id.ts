import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._:-]+$/;

/**
 * Accepts a caller-supplied `X-Request-ID` when it is short and safe, else
 * mints one. Handlers log through `c.get('log')`, which carries the id.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const raw = c.req.header('X-Request-ID');
  const candidate = raw?.trim().slice(0, 64);
  const requestId = candidate && REQUEST_ID_RE.test(candidate) ? candidate : randomUUID();

  c.set('requestId', requestId);
  c.set('log', logger.child({ request_id: requestId }));
  c.header('X-Request-ID', requestId);
  await next();
}
