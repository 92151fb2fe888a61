import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createRefinementRoutes, type RefinementRouteOptions } from './routes/refinement.js';
import { createProviderFromEnv, type ProviderSelection } from './lib/llm.js';
import { parsePositiveInt } from './lib/http-body-guard.js';
import logger from './lib/logger.js';
import { initSentry, captureError, flushSentry } from './lib/sentry.js';

export * from './engine/index.js';

let shuttingDown = false;
const startTime = Date.now();

export interface AppOptions extends RefinementRouteOptions {
  /** Provider reported by `/health`; read from the environment when omitted. */
  llmSelection?: ProviderSelection | null;
}

export function createApp(options: AppOptions = {}): Hono {
  const app = new Hono();
  const selection = options.llmSelection === undefined ? createProviderFromEnv() : options.llmSelection;

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (shuttingDown && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: shuttingDown ? 'draining' : 'ok',
      llm_provider: selection?.provider.name ?? null,
      generator: selection ? 'llm' : 'offline',
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api', createRefinementRoutes(options));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    captureError(err, { path: c.req.path, method: c.req.method, requestId });
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

const app = createApp();
let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  server.close(() => {
    void flushSentry(2000).finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer() {
  if (server) return server;

  initSentry();
  const port = parsePositiveInt(process.env.PORT, 3001);
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Resume refinery listening on http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { app };
