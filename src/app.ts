import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { EconomyApi } from './engine/api.js';
import type { PersistenceGateway } from './services/gateway.js';
import { catalogRoutes } from './routes/catalog.js';
import { sessionRoutes } from './routes/sessions.js';

export interface AppOptions {
  adminKey: string | null;
  // Access lines on stdout; tests turn this off.
  accessLog?: boolean;
}

export function createApp(api: EconomyApi, gateway: PersistenceGateway, options: AppOptions) {
  const app = new Hono();

  // Middleware
  app.use('*', cors());
  if (options.accessLog !== false) app.use('*', logger());

  // ─── Routes ───

  app.get('/health', (c) => {
    return c.json({
      status: gateway.isClosed ? 'closed' : 'ok',
      backend: gateway.backend,
      apiVersion: api.version,
      sessions: api.sessionStats(),
      store: gateway.stats(),
    });
  });

  app.route('/catalog', catalogRoutes(api, { adminKey: options.adminKey }));
  app.route('/sessions', sessionRoutes(api));

  // ─── 404 ───
  app.notFound((c) => c.json({ error: 'Not found', code: 'NotFound' }, 404));

  // ─── Error Handler ───
  app.onError((err, c) => {
    console.error('[Server] Unhandled error:', err.message);
    console.error('Stack:', err.stack);
    return c.json({ error: 'Internal server error', code: 'Internal' }, 500);
  });

  return app;
}
