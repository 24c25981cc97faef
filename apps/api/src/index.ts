/**
 * Contact Capture API
 *
 * Hono application: inbound message routing, checkpoint inspection and
 * stateless extraction.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { createConversationRoutes } from './routes/conversations';
import { createExtractRoutes } from './routes/extract';
import type { CheckpointStore } from './services/checkpoint-store';
import type { ContactResolver } from './services/contact-resolution';
import type { InboundMessageRouter } from './services/inbound-router';
import { formatErrorResponse } from './utils/errors';
import { describeError } from './utils/logging';

// Environment types
interface Env {
  Variables: {
    store: CheckpointStore;
    router: InboundMessageRouter;
    resolver: ContactResolver;
  };
}

export interface AppConfig {
  store: CheckpointStore;
  router: InboundMessageRouter;
  resolver: ContactResolver;
  corsOrigins?: string[];
  /** Request logging; off in tests */
  logRequests?: boolean;
}

/**
 * Create the API application
 */
export function createApp(config: AppConfig): Hono<Env> {
  const app = new Hono<Env>();

  // Middleware
  if (config.logRequests ?? true) {
    app.use('*', logger());
  }
  app.use('*', cors({
    origin: config.corsOrigins ?? ['http://localhost:3000', 'http://localhost:5173'],
    allowHeaders: ['Content-Type', 'Accept'],
    allowMethods: ['GET', 'POST', 'OPTIONS'],
  }));

  app.use('*', async (c, next) => {
    c.set('store', config.store);
    c.set('router', config.router);
    c.set('resolver', config.resolver);
    await next();
  });

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  // Mount routes
  app.route('/conversations', createConversationRoutes());
  app.route('/extract', createExtractRoutes());

  // Error handler
  app.onError((err, c) => {
    const { status, body } = formatErrorResponse(err);
    if (status >= 500) {
      console.error(`[API] ${c.req.method} ${c.req.path} failed:`, describeError(err));
    }
    return c.json(body, status);
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not Found' }, 404);
  });

  return app;
}
