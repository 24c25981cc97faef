/**
 * Server entry point
 *
 * Wires settings, the event store, the extraction chain, the router and the
 * checkpoint sweeper, then serves the app on Node.
 */

import { serve } from '@hono/node-server';
import { createDatabase, redactConnectionString, type DatabaseHandle } from '../../../packages/db/src';
import { createApp } from './index';
import { loadSettings } from './config/settings';
import { InMemoryCheckpointStore, type CheckpointStore } from './services/checkpoint-store';
import { PostgresCheckpointStore } from './services/postgres-checkpoint-store';
import { createClaudeClient } from './services/claude-client';
import { FallbackExtractor } from './services/fallback-extractor';
import { createContactResolutionPolicy } from './services/contact-resolution';
import { InboundMessageRouter } from './services/inbound-router';
import { createCheckpointSweeper } from './worker/checkpoint-sweeper';
import { describeError } from './utils/logging';

// Global error handlers
process.on('uncaughtException', (error) => {
  console.error('[API] Uncaught exception:', error);
  console.error('[API] Stack:', error.stack);
});

process.on('unhandledRejection', (reason) => {
  console.error('[API] Unhandled rejection:', describeError(reason));
});

const settings = loadSettings();

console.log('[API] Starting server...');
console.log('[API] Environment:', settings.env);
console.log('[API] Port:', settings.port);

let database: DatabaseHandle | null = null;
let store: CheckpointStore;

if (settings.databaseUrl) {
  console.log('[API] Using Postgres event store at', redactConnectionString(settings.databaseUrl));
  database = createDatabase(settings.databaseUrl, { debug: settings.dbDebug });
  store = new PostgresCheckpointStore(database.db);
} else {
  console.warn('[API] DATABASE_URL not set, events are kept in memory only');
  store = new InMemoryCheckpointStore();
}

console.log('[API] ANTHROPIC_API_KEY:', settings.anthropicApiKey ? 'SET (hidden)' : 'NOT SET');
const client = createClaudeClient(settings.anthropicApiKey, {
  defaultTimeoutMs: settings.fallbackTimeoutMs,
  model: settings.claudeModel,
});

const fallback = new FallbackExtractor({ client, timeoutMs: settings.fallbackTimeoutMs });
const resolver = createContactResolutionPolicy(fallback);
const router = new InboundMessageRouter({
  store,
  resolver,
  retry: {
    maxAttempts: settings.persistMaxAttempts,
    initialDelayMs: settings.persistRetryDelayMs,
  },
});

const app = createApp({
  store,
  router,
  resolver,
  corsOrigins: settings.corsOrigins,
  logRequests: settings.env !== 'test',
});

const sweeper = createCheckpointSweeper({
  store,
  checkpoints: router,
  pollIntervalMs: settings.sweepIntervalMs,
  maxWaitMs: settings.checkpointMaxWaitMs,
});
sweeper.start();

const server = serve({ fetch: app.fetch, port: settings.port }, (info) => {
  console.log(`[API] Listening on http://localhost:${info.port}`);
});

let shuttingDown = false;

function shutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[API] ${signal} received, shutting down`);
  sweeper.stop();
  server.close((error) => {
    if (error) {
      console.error('[API] Error closing server:', describeError(error));
    }
    const closing = database ? database.close() : Promise.resolve();
    closing
      .catch((closeError: unknown) => {
        console.error('[API] Error closing database:', describeError(closeError));
      })
      .finally(() => {
        console.log('[API] Server stopped');
        process.exit(0);
      });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
