/**
 * Conversation API Routes
 *
 * Inbound message routing and checkpoint inspection per session.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { ConversationEvent, RouterOutcome } from '../../../../packages/shared-types/src';
import { isConversationEventType, serializeEvent } from '../../../../packages/shared-types/src';
import type { CheckpointStore } from '../services/checkpoint-store';
import type { InboundMessageRouter } from '../services/inbound-router';

// Request validation schemas
const nullableString = z.string().nullable().optional();

// Bodies go through regex extraction under the session lock
const MAX_BODY_LENGTH = 20_000;

const inboundMessageSchema = z
  .object({
    email: nullableString,
    phone: nullableString,
    body: z.string().max(MAX_BODY_LENGTH).nullable().optional(),
    messageId: nullableString,
  })
  .strict();

const checkpointSchema = z.object({
  waiting: z.boolean(),
  originalMessage: z.string().optional(),
});

const eventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  type: z
    .string()
    .refine(isConversationEventType, { message: 'Unknown event type' })
    .optional(),
});

// Types for Hono context
interface Env {
  Variables: {
    store: CheckpointStore;
    router: InboundMessageRouter;
  };
}

function formatOutcomeResponse(outcome: RouterOutcome) {
  return {
    sessionId: outcome.sessionId,
    state: outcome.state,
    contact: outcome.contact,
    extractionMethod: outcome.extractionMethod ?? null,
    source: outcome.source ?? null,
    originalMessage: outcome.originalMessage ?? null,
    events: outcome.events.map(formatEventResponse),
  };
}

function formatEventResponse(event: ConversationEvent) {
  return serializeEvent(event);
}

/**
 * Create conversation routes
 */
export function createConversationRoutes(): Hono<Env> {
  const app = new Hono<Env>();

  /**
   * POST /conversations/:sessionId/messages - Route an inbound message
   */
  app.post(
    '/:sessionId/messages',
    zValidator('json', inboundMessageSchema),
    async (c) => {
      const sessionId = c.req.param('sessionId');
      const payload = c.req.valid('json');
      const router = c.get('router');

      const outcome = await router.handleInbound(sessionId, payload);

      return c.json({
        outcome: formatOutcomeResponse(outcome),
      });
    }
  );

  /**
   * GET /conversations/:sessionId/events - Event history, oldest first
   */
  app.get(
    '/:sessionId/events',
    zValidator('query', eventsQuerySchema),
    async (c) => {
      const sessionId = c.req.param('sessionId');
      const { limit, type } = c.req.valid('query');
      const store = c.get('store');

      const eventType = type !== undefined && isConversationEventType(type) ? type : undefined;
      const events = await store.getEvents(sessionId, { limit, eventType });

      return c.json({
        events: events.map(formatEventResponse),
      });
    }
  );

  /**
   * GET /conversations/:sessionId/checkpoint - Current checkpoint and known contact
   */
  app.get('/:sessionId/checkpoint', async (c) => {
    const sessionId = c.req.param('sessionId');
    const store = c.get('store');

    const [checkpoint, contact] = await Promise.all([
      store.getLatestCheckpoint(sessionId),
      store.getKnownContact(sessionId),
    ]);

    return c.json({
      sessionId,
      waitingForContactInfo: checkpoint?.waiting ?? false,
      checkpoint: checkpoint
        ? {
            waiting: checkpoint.waiting,
            originalMessage: checkpoint.originalMessage ?? null,
            reason: checkpoint.reason ?? null,
            at: checkpoint.at.toISOString(),
          }
        : null,
      contact,
    });
  });

  /**
   * POST /conversations/:sessionId/checkpoint - Set or clear the waiting flag
   */
  app.post(
    '/:sessionId/checkpoint',
    zValidator('json', checkpointSchema),
    async (c) => {
      const sessionId = c.req.param('sessionId');
      const { waiting, originalMessage } = c.req.valid('json');
      const router = c.get('router');

      if (waiting) {
        const event = await router.setCheckpoint(sessionId, originalMessage);
        return c.json({ event: formatEventResponse(event) }, 201);
      }

      const event = await router.clearCheckpoint(sessionId, 'manual');
      if (!event) {
        return c.json({ error: 'Session is not waiting for contact info' }, 409);
      }
      return c.json({ event: formatEventResponse(event) });
    }
  );

  return app;
}
