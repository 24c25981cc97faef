/**
 * Conversation API Route Tests
 */

import { describe, test, expect, vi, beforeEach } from 'vitest';
import { createApp } from '../index';
import { InMemoryCheckpointStore } from '../services/checkpoint-store';
import { ContactResolutionPolicy, patternStrategy } from '../services/contact-resolution';
import { InboundMessageRouter } from '../services/inbound-router';

function createTestApp(store: InMemoryCheckpointStore = new InMemoryCheckpointStore()) {
  const resolver = new ContactResolutionPolicy([patternStrategy]);
  const router = new InboundMessageRouter({ store, resolver, retry: { maxAttempts: 1 } });
  const app = createApp({ store, router, resolver, logRequests: false });
  return { app, store };
}

function postJson(path: string, body: unknown): [string, RequestInit] {
  return [
    path,
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    },
  ];
}

describe('/conversations API', () => {
  let app: ReturnType<typeof createTestApp>['app'];
  let store: InMemoryCheckpointStore;

  beforeEach(() => {
    ({ app, store } = createTestApp());
  });

  describe('POST /conversations/:sessionId/messages', () => {
    test('extracts contact info from the body', async () => {
      const res = await app.request(...postJson('/conversations/s1/messages', { body: 'reach me john@example.com' }));

      expect(res.status).toBe(200);
      const data = await res.json();
      expect(data).toMatchObject({
        outcome: {
          sessionId: 's1',
          state: 'extracted',
          contact: { email: 'john@example.com', phone: null },
          extractionMethod: 'regex',
          source: 'message_body',
          originalMessage: null,
          events: [
            {
              event_type: 'contact_info_extracted',
              session_id: 's1',
              data: {
                email: 'john@example.com',
                phone: null,
                extraction_method: 'regex',
                source: 'message_body',
              },
            },
          ],
        },
      });
    });

    test('resumes a paused session', async () => {
      await app.request(...postJson('/conversations/s1/messages', { body: 'Can I get a quote?' }));

      const res = await app.request(...postJson('/conversations/s1/messages', { body: 'sure, 305.555.1234' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        outcome: {
          state: 'resumed',
          contact: { email: null, phone: '+1-305-555-1234' },
          originalMessage: 'Can I get a quote?',
        },
      });
    });

    test('rejects malformed payloads', async () => {
      const res = await app.request(...postJson('/conversations/s1/messages', { body: 42 }));
      expect(res.status).toBe(400);
    });

    test('rejects oversized bodies', async () => {
      const res = await app.request(...postJson('/conversations/s1/messages', { body: 'a'.repeat(20_001) }));

      expect(res.status).toBe(400);
      expect(await store.getEvents('s1')).toEqual([]);
    });

    test('reports store failures as retryable 503s', async () => {
      const failing = new InMemoryCheckpointStore();
      vi.spyOn(failing, 'appendEvent').mockRejectedValue(new Error('database unavailable'));
      const { app: failingApp } = createTestApp(failing);

      const res = await failingApp.request(
        ...postJson('/conversations/s1/messages', { body: 'reach me john@example.com' })
      );

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        error: 'Service Unavailable',
        code: 'TURN_PROCESSING_FAILED',
        message: 'Failed to record turn for session s1 after 1 attempt(s)',
        retryable: true,
        context: { sessionId: 's1', attempts: 1 },
      });
    });
  });

  describe('GET /conversations/:sessionId/events', () => {
    test('returns events oldest first with limit and type filters', async () => {
      await store.appendEvent('s1', 'email_received', { message_id: 'm-1' });
      await store.appendEvent('s1', 'contact_info_flag_set', { waiting_for_contact_info: true });
      await store.appendEvent('s1', 'email_received', { message_id: 'm-2' });

      const all = await (await app.request('/conversations/s1/events')).json();
      expect(all).toMatchObject({
        events: [
          { event_type: 'email_received' },
          { event_type: 'contact_info_flag_set' },
          { event_type: 'email_received' },
        ],
      });

      const limited = await (await app.request('/conversations/s1/events?limit=1')).json();
      expect(limited).toMatchObject({ events: [{ data: { message_id: 'm-2' } }] });

      const filtered = await (await app.request('/conversations/s1/events?type=contact_info_flag_set')).json();
      expect(filtered).toMatchObject({ events: [{ event_type: 'contact_info_flag_set' }] });
    });

    test('rejects an unknown event type', async () => {
      const res = await app.request('/conversations/s1/events?type=bogus');
      expect(res.status).toBe(400);
    });
  });

  describe('/conversations/:sessionId/checkpoint', () => {
    test('sets, reads and clears the checkpoint', async () => {
      const set = await app.request(
        ...postJson('/conversations/s1/checkpoint', { waiting: true, originalMessage: 'quote please' })
      );
      expect(set.status).toBe(201);

      const read = await app.request('/conversations/s1/checkpoint');
      expect(await read.json()).toMatchObject({
        sessionId: 's1',
        waitingForContactInfo: true,
        checkpoint: { waiting: true, originalMessage: 'quote please', reason: null },
        contact: null,
      });

      const cleared = await app.request(...postJson('/conversations/s1/checkpoint', { waiting: false }));
      expect(cleared.status).toBe(200);
      expect(await cleared.json()).toMatchObject({
        event: { event_type: 'contact_info_flag_cleared', data: { reason: 'manual' } },
      });
    });

    test('an unknown session has no checkpoint', async () => {
      const res = await app.request('/conversations/s1/checkpoint');
      expect(await res.json()).toEqual({
        sessionId: 's1',
        waitingForContactInfo: false,
        checkpoint: null,
        contact: null,
      });
    });

    test('clearing a session that is not waiting is a conflict', async () => {
      const res = await app.request(...postJson('/conversations/s1/checkpoint', { waiting: false }));

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: 'Session is not waiting for contact info' });
    });
  });
});
