/**
 * Postgres Checkpoint Store
 *
 * CheckpointStore over the conversation_events table. The bigserial id gives
 * insertion order; appends for one session go through a keyed mutex so a
 * flag-cleared event can never land before the extraction event issued ahead
 * of it by this process. A repeated event key hits the unique
 * (session_id, event_key) index and returns the row already logged.
 */

import { v4 as uuidv4 } from 'uuid';
import { and, asc, desc, eq, inArray } from 'drizzle-orm';
import type {
  Checkpoint,
  ContactRecord,
  ConversationEvent,
  ConversationEventType,
  EventData,
} from '../../../../packages/shared-types/src';
import { conversationEvents, type ConversationEventRow, type Database } from '../../../../packages/db/src';
import {
  FLAG_EVENT_TYPES,
  deriveKnownContact,
  toCheckpoint,
  type AppendOptions,
  type CheckpointStore,
  type GetEventsOptions,
  type WaitingSession,
} from './checkpoint-store';
import { KeyedMutex } from '../utils/keyed-mutex';
import { PersistenceError } from '../utils/errors';
import { describeError } from '../utils/logging';

function toEvent(row: ConversationEventRow): ConversationEvent {
  return {
    id: String(row.id),
    sessionId: row.sessionId,
    eventKey: row.eventKey,
    eventType: row.eventType,
    data: row.data,
    timestamp: row.createdAt,
  };
}

export class PostgresCheckpointStore implements CheckpointStore {
  private db: Database;
  private mutex = new KeyedMutex();

  constructor(db: Database) {
    this.db = db;
  }

  async appendEvent(
    sessionId: string,
    eventType: ConversationEventType,
    data: EventData,
    options: AppendOptions = {}
  ): Promise<ConversationEvent> {
    const eventKey = options.eventKey ?? uuidv4();

    return this.mutex.runExclusive(sessionId, () =>
      this.guard(sessionId, `append ${eventType}`, async () => {
        const [row] = await this.db
          .insert(conversationEvents)
          .values({ sessionId, eventKey, eventType, data })
          .onConflictDoNothing({ target: [conversationEvents.sessionId, conversationEvents.eventKey] })
          .returning();

        if (row) {
          console.log(`[CheckpointStore] Logged ${eventType} event to session ${sessionId}`);
          return toEvent(row);
        }

        const [existing] = await this.db
          .select()
          .from(conversationEvents)
          .where(and(eq(conversationEvents.sessionId, sessionId), eq(conversationEvents.eventKey, eventKey)));

        if (!existing) {
          throw new Error(`Event ${eventKey} neither inserted nor found`);
        }

        console.log(`[CheckpointStore] Event ${eventKey} already logged to session ${sessionId}`);
        return toEvent(existing);
      })
    );
  }

  async isWaitingForContactInfo(sessionId: string): Promise<boolean> {
    const checkpoint = await this.getLatestCheckpoint(sessionId);
    return checkpoint?.waiting ?? false;
  }

  async getEvents(sessionId: string, options: GetEventsOptions = {}): Promise<ConversationEvent[]> {
    return this.guard(sessionId, 'read events', async () => {
      const where = options.eventType
        ? and(eq(conversationEvents.sessionId, sessionId), eq(conversationEvents.eventType, options.eventType))
        : eq(conversationEvents.sessionId, sessionId);

      if (options.limit !== undefined) {
        // Newest N, returned oldest first
        const rows = await this.db
          .select()
          .from(conversationEvents)
          .where(where)
          .orderBy(desc(conversationEvents.id))
          .limit(Math.max(options.limit, 0));
        return rows.reverse().map(toEvent);
      }

      const rows = await this.db
        .select()
        .from(conversationEvents)
        .where(where)
        .orderBy(asc(conversationEvents.id));
      return rows.map(toEvent);
    });
  }

  async getLatestCheckpoint(sessionId: string): Promise<Checkpoint | null> {
    return this.guard(sessionId, 'read checkpoint', async () => {
      const [row] = await this.db
        .select()
        .from(conversationEvents)
        .where(
          and(
            eq(conversationEvents.sessionId, sessionId),
            inArray(conversationEvents.eventType, FLAG_EVENT_TYPES)
          )
        )
        .orderBy(desc(conversationEvents.id))
        .limit(1);

      return row ? toCheckpoint(toEvent(row)) : null;
    });
  }

  async getKnownContact(sessionId: string): Promise<ContactRecord | null> {
    const events = await this.getEvents(sessionId, { eventType: 'contact_info_extracted' });
    return deriveKnownContact(events);
  }

  async findWaitingSessions(options: { olderThan: Date }): Promise<WaitingSession[]> {
    return this.guard('*', 'find waiting sessions', async () => {
      // Newest flag event per session
      const rows = await this.db
        .selectDistinctOn([conversationEvents.sessionId])
        .from(conversationEvents)
        .where(inArray(conversationEvents.eventType, FLAG_EVENT_TYPES))
        .orderBy(conversationEvents.sessionId, desc(conversationEvents.id));

      return rows
        .filter((row) => row.eventType === 'contact_info_flag_set' && row.createdAt < options.olderThan)
        .map((row) => ({ sessionId: row.sessionId, since: row.createdAt }));
    });
  }

  private async guard<T>(sessionId: string, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      console.error(`[CheckpointStore] Failed to ${operation} for session ${sessionId}:`, describeError(error));
      throw new PersistenceError(sessionId, `Failed to ${operation}: ${describeError(error)}`, { cause: error });
    }
  }
}
