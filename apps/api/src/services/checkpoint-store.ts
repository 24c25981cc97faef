/**
 * Conversation Checkpoint Store
 *
 * Append-only event log per conversation session. The "waiting for contact
 * info" checkpoint is never stored as a mutable field: it is derived from the
 * newest flag event in the session's history, so the flag and its audit trail
 * cannot disagree.
 *
 * Guarantees every implementation provides:
 * - events for one session are persisted in the order appendEvent was called
 * - a write is visible to the next read for the same session
 * - a failed write rejects with PersistenceError, it is never dropped silently
 * - appending an event key already in the session returns the logged event
 *   and writes nothing
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  Checkpoint,
  ContactRecord,
  ConversationEvent,
  ConversationEventType,
  EventData,
} from '../../../../packages/shared-types/src';
import {
  isContactExtractedData,
  isFlagClearedData,
  isFlagSetData,
} from '../../../../packages/shared-types/src';
import { KeyedMutex } from '../utils/keyed-mutex';
import { PersistenceError } from '../utils/errors';

export interface GetEventsOptions {
  /** Only the newest N events (still returned oldest first) */
  limit?: number;
  eventType?: ConversationEventType;
}

export interface AppendOptions {
  /** Idempotency key; generated when omitted */
  eventKey?: string;
}

export interface WaitingSession {
  sessionId: string;
  since: Date;
}

export interface CheckpointStore {
  appendEvent(
    sessionId: string,
    eventType: ConversationEventType,
    data: EventData,
    options?: AppendOptions
  ): Promise<ConversationEvent>;
  isWaitingForContactInfo(sessionId: string): Promise<boolean>;
  getEvents(sessionId: string, options?: GetEventsOptions): Promise<ConversationEvent[]>;
  getLatestCheckpoint(sessionId: string): Promise<Checkpoint | null>;
  getKnownContact(sessionId: string): Promise<ContactRecord | null>;
  findWaitingSessions(options: { olderThan: Date }): Promise<WaitingSession[]>;
}

export const FLAG_EVENT_TYPES: ConversationEventType[] = ['contact_info_flag_set', 'contact_info_flag_cleared'];

/**
 * Turn a flag event into a checkpoint, or null for any other event
 */
export function toCheckpoint(event: ConversationEvent): Checkpoint | null {
  if (event.eventType === 'contact_info_flag_set' && isFlagSetData(event.data)) {
    return {
      waiting: true,
      originalMessage: event.data.original_message,
      at: event.timestamp,
    };
  }
  if (event.eventType === 'contact_info_flag_cleared' && isFlagClearedData(event.data)) {
    return {
      waiting: false,
      reason: event.data.reason,
      at: event.timestamp,
    };
  }
  return null;
}

/**
 * Newest flag event wins; events are ordered oldest first
 */
export function deriveCheckpoint(events: readonly ConversationEvent[]): Checkpoint | null {
  for (let i = events.length - 1; i >= 0; i--) {
    const checkpoint = toCheckpoint(events[i]);
    if (checkpoint) {
      return checkpoint;
    }
  }
  return null;
}

/**
 * Merge contact_info_extracted events: the newest non-null value per field wins
 */
export function deriveKnownContact(events: readonly ConversationEvent[]): ContactRecord | null {
  const contact: ContactRecord = { email: null, phone: null };

  for (let i = events.length - 1; i >= 0; i--) {
    const event = events[i];
    if (event.eventType !== 'contact_info_extracted' || !isContactExtractedData(event.data)) {
      continue;
    }
    contact.email = contact.email ?? event.data.email ?? null;
    contact.phone = contact.phone ?? event.data.phone ?? null;
    if (contact.email && contact.phone) break;
  }

  return contact.email || contact.phone ? contact : null;
}

function copyEvent(event: ConversationEvent): ConversationEvent {
  return { ...event, data: structuredClone(event.data) };
}

/**
 * In-memory store. Used by tests and by the server when no DATABASE_URL is set.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private sessions = new Map<string, ConversationEvent[]>();
  private mutex = new KeyedMutex();
  private sequence = 0;
  private now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async appendEvent(
    sessionId: string,
    eventType: ConversationEventType,
    data: EventData,
    options: AppendOptions = {}
  ): Promise<ConversationEvent> {
    if (!sessionId) {
      throw new PersistenceError(sessionId, 'Cannot append event without a session id');
    }

    return this.mutex.runExclusive(sessionId, async () => {
      const eventKey = options.eventKey ?? uuidv4();
      const events = this.sessions.get(sessionId) ?? [];

      const existing = events.find((event) => event.eventKey === eventKey);
      if (existing) {
        console.log(`[CheckpointStore] Event ${eventKey} already logged to session ${sessionId}`);
        return copyEvent(existing);
      }

      const event: ConversationEvent = {
        id: String(++this.sequence),
        sessionId,
        eventKey,
        eventType,
        data: structuredClone(data),
        timestamp: this.now(),
      };

      events.push(event);
      this.sessions.set(sessionId, events);

      console.log(`[CheckpointStore] Logged ${eventType} event to session ${sessionId}`);
      return copyEvent(event);
    });
  }

  async isWaitingForContactInfo(sessionId: string): Promise<boolean> {
    return deriveCheckpoint(this.history(sessionId))?.waiting ?? false;
  }

  async getEvents(sessionId: string, options: GetEventsOptions = {}): Promise<ConversationEvent[]> {
    let events = this.history(sessionId);
    if (options.eventType) {
      events = events.filter((event) => event.eventType === options.eventType);
    }
    if (options.limit !== undefined) {
      events = options.limit > 0 ? events.slice(-options.limit) : [];
    }
    return events.map(copyEvent);
  }

  async getLatestCheckpoint(sessionId: string): Promise<Checkpoint | null> {
    return deriveCheckpoint(this.history(sessionId));
  }

  async getKnownContact(sessionId: string): Promise<ContactRecord | null> {
    return deriveKnownContact(this.history(sessionId));
  }

  async findWaitingSessions(options: { olderThan: Date }): Promise<WaitingSession[]> {
    const waiting: WaitingSession[] = [];
    for (const [sessionId, events] of this.sessions) {
      const checkpoint = deriveCheckpoint(events);
      if (checkpoint?.waiting && checkpoint.at < options.olderThan) {
        waiting.push({ sessionId, since: checkpoint.at });
      }
    }
    return waiting;
  }

  private history(sessionId: string): ConversationEvent[] {
    return this.sessions.get(sessionId) ?? [];
  }
}
