/**
 * Inbound Message Router
 *
 * Decides, for every inbound message, whether the session is paused waiting
 * for contact info (resume from the checkpoint) or this is a fresh turn, runs
 * contact resolution when needed and records the outcome in the event log.
 *
 * The read-decide-append sequence for one session runs under a per-session
 * lock, so two messages arriving together cannot both see the flag set and
 * both resume. The router keeps no other state between calls.
 *
 * Every append carries an event key. For a message with a transport id the key
 * is derived from that id, so a redelivered message rewrites nothing it already
 * logged; `email_received` is appended last and marks the turn complete.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  ContactExtractedData,
  ContactRecord,
  ConversationEvent,
  ConversationEventType,
  EventData,
  ExtractionResult,
  FlagClearReason,
  FlagClearedData,
  FlagSetData,
  InboundPayload,
  RouterOutcome,
} from '../../../../packages/shared-types/src';
import { hasContact, isMessageReceivedData } from '../../../../packages/shared-types/src';
import type { CheckpointStore } from './checkpoint-store';
import type { ContactResolver } from './contact-resolution';
import { KeyedMutex } from '../utils/keyed-mutex';
import { RetryExhaustedError, withRetry, type RetryOptions } from '../utils/retry';
import { TurnProcessingError } from '../utils/errors';
import { describeError, maskEmail, maskPhone } from '../utils/logging';

export interface InboundRouterConfig {
  store: CheckpointStore;
  resolver: ContactResolver;
  /** Bounded retry for event-store reads and writes */
  retry?: RetryOptions;
}

export interface ClearCheckpointOptions {
  /** Only clear a checkpoint set before this instant */
  olderThan?: Date;
}

/**
 * One inbound message being routed
 */
interface Turn {
  sessionId: string;
  messageId?: string;
  events: ConversationEvent[];
}

const NO_CONTACT: ContactRecord = { email: null, phone: null };

function present(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export class InboundMessageRouter {
  private store: CheckpointStore;
  private resolver: ContactResolver;
  private retry: RetryOptions;
  private sessionLocks = new KeyedMutex();

  constructor(config: InboundRouterConfig) {
    this.store = config.store;
    this.resolver = config.resolver;
    this.retry = config.retry ?? {};
  }

  /**
   * Route one inbound message. Rejects with TurnProcessingError when the event
   * store keeps failing; extraction problems never reject.
   */
  async handleInbound(sessionId: string, payload: InboundPayload): Promise<RouterOutcome> {
    return this.sessionLocks.runExclusive(sessionId, () => this.route(sessionId, payload));
  }

  /**
   * Pause the session until the user sends contact info
   */
  async setCheckpoint(sessionId: string, originalMessage?: string): Promise<ConversationEvent> {
    return this.sessionLocks.runExclusive(sessionId, () => {
      const flag: FlagSetData = {
        waiting_for_contact_info: true,
        ...(originalMessage ? { original_message: originalMessage } : {}),
      };
      return this.appendWithKey(sessionId, 'contact_info_flag_set', { ...flag }, uuidv4());
    });
  }

  /**
   * Clear a waiting flag. Returns null when the session was not waiting, or
   * when its checkpoint is newer than `olderThan`.
   */
  async clearCheckpoint(
    sessionId: string,
    reason: FlagClearReason,
    options: ClearCheckpointOptions = {}
  ): Promise<ConversationEvent | null> {
    return this.sessionLocks.runExclusive(sessionId, async () => {
      const checkpoint = await this.persist(sessionId, () => this.store.getLatestCheckpoint(sessionId));
      if (!checkpoint?.waiting) {
        return null;
      }
      if (options.olderThan && checkpoint.at >= options.olderThan) {
        console.log(`[InboundRouter] Checkpoint for session ${sessionId} was set again, keeping it`);
        return null;
      }
      const cleared: FlagClearedData = { waiting_for_contact_info: false, reason };
      return this.appendWithKey(sessionId, 'contact_info_flag_cleared', { ...cleared }, uuidv4());
    });
  }

  private async route(sessionId: string, payload: InboundPayload): Promise<RouterOutcome> {
    const body = present(payload.body) ? payload.body : '';
    const turn: Turn = {
      sessionId,
      ...(present(payload.messageId) ? { messageId: payload.messageId } : {}),
      events: [],
    };

    if (turn.messageId && (await this.alreadyHandled(sessionId, turn.messageId))) {
      console.log(`[InboundRouter] Message ${turn.messageId} already handled for session ${sessionId}`);
      const known = await this.persist(sessionId, () => this.store.getKnownContact(sessionId));
      return { sessionId, state: 'duplicate', contact: known ?? { ...NO_CONTACT }, events: [] };
    }

    const waiting = await this.persist(sessionId, () => this.store.isWaitingForContactInfo(sessionId));
    const outcome = waiting
      ? await this.resumeFromCheckpoint(turn, payload, body)
      : await this.handleFreshTurn(turn, payload, body);

    if (turn.messageId) {
      await this.append(turn, 'email_received', { message_id: turn.messageId });
    }

    return outcome;
  }

  /**
   * The session is paused waiting for contact info: take it from the payload's
   * structured fields, or try once to read it from the body, then clear the
   * flag whatever the result.
   */
  private async resumeFromCheckpoint(turn: Turn, payload: InboundPayload, body: string): Promise<RouterOutcome> {
    const { sessionId } = turn;
    console.log(`[InboundRouter] Resuming session ${sessionId} from contact info checkpoint`);

    const checkpoint = await this.persist(sessionId, () => this.store.getLatestCheckpoint(sessionId));
    const originalMessage = checkpoint?.originalMessage ? { originalMessage: checkpoint.originalMessage } : {};
    const cleared: FlagClearedData = { waiting_for_contact_info: false, reason: 'resumed' };

    // Structured fields beat free text
    const provided = providedContact(payload);
    if (provided) {
      await this.append(turn, 'contact_info_flag_cleared', { ...cleared });
      return { sessionId, state: 'provided', contact: provided, ...originalMessage, events: turn.events };
    }

    const result = await this.resolve(body);

    if (hasContact(result)) {
      const data: ContactExtractedData = {
        email: result.email,
        phone: result.phone,
        extraction_method: result.method,
      };
      await this.append(turn, 'contact_info_extracted', { ...data });
    } else {
      console.warn(`[InboundRouter] Could not extract contact info from reply in session ${sessionId}`);
    }

    await this.append(turn, 'contact_info_flag_cleared', { ...cleared });

    if (!hasContact(result)) {
      return { sessionId, state: 'no_contact', contact: { ...NO_CONTACT }, events: turn.events };
    }

    return {
      sessionId,
      state: 'resumed',
      contact: { email: result.email, phone: result.phone },
      extractionMethod: result.method,
      ...originalMessage,
      events: turn.events,
    };
  }

  private async handleFreshTurn(turn: Turn, payload: InboundPayload, body: string): Promise<RouterOutcome> {
    const { sessionId } = turn;

    // Structured fields beat free text
    const provided = providedContact(payload);
    if (provided) {
      return { sessionId, state: 'provided', contact: provided, events: turn.events };
    }

    if (body) {
      console.log(`[InboundRouter] No email or phone provided, extracting from message body (session ${sessionId})`);
      const result = await this.resolve(body);

      if (hasContact(result)) {
        const data: ContactExtractedData = {
          email: result.email,
          phone: result.phone,
          extraction_method: result.method,
          source: 'message_body',
        };
        await this.append(turn, 'contact_info_extracted', { ...data });
        return {
          sessionId,
          state: 'extracted',
          contact: { email: result.email, phone: result.phone },
          extractionMethod: result.method,
          source: 'message_body',
          events: turn.events,
        };
      }
    }

    const known = await this.persist(sessionId, () => this.store.getKnownContact(sessionId));
    if (known) {
      console.log(
        `[InboundRouter] Using contact from session history: email=${maskEmail(known.email)} phone=${maskPhone(known.phone)}`
      );
      return { sessionId, state: 'known', contact: known, events: turn.events };
    }

    console.log(`[InboundRouter] No contact info for session ${sessionId}, waiting for the user to provide it`);
    const flag: FlagSetData = {
      waiting_for_contact_info: true,
      ...(body ? { original_message: body } : {}),
    };
    await this.append(turn, 'contact_info_flag_set', { ...flag });

    return { sessionId, state: 'needs_contact_info', contact: { ...NO_CONTACT }, events: turn.events };
  }

  private async resolve(body: string): Promise<ExtractionResult> {
    if (!body) {
      return { ...NO_CONTACT, method: 'regex' };
    }
    return this.resolver.resolve(body);
  }

  private async alreadyHandled(sessionId: string, messageId: string): Promise<boolean> {
    const received = await this.persist(sessionId, () =>
      this.store.getEvents(sessionId, { eventType: 'email_received' })
    );
    return received.some((event) => isMessageReceivedData(event.data) && event.data.message_id === messageId);
  }

  /**
   * Append an event for this turn and record it in the outcome. A turn makes
   * at most one event of each type, so type and message id identify it.
   */
  private async append(turn: Turn, eventType: ConversationEventType, data: EventData): Promise<void> {
    const eventKey = turn.messageId ? `${turn.messageId}:${eventType}` : uuidv4();
    turn.events.push(await this.appendWithKey(turn.sessionId, eventType, data, eventKey));
  }

  /**
   * Every retry of one append reuses the same key
   */
  private appendWithKey(
    sessionId: string,
    eventType: ConversationEventType,
    data: EventData,
    eventKey: string
  ): Promise<ConversationEvent> {
    return this.persist(sessionId, () => this.store.appendEvent(sessionId, eventType, data, { eventKey }));
  }

  /**
   * Run a store operation with bounded retries; on exhaustion the turn fails
   * with a retryable TurnProcessingError.
   */
  private async persist<T>(sessionId: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(() => operation(), {
        ...this.retry,
        onRetry: (error, attempt, delayMs) => {
          console.warn(
            `[InboundRouter] Event store attempt ${attempt} failed for session ${sessionId}, retrying in ${delayMs}ms:`,
            describeError(error)
          );
          this.retry.onRetry?.(error, attempt, delayMs);
        },
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        console.error(`[InboundRouter] Giving up on session ${sessionId}:`, describeError(error.lastError));
        throw new TurnProcessingError(sessionId, error.attempts, error.lastError);
      }
      throw error;
    }
  }
}

function providedContact(payload: InboundPayload): ContactRecord | null {
  if (!present(payload.email) && !present(payload.phone)) {
    return null;
  }
  return {
    email: present(payload.email) ? payload.email : null,
    phone: present(payload.phone) ? payload.phone : null,
  };
}
