// Contact types
export interface ContactRecord {
  email: string | null;
  phone: string | null;
}

// Which extraction tier produced a result
export type ExtractionMethod = 'regex' | 'llm';

export interface ExtractionResult extends ContactRecord {
  method: ExtractionMethod;
}

// Where an extracted contact came from, when it was not a checkpoint resume
export type ContactSource = 'message_body';

// Conversation event types
export type ConversationEventType =
  | 'email_received'
  | 'contact_info_extracted'
  | 'contact_info_flag_set'
  | 'contact_info_flag_cleared';

export type FlagClearReason = 'resumed' | 'expired' | 'manual';

// Event payloads
export interface ContactExtractedData {
  email: string | null;
  phone: string | null;
  extraction_method: ExtractionMethod;
  source?: ContactSource;
}

export interface FlagSetData {
  waiting_for_contact_info: true;
  original_message?: string;
}

export interface FlagClearedData {
  waiting_for_contact_info: false;
  reason: FlagClearReason;
}

export type EventData = Record<string, unknown>;

// Append-only conversation event (application-level)
export interface ConversationEvent {
  id: string;
  sessionId: string;
  /** Caller-chosen idempotency key, unique within the session */
  eventKey: string;
  eventType: ConversationEventType;
  data: EventData;
  timestamp: Date;
}

// Persisted/wire shape of an event
export interface SerializedConversationEvent {
  event_type: ConversationEventType;
  data: EventData;
  session_id: string;
  timestamp: string;
}

/**
 * The newest checkpoint flag event for a session
 */
export interface Checkpoint {
  waiting: boolean;
  originalMessage?: string;
  reason?: FlagClearReason;
  at: Date;
}

export interface MessageReceivedData {
  message_id: string;
}

// Inbound message payload
export interface InboundPayload {
  email?: string | null;
  phone?: string | null;
  body?: string | null;
  /** Transport message id (e.g. Gmail id); makes redelivery of a turn a no-op */
  messageId?: string | null;
}

/**
 * How the router settled a turn:
 * - resumed: a paused session got its contact info from this message
 * - extracted: contact info found in the body of a fresh turn
 * - provided: the payload already carried structured contact fields
 * - known: nothing new, contact recalled from session history
 * - needs_contact_info: nothing found, session is now waiting
 * - no_contact: a resume attempt found nothing (flag still cleared)
 * - duplicate: this message id was already handled for the session
 */
export type RouterState =
  | 'resumed'
  | 'extracted'
  | 'provided'
  | 'known'
  | 'needs_contact_info'
  | 'no_contact'
  | 'duplicate';

export interface RouterOutcome {
  sessionId: string;
  state: RouterState;
  contact: ContactRecord;
  extractionMethod?: ExtractionMethod;
  source?: ContactSource;
  originalMessage?: string;
  events: ConversationEvent[];
}

export const CONVERSATION_EVENT_TYPES: readonly ConversationEventType[] = [
  'email_received',
  'contact_info_extracted',
  'contact_info_flag_set',
  'contact_info_flag_cleared',
];

export function serializeEvent(event: ConversationEvent): SerializedConversationEvent {
  return {
    event_type: event.eventType,
    data: event.data,
    session_id: event.sessionId,
    timestamp: event.timestamp.toISOString(),
  };
}

// Type guards

function isNullableString(value: unknown): value is string | null | undefined {
  return value === null || value === undefined || typeof value === 'string';
}

export function isConversationEventType(value: unknown): value is ConversationEventType {
  return CONVERSATION_EVENT_TYPES.some((type) => type === value);
}

export function isContactExtractedData(data: unknown): data is ContactExtractedData {
  return (
    typeof data === 'object' &&
    data !== null &&
    'extraction_method' in data &&
    (data.extraction_method === 'regex' || data.extraction_method === 'llm') &&
    'email' in data &&
    isNullableString(data.email) &&
    'phone' in data &&
    isNullableString(data.phone)
  );
}

export function isFlagSetData(data: unknown): data is FlagSetData {
  return (
    typeof data === 'object' &&
    data !== null &&
    'waiting_for_contact_info' in data &&
    data.waiting_for_contact_info === true &&
    (!('original_message' in data) || typeof data.original_message === 'string')
  );
}

export function isFlagClearedData(data: unknown): data is FlagClearedData {
  return (
    typeof data === 'object' &&
    data !== null &&
    'waiting_for_contact_info' in data &&
    data.waiting_for_contact_info === false &&
    'reason' in data &&
    (data.reason === 'resumed' || data.reason === 'expired' || data.reason === 'manual')
  );
}

export function isMessageReceivedData(data: unknown): data is MessageReceivedData {
  return (
    typeof data === 'object' &&
    data !== null &&
    'message_id' in data &&
    typeof data.message_id === 'string'
  );
}

export function hasContact(record: ContactRecord): boolean {
  return Boolean(record.email || record.phone);
}
