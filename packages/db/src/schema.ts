import {
  pgTable,
  pgEnum,
  bigserial,
  text,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// Conversation event type enum
export const conversationEventTypeEnum = pgEnum('conversation_event_type', [
  'email_received',
  'contact_info_extracted',
  'contact_info_flag_set',
  'contact_info_flag_cleared',
]);

// Conversation events table (append-only log, one stream per session)
export const conversationEvents = pgTable(
  'conversation_events',
  {
    // Monotonic id carries insertion order within a session
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    sessionId: text('session_id').notNull(),
    // Unique per session; a retried write reuses its key
    eventKey: text('event_key').notNull(),
    eventType: conversationEventTypeEnum('event_type').notNull(),
    data: jsonb('data').$type<Record<string, unknown>>().notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    // Replay of a session's stream, newest-first scans
    index('idx_conversation_events_session').on(table.sessionId, table.id),
    uniqueIndex('uq_conversation_events_session_key').on(table.sessionId, table.eventKey),
    // Checkpoint expiry sweep
    index('idx_conversation_events_type_created').on(table.eventType, table.createdAt),
  ]
);

export type ConversationEventRow = typeof conversationEvents.$inferSelect;
