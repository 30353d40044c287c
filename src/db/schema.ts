import { sqliteTable, integer, text } from 'drizzle-orm/sqlite-core';

/**
 * A user session with the golf assistant
 */
export const golfSessions = sqliteTable('golf_session', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: text('session_id').notNull().unique(),
  userId: text('user_id'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * One user utterance and the assistant's reply, if any
 */
export const golfTranscripts = sqliteTable('golf_transcript', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: integer('session_id')
    .notNull()
    .references(() => golfSessions.id, { onDelete: 'cascade' }),
  userQuery: text('user_query').notNull(),
  assistantResponse: text('assistant_response'),
  audioFilePath: text('audio_file_path'),
  containsWakeWord: integer('contains_wake_word', { mode: 'boolean' }).notNull().default(false),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

export type GolfSession = typeof golfSessions.$inferSelect;
export type GolfTranscript = typeof golfTranscripts.$inferSelect;

export interface Page<T> {
  total: number;
  items: T[];
}
