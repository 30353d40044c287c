import { count, desc, eq } from 'drizzle-orm';
import type { AppDatabase } from './client.js';
import { golfTranscripts, type GolfTranscript, type Page } from './schema.js';

export interface NewTranscript {
  /** Internal id of the owning session */
  sessionId: number;
  userQuery: string;
  containsWakeWord: boolean;
  assistantResponse?: string | null;
  audioFilePath?: string | null;
}

/**
 * Fields that may change after creation. The wake word flag is fixed
 * when the transcript is written.
 */
export interface TranscriptChanges {
  assistantResponse?: string | null;
  audioFilePath?: string | null;
}

export class TranscriptStore {
  private db: AppDatabase;

  constructor(db: AppDatabase) {
    this.db = db;
  }

  async create(input: NewTranscript): Promise<GolfTranscript> {
    const now = new Date();
    return this.db
      .insert(golfTranscripts)
      .values({
        sessionId: input.sessionId,
        userQuery: input.userQuery,
        containsWakeWord: input.containsWakeWord,
        assistantResponse: input.assistantResponse ?? null,
        audioFilePath: input.audioFilePath ?? null,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();
  }

  async update(id: number, changes: TranscriptChanges): Promise<GolfTranscript | null> {
    const values: Partial<typeof golfTranscripts.$inferInsert> = { updatedAt: new Date() };
    if (changes.assistantResponse !== undefined) values.assistantResponse = changes.assistantResponse;
    if (changes.audioFilePath !== undefined) values.audioFilePath = changes.audioFilePath;

    return this.db.update(golfTranscripts).set(values).where(eq(golfTranscripts.id, id)).returning().get() ?? null;
  }

  /**
   * Newest transcripts first
   */
  async list(limit: number, offset: number): Promise<Page<GolfTranscript>> {
    const items = this.db
      .select()
      .from(golfTranscripts)
      .orderBy(desc(golfTranscripts.createdAt), desc(golfTranscripts.id))
      .limit(limit)
      .offset(offset)
      .all();
    const total = this.db.select({ total: count() }).from(golfTranscripts).get()?.total ?? 0;

    return { total, items };
  }

  /**
   * Newest transcripts of one session, by the session's internal id
   */
  async listBySession(sessionId: number, limit: number): Promise<GolfTranscript[]> {
    return this.db
      .select()
      .from(golfTranscripts)
      .where(eq(golfTranscripts.sessionId, sessionId))
      .orderBy(desc(golfTranscripts.createdAt), desc(golfTranscripts.id))
      .limit(limit)
      .all();
  }
}
