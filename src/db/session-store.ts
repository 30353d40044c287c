import Database from 'better-sqlite3';
import { and, count, desc, eq } from 'drizzle-orm';
import { ConflictError } from '../utils/errors.js';
import type { AppDatabase } from './client.js';
import { golfSessions, type GolfSession, type Page } from './schema.js';

export interface NewSession {
  sessionId: string;
  userId?: string | null;
  isActive?: boolean;
}

export interface SessionChanges {
  userId?: string | null;
  isActive?: boolean;
}

/**
 * Session records, addressed by internal id or by the public session id
 */
export class SessionStore {
  private db: AppDatabase;

  constructor(db: AppDatabase) {
    this.db = db;
  }

  async create(input: NewSession): Promise<GolfSession> {
    const now = new Date();
    try {
      return this.db
        .insert(golfSessions)
        .values({
          sessionId: input.sessionId,
          userId: input.userId ?? null,
          isActive: input.isActive ?? true,
          createdAt: now,
          updatedAt: now,
        })
        .returning()
        .get();
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new ConflictError(`Session ${input.sessionId} already exists`);
      }
      throw error;
    }
  }

  /**
   * Look up a session by its public id. Inactive sessions are skipped
   * unless `activeOnly` is false.
   */
  async getBySessionId(sessionId: string, { activeOnly = true }: { activeOnly?: boolean } = {}): Promise<GolfSession | null> {
    const condition = activeOnly
      ? and(eq(golfSessions.sessionId, sessionId), eq(golfSessions.isActive, true))
      : eq(golfSessions.sessionId, sessionId);

    return this.db.select().from(golfSessions).where(condition).get() ?? null;
  }

  async update(id: number, changes: SessionChanges): Promise<GolfSession | null> {
    const values: Partial<typeof golfSessions.$inferInsert> = { updatedAt: new Date() };
    if (changes.userId !== undefined) values.userId = changes.userId;
    if (changes.isActive !== undefined) values.isActive = changes.isActive;

    return this.db.update(golfSessions).set(values).where(eq(golfSessions.id, id)).returning().get() ?? null;
  }

  /**
   * Newest sessions first
   */
  async list(limit: number, offset: number): Promise<Page<GolfSession>> {
    const items = this.db
      .select()
      .from(golfSessions)
      .orderBy(desc(golfSessions.createdAt), desc(golfSessions.id))
      .limit(limit)
      .offset(offset)
      .all();
    const total = this.db.select({ total: count() }).from(golfSessions).get()?.total ?? 0;

    return { total, items };
  }
}
