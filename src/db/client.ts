import { mkdirSync } from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { logger } from '../utils/logger.js';
import * as schema from './schema.js';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  close(): void;
}

// Ensure tables exist
function ensureTables(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS golf_session (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL UNIQUE,
      user_id TEXT,
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS golf_transcript (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id INTEGER NOT NULL REFERENCES golf_session(id) ON DELETE CASCADE,
      user_query TEXT NOT NULL,
      assistant_response TEXT,
      audio_file_path TEXT,
      contains_wake_word INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);

  sqlite.exec(`CREATE INDEX IF NOT EXISTS idx_golf_session_user_id ON golf_session(user_id)`);
  sqlite.exec(`CREATE INDEX IF NOT EXISTS idx_golf_session_created_at ON golf_session(created_at DESC)`);
  sqlite.exec(`CREATE INDEX IF NOT EXISTS idx_golf_transcript_session_id ON golf_transcript(session_id)`);
  sqlite.exec(`CREATE INDEX IF NOT EXISTS idx_golf_transcript_created_at ON golf_transcript(created_at DESC)`);
}

/**
 * Open the SQLite database at `url` (a file path or ":memory:")
 */
export function openDatabase(url: string): DatabaseHandle {
  if (url !== ':memory:') {
    mkdirSync(path.dirname(path.resolve(url)), { recursive: true });
  }

  const sqlite = new Database(url);
  if (url !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  ensureTables(sqlite);

  logger.info(`Database ready at ${url}`);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
