import { Readable } from 'node:stream';
import { vi } from 'vitest';
import { openDatabase, type DatabaseHandle } from '../db/client.js';
import { SessionStore } from '../db/session-store.js';
import { TranscriptStore } from '../db/transcript-store.js';
import type { STTProvider } from '../providers/stt/index.js';
import type { TTSProvider } from '../providers/tts/index.js';
import type { AssistantProvider } from '../providers/assistant/index.js';

export interface TestStores {
  database: DatabaseHandle;
  sessions: SessionStore;
  transcripts: TranscriptStore;
}

export function createTestStores(): TestStores {
  const database = openDatabase(':memory:');
  return {
    database,
    sessions: new SessionStore(database.db),
    transcripts: new TranscriptStore(database.db),
  };
}

export function fakeSTT(result: string | Error): STTProvider {
  return {
    name: 'fake-stt',
    transcribe: vi.fn(async () => {
      if (result instanceof Error) throw result;
      return result;
    }),
    isAvailable: async () => true,
  };
}

export function fakeAssistant(result: string | null | Error): AssistantProvider {
  return {
    name: 'fake-assistant',
    respond: vi.fn(async () => {
      if (result instanceof Error) throw result;
      return result;
    }),
    isAvailable: async () => true,
  };
}

export function fakeTTS(name: string, result: string | Error): TTSProvider {
  return {
    name,
    synthesize: vi.fn(async () => {
      if (result instanceof Error) throw result;
      return Readable.from([Buffer.from(result)]);
    }),
    isAvailable: async () => true,
  };
}

export async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}
