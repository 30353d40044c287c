import type { Config } from './config.js';
import { openDatabase, type DatabaseHandle } from './db/client.js';
import { SessionStore } from './db/session-store.js';
import { TranscriptStore } from './db/transcript-store.js';
import { createSTTProvider } from './providers/stt/index.js';
import { createTTSProviders } from './providers/tts/index.js';
import { createAssistantProvider } from './providers/assistant/index.js';
import { createWakeWordDetector } from './providers/wakeword/index.js';
import { Transcriber } from './services/transcriber.js';
import { AssistantService } from './services/assistant-service.js';
import { SpeechSynthesizer } from './services/speech-synthesizer.js';
import { InteractionPipeline } from './services/interaction-pipeline.js';
import { RoomService } from './services/room-service.js';
import { ApiServer } from './services/api-server.js';
import { logger } from './utils/logger.js';

export interface Application {
  server: ApiServer;
  database: DatabaseHandle;
  /**
   * Ask each speech and assistant provider whether it is configured.
   * Resolves to the names of the ones that are not; their features degrade.
   */
  checkProviders(): Promise<string[]>;
  stop(): Promise<void>;
}

/**
 * Composition root: builds every adapter once and wires them into the
 * pipeline and the HTTP server. Missing provider credentials only disable
 * the features that need them.
 */
export function createApplication(config: Config): Application {
  const database = openDatabase(config.database.url);
  const sessions = new SessionStore(database.db);
  const transcripts = new TranscriptStore(database.db);

  const stt = createSTTProvider(config.openai);
  const assistant = createAssistantProvider(config.openai);
  const tts = createTTSProviders(config.elevenlabs, config.openai);
  const providers = [stt, assistant, ...(tts.primary ? [tts.primary] : []), tts.fallback];

  const interactions = new InteractionPipeline({
    sessions,
    transcripts,
    transcriber: new Transcriber(stt),
    wakeWord: createWakeWordDetector(config.wakeWord),
    assistant: new AssistantService(assistant),
    synthesizer: new SpeechSynthesizer(tts.primary, tts.fallback),
  });

  const rooms = new RoomService({
    apiKey: config.livekit.apiKey,
    apiSecret: config.livekit.apiSecret,
    url: config.livekit.url,
  });
  if (!rooms.roomsEnabled) {
    logger.warn('LiveKit room management disabled: credentials not configured');
  }

  const server = new ApiServer(
    { sessions, transcripts, interactions, rooms },
    {
      port: config.server.port,
      apiPrefix: config.server.apiPrefix,
      maxUploadBytes: config.server.maxUploadBytes,
      pagination: config.pagination,
    },
  );

  return {
    server,
    database,
    async checkProviders() {
      const unavailable: string[] = [];
      for (const provider of providers) {
        if (!(await provider.isAvailable())) {
          logger.warn(`Provider ${provider.name} is not configured; its feature will degrade`);
          unavailable.push(provider.name);
        }
      }
      return unavailable;
    },
    async stop() {
      await server.stop();
      database.close();
    },
  };
}
