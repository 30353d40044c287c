import type { Config } from '../../config.js';
import { logger } from '../../utils/logger.js';
import type { TTSProvider } from './interface.js';
import { OpenAITTSProvider } from './openai-tts.js';
import { ElevenLabsProvider } from './elevenlabs.js';

export type { TTSProvider, TTSConfig } from './interface.js';
export { OpenAITTSProvider } from './openai-tts.js';
export { ElevenLabsProvider } from './elevenlabs.js';

export interface TTSProviderChain {
  primary: TTSProvider | null;
  fallback: TTSProvider;
}

/**
 * Create the primary (ElevenLabs, only when its key is set) and fallback
 * (OpenAI) TTS providers
 */
export function createTTSProviders(elevenlabs: Config['elevenlabs'], openai: Config['openai']): TTSProviderChain {
  const primary = elevenlabs.apiKey
    ? new ElevenLabsProvider({
        apiUrl: elevenlabs.apiUrl,
        apiKey: elevenlabs.apiKey,
        model: elevenlabs.model,
        voice: elevenlabs.voiceId,
      })
    : null;

  const fallback = new OpenAITTSProvider({
    apiUrl: openai.apiUrl,
    apiKey: openai.apiKey,
    model: openai.ttsModel,
    voice: openai.ttsVoice,
  });

  logger.info(`Initializing TTS providers: ${primary ? `${primary.name} -> ` : ''}${fallback.name}`);

  return { primary, fallback };
}
