import type { Config } from '../../config.js';
import logger from '../../utils/logger.js';
import type { STTProvider } from './interface.js';
import { WhisperAPIProvider } from './whisper-api.js';

export type { STTProvider, STTConfig, AudioClip } from './interface.js';
export { WhisperAPIProvider } from './whisper-api.js';

/**
 * Create the Whisper STT provider from configuration
 */
export function createSTTProvider(openai: Config['openai']): STTProvider {
  logger.info(`Initializing STT provider: whisper-api (${openai.sttModel})`);

  return new WhisperAPIProvider({
    apiUrl: openai.apiUrl,
    apiKey: openai.apiKey,
    model: openai.sttModel,
    language: openai.sttLanguage,
  });
}
