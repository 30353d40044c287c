import type { Readable } from 'node:stream';
import { request } from 'undici';
import { logger } from '../../utils/logger.js';
import { ProviderError } from '../../utils/errors.js';
import type { TTSProvider, TTSConfig } from './interface.js';

/**
 * ElevenLabs TTS provider, streamed from the /stream endpoint
 */
export class ElevenLabsProvider implements TTSProvider {
  readonly name = 'elevenlabs';
  private config: TTSConfig;

  constructor(config: TTSConfig) {
    this.config = config;
  }

  async synthesize(text: string, signal?: AbortSignal): Promise<Readable> {
    if (!this.config.apiKey) {
      throw new ProviderError(this.name, 'unavailable', 'ElevenLabs API key not configured');
    }

    const url = `${this.config.apiUrl}/text-to-speech/${this.config.voice}/stream`;

    const response = await request(url, {
      method: 'POST',
      headers: {
        'xi-api-key': this.config.apiKey,
        'Content-Type': 'application/json',
        Accept: 'audio/mpeg',
      },
      body: JSON.stringify({
        text,
        model_id: this.config.model ?? 'eleven_monolingual_v1',
        voice_settings: {
          stability: 0.5,
          similarity_boost: 0.5,
        },
      }),
      signal,
    });

    if (response.statusCode !== 200) {
      const errorBody = await response.body.text();
      throw new ProviderError(this.name, 'request', `ElevenLabs TTS error (${response.statusCode}): ${errorBody}`);
    }

    logger.debug(`ElevenLabs TTS streaming ${text.length} chars`);
    return response.body;
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey);
  }
}
