import type { Readable } from 'node:stream';
import { request } from 'undici';
import logger from '../../utils/logger.js';
import { ProviderError } from '../../utils/errors.js';
import type { TTSProvider, TTSConfig } from './interface.js';

/**
 * OpenAI TTS provider
 * Compatible with OpenAI API and any OpenAI-compatible TTS endpoint
 */
export class OpenAITTSProvider implements TTSProvider {
  readonly name = 'openai-tts';
  private config: TTSConfig;

  constructor(config: TTSConfig) {
    this.config = config;
  }

  async synthesize(text: string, signal?: AbortSignal): Promise<Readable> {
    if (!this.config.apiKey) {
      throw new ProviderError(this.name, 'unavailable', 'OpenAI API key not configured');
    }

    const response = await request(`${this.config.apiUrl}/audio/speech`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.config.model ?? 'tts-1',
        input: text,
        voice: this.config.voice,
        response_format: 'mp3',
      }),
      signal,
    });

    if (response.statusCode !== 200) {
      const errorBody = await response.body.text();
      throw new ProviderError(this.name, 'request', `OpenAI TTS error (${response.statusCode}): ${errorBody}`);
    }

    logger.debug(`OpenAI TTS streaming ${text.length} chars`);
    return response.body;
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey && this.config.apiUrl);
  }
}
