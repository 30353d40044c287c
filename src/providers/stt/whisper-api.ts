import FormData from 'form-data';
import { request } from 'undici';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { ProviderError } from '../../utils/errors.js';
import type { AudioClip, STTProvider, STTConfig } from './interface.js';

const transcriptionSchema = z.object({
  text: z.string().catch(''),
});

/**
 * OpenAI Whisper API provider for Speech-to-Text.
 * The clip is sent straight from memory as multipart form data.
 */
export class WhisperAPIProvider implements STTProvider {
  readonly name = 'whisper-api';
  private config: STTConfig;

  constructor(config: STTConfig) {
    this.config = config;
  }

  async transcribe(audio: AudioClip): Promise<string> {
    if (!this.config.apiKey) {
      throw new ProviderError(this.name, 'unavailable', 'OpenAI API key not configured');
    }

    const formData = new FormData();
    formData.append('model', this.config.model);
    formData.append('file', audio.data, {
      filename: audio.filename ?? 'audio.wav',
      contentType: audio.contentType ?? 'audio/wav',
    });

    if (this.config.language) {
      formData.append('language', this.config.language);
    }

    const headers: Record<string, string> = {
      ...formData.getHeaders(),
      Authorization: `Bearer ${this.config.apiKey}`,
    };

    const response = await request(`${this.config.apiUrl}/audio/transcriptions`, {
      method: 'POST',
      headers,
      body: formData.getBuffer(),
    });

    if (response.statusCode !== 200) {
      const errorBody = await response.body.text();
      throw new ProviderError(this.name, 'request', `STT API error (${response.statusCode}): ${errorBody}`);
    }

    const { text } = transcriptionSchema.parse(await response.body.json());
    logger.debug(`Whisper API transcription: "${text}"`);
    return text;
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey && this.config.apiUrl);
  }
}
