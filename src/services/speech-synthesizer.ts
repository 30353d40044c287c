import type { Readable } from 'node:stream';
import { logger } from '../utils/logger.js';
import { ProviderError } from '../utils/errors.js';
import { fail, succeed, type Outcome } from '../utils/outcome.js';
import type { TTSProvider } from '../providers/tts/index.js';

/**
 * Text-to-speech adapter: the primary provider first, then the fallback
 * once. No backoff and no circuit breaking between calls.
 */
export class SpeechSynthesizer {
  private primary: TTSProvider | null;
  private fallback: TTSProvider;

  constructor(primary: TTSProvider | null, fallback: TTSProvider) {
    this.primary = primary;
    this.fallback = fallback;
  }

  async synthesize(text: string, signal?: AbortSignal): Promise<Outcome<Readable>> {
    if (this.primary) {
      try {
        return succeed(await this.primary.synthesize(text, signal));
      } catch (error) {
        const failure = ProviderError.from(this.primary.name, error);
        logger.warn(`Primary TTS failed (${this.primary.name}), trying ${this.fallback.name}: ${failure.message}`);
      }
    }

    try {
      return succeed(await this.fallback.synthesize(text, signal));
    } catch (error) {
      const failure = ProviderError.from(this.fallback.name, error);
      logger.error(`Fallback TTS failed (${this.fallback.name}): ${failure.message}`);
      return fail(failure);
    }
  }
}
