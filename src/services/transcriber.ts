import { logger } from '../utils/logger.js';
import { ProviderError } from '../utils/errors.js';
import { fail, succeed, type Outcome } from '../utils/outcome.js';
import type { AudioClip, STTProvider } from '../providers/stt/index.js';

/**
 * Speech-to-text adapter. Provider failures come back as a failed outcome.
 */
export class Transcriber {
  private provider: STTProvider;

  constructor(provider: STTProvider) {
    this.provider = provider;
  }

  async transcribe(audio: AudioClip): Promise<Outcome<string>> {
    try {
      const text = await this.provider.transcribe(audio);
      return succeed(text.trim());
    } catch (error) {
      const failure = ProviderError.from(this.provider.name, error);
      logger.error(`Transcription failed (${this.provider.name}): ${failure.message}`);
      return fail(failure);
    }
  }
}
