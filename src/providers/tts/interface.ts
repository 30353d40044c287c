import type { Readable } from 'node:stream';

/**
 * TTS provider interface
 */
export interface TTSProvider {
  /**
   * Provider name for logging and identification
   */
  readonly name: string;

  /**
   * Start synthesizing text. Resolves once the provider has accepted the
   * request; the audio (MP3) is read lazily from the returned stream.
   * Aborting the signal cancels the download.
   */
  synthesize(text: string, signal?: AbortSignal): Promise<Readable>;

  /**
   * Check if the provider is properly configured and available
   */
  isAvailable(): Promise<boolean>;
}

/**
 * Common TTS configuration options
 */
export interface TTSConfig {
  apiUrl: string;
  apiKey?: string;
  model?: string;
  voice: string;
}
