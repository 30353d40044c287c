/**
 * Uploaded audio clip held in memory
 */
export interface AudioClip {
  data: Buffer;
  filename?: string;
  contentType?: string;
}

/**
 * Speech-to-Text provider interface
 */
export interface STTProvider {
  /**
   * Provider name for logging and identification
   */
  readonly name: string;

  /**
   * Transcribe an audio clip to text. Throws on provider failure.
   */
  transcribe(audio: AudioClip): Promise<string>;

  /**
   * Check if the provider is properly configured and available
   */
  isAvailable(): Promise<boolean>;
}

/**
 * Common STT configuration options
 */
export interface STTConfig {
  apiUrl: string;
  apiKey?: string;
  model: string;
  language?: string;
}
