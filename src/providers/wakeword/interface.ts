/**
 * Wake word detector interface
 *
 * Detectors decide from the transcribed text whether the configured
 * trigger phrase was spoken.
 */
export interface WakeWordDetector {
  /**
   * Detector name for logging and identification
   */
  readonly name: string;

  /**
   * The phrase this detector listens for
   */
  readonly phrase: string;

  /**
   * Whether the text contains the wake phrase
   */
  detect(text: string): boolean;
}

/**
 * Common wake word configuration options
 */
export interface WakeWordConfig {
  /** Trigger phrase, e.g. "Hey Ceddy" */
  phrase: string;
}
