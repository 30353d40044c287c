import type { WakeWordConfig, WakeWordDetector } from './interface.js';

/**
 * Case-insensitive exact substring test. No fuzzy matching.
 */
export function containsWakeWord(text: string, phrase: string): boolean {
  if (!text || !phrase) return false;
  return text.toLowerCase().includes(phrase.toLowerCase());
}

/**
 * Wake word detector matching the phrase in transcribed text
 */
export class TextWakeWordDetector implements WakeWordDetector {
  readonly name = 'text-match';
  readonly phrase: string;

  constructor(config: WakeWordConfig) {
    this.phrase = config.phrase;
  }

  detect(text: string): boolean {
    return containsWakeWord(text, this.phrase);
  }
}
