import type { Config } from '../../config.js';
import { logger } from '../../utils/logger.js';
import type { WakeWordDetector } from './interface.js';
import { TextWakeWordDetector } from './text-match.js';

export type { WakeWordDetector, WakeWordConfig } from './interface.js';
export { TextWakeWordDetector, containsWakeWord } from './text-match.js';

/**
 * Create the configured wake word detector
 */
export function createWakeWordDetector(wakeWord: Config['wakeWord']): WakeWordDetector {
  logger.info(`Wake word detection: text-match ("${wakeWord.phrase}")`);
  return new TextWakeWordDetector({ phrase: wakeWord.phrase });
}
