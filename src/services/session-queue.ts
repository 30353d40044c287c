import { logger } from '../utils/logger.js';

/**
 * Runs tasks one at a time per key, in arrival order. Tasks for different
 * keys run concurrently. A failed task does not block the ones behind it.
 */
export class SessionQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key);
    if (previous) {
      logger.debug(`Queued turn behind in-flight turn for session ${key}`);
    }

    const result = (previous ?? Promise.resolve()).then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /**
   * Number of keys with queued or running tasks
   */
  get size(): number {
    return this.tails.size;
  }
}
