import { logger } from './logger.js';
import { sleep } from './resilience.js';

/**
 * Keeps sequential calls at least `intervalMs` apart.
 */
export class RequestPacer {
  private lastCallAt: number | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now
  ) {}

  async waitForSlot(): Promise<void> {
    if (this.lastCallAt !== null && this.intervalMs > 0) {
      const waitTime = this.lastCallAt + this.intervalMs - this.now();
      if (waitTime > 0) {
        logger.debug(`Pacing requests, waiting ${waitTime}ms`);
        await sleep(waitTime);
      }
    }
    this.lastCallAt = this.now();
  }

  reset() {
    this.lastCallAt = null;
  }
}
