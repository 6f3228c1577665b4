import { logger } from './logger.js';

export interface RetryConfig {
  maxRetries: number; // attempts = maxRetries + 1
  delayMs: number; // fixed pause between attempts
}

const DEFAULT_CONFIG: RetryConfig = {
  maxRetries: 3,
  delayMs: 1000
};

export interface RetryOptions {
  isRetryable?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error) => void | Promise<void>;
}

export class RetryHandler {
  private config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  /**
   * Run `fn` until it succeeds, a non-retryable error is thrown, or the retry
   * budget is spent. The last error is rethrown.
   */
  async executeWithRetry<T>(
    fn: () => Promise<T>,
    name: string,
    options: RetryOptions = {}
  ): Promise<T> {
    const { isRetryable = () => true, onRetry } = options;
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        logger.debug(`[${name}] Attempt ${attempt}/${attempts}`);
        const result = await fn();
        if (attempt > 1) {
          logger.info(`[${name}] Recovered on attempt ${attempt}`);
        }
        return result;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));

        if (!isRetryable(err)) {
          throw err;
        }

        if (attempt >= attempts) {
          logger.error(`[${name}] Failed after ${attempts} attempts: ${err.message}`);
          throw err;
        }

        logger.warn(`[${name}] Attempt ${attempt} failed: ${err.message}`);
        if (onRetry) await onRetry(attempt, err);

        if (this.config.delayMs > 0) {
          logger.debug(`[${name}] Retrying in ${this.config.delayMs}ms...`);
          await sleep(this.config.delayMs);
        }
      }
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
