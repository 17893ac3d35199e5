import { FastifyBaseLogger } from "fastify";
import { isSessionError, toError } from "./errors.js";
import { sleep } from "./deadline.js";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterMs?: number;
}

export interface RetryResult<T> {
  result: T;
  attempt: number;
  totalDuration: number;
}

/**
 * Retry utility with exponential backoff and jitter. Only errors flagged
 * `isRetryable` (store outages, capacity) are retried; the last error is
 * rethrown unchanged so callers can still branch on its type.
 */
export class RetryManager {
  private logger: FastifyBaseLogger;
  private defaultOptions: RetryOptions;

  constructor(logger: FastifyBaseLogger, defaults: Partial<RetryOptions> = {}) {
    this.logger = logger;
    this.defaultOptions = {
      maxAttempts: 3,
      baseDelayMs: 100,
      maxDelayMs: 2000,
      backoffMultiplier: 2,
      jitterMs: 50,
      ...defaults,
    };
  }

  async executeWithRetry<T>(
    operation: () => Promise<T>,
    operationName: string,
    options: Partial<RetryOptions> = {},
  ): Promise<RetryResult<T>> {
    const opts = { ...this.defaultOptions, ...options };
    const startTime = Date.now();
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
      try {
        const result = await operation();
        const totalDuration = Date.now() - startTime;

        if (attempt > 1) {
          this.logger.info(
            `[RetryManager] ${operationName} succeeded on attempt ${attempt}/${opts.maxAttempts} after ${totalDuration}ms`,
          );
        }

        return { result, attempt, totalDuration };
      } catch (error) {
        const err = toError(error);
        lastError = err;

        const isRetryable = this.isErrorRetryable(err);
        const isLastAttempt = attempt === opts.maxAttempts;

        this.logger.warn(
          { err, isRetryable, isLastAttempt },
          `[RetryManager] ${operationName} failed on attempt ${attempt}/${opts.maxAttempts}`,
        );

        if (!isRetryable || isLastAttempt) {
          throw err;
        }

        const baseDelay = opts.baseDelayMs * Math.pow(opts.backoffMultiplier, attempt - 1);
        const jitter = opts.jitterMs ? Math.random() * opts.jitterMs : 0;
        const delay = Math.min(baseDelay + jitter, opts.maxDelayMs);

        this.logger.debug(
          `[RetryManager] Waiting ${Math.round(delay)}ms before retry ${attempt + 1}/${opts.maxAttempts}`,
        );
        await sleep(delay);
      }
    }

    // maxAttempts < 1 never enters the loop
    throw lastError ?? new Error(`${operationName} was not attempted`);
  }

  private isErrorRetryable(error: Error): boolean {
    return isSessionError(error) && error.isRetryable;
  }
}
