// Rate Limit Backoff
// Exponential waits between LLM calls rejected with RATE_LIMIT: 1s, 2s, 4s, ...
// Every other error is left to the caller

import { LlmError, LlmErrorKind } from '../../types/errors';

export const DEFAULT_RATE_LIMIT_ATTEMPTS = 3;
export const RATE_LIMIT_BASE_DELAY_MS = 1000;

export class RateLimitBackoff {
  constructor(
    public readonly maxAttempts: number = DEFAULT_RATE_LIMIT_ATTEMPTS,
    private readonly baseDelayMs: number = RATE_LIMIT_BASE_DELAY_MS
  ) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
  }

  /**
   * Whether a call that failed on the given attempt (1-based) should be made again
   */
  shouldRetry(error: unknown, attempt: number): boolean {
    return error instanceof LlmError && error.kind === LlmErrorKind.RATE_LIMIT && attempt < this.maxAttempts;
  }

  delayFor(attempt: number): number {
    return this.baseDelayMs * 2 ** (attempt - 1);
  }
}
