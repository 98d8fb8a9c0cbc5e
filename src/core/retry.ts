import type { AttemptOutcome, RetryDecision, TransportErrorKind } from './types.js';
import { mustBeNonNegativeInteger, mustBePositive } from './validation.js';
import { ConfigurationError } from './errors.js';

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export const DEFAULT_RETRYABLE_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504];

const RETRYABLE_ERROR_KINDS: ReadonlySet<TransportErrorKind> = new Set(['connection', 'timeout']);

export type JitterMode = 'none' | 'full';

export interface RetryPolicyOptions {
  baseDelaySeconds: number;
  maxDelaySeconds: number;
  multiplier: number;
  retryableStatusCodes: readonly number[];
  /** `full` draws the delay uniformly from [0, backoff]. Off unless asked for. */
  jitter: JitterMode;
  random: () => number;
}

export const DEFAULT_RETRY_POLICY_OPTIONS: RetryPolicyOptions = {
  baseDelaySeconds: 1,
  maxDelaySeconds: 30,
  multiplier: 2,
  retryableStatusCodes: DEFAULT_RETRYABLE_STATUS_CODES,
  jitter: 'none',
  random: Math.random
};

const NO_RETRY: RetryDecision = { shouldRetry: false, delaySeconds: 0 };

/** Capped exponential backoff for the retry that follows `attemptNumber` (1-indexed). */
export const backoffDelay = (
  attemptNumber: number,
  options: Pick<RetryPolicyOptions, 'baseDelaySeconds' | 'maxDelaySeconds' | 'multiplier'> = DEFAULT_RETRY_POLICY_OPTIONS
): number => {
  const raw = options.baseDelaySeconds * Math.pow(options.multiplier, attemptNumber - 1);
  return Math.min(raw, options.maxDelaySeconds);
};

export const isRetryableOutcome = (
  outcome: AttemptOutcome,
  retryableStatusCodes: readonly number[] = DEFAULT_RETRYABLE_STATUS_CODES
): boolean => {
  switch (outcome.kind) {
    case 'responded':
      return retryableStatusCodes.includes(outcome.statusCode);
    case 'failed':
      return RETRYABLE_ERROR_KINDS.has(outcome.errorKind);
  }
};

/**
 * Decides whether a failed attempt earns another try and how long to wait first.
 * Holds configuration only; attempt counters belong to the caller.
 */
export class RetryPolicy {
  readonly options: RetryPolicyOptions;

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    const merged = { ...DEFAULT_RETRY_POLICY_OPTIONS, ...options };
    mustBePositive(merged.baseDelaySeconds, 'baseDelaySeconds');
    mustBePositive(merged.maxDelaySeconds, 'maxDelaySeconds');
    if (merged.maxDelaySeconds < merged.baseDelaySeconds) {
      throw new ConfigurationError('maxDelaySeconds must be >= baseDelaySeconds', {
        baseDelaySeconds: merged.baseDelaySeconds,
        maxDelaySeconds: merged.maxDelaySeconds
      });
    }
    if (!Number.isFinite(merged.multiplier) || merged.multiplier < 1) {
      throw new ConfigurationError('multiplier must be >= 1', { multiplier: merged.multiplier });
    }
    this.options = { ...merged, retryableStatusCodes: [...merged.retryableStatusCodes] };
  }

  /**
   * `attemptNumber` is the attempt that just completed. `maxRetries` counts retries,
   * so at most `maxRetries + 1` attempts are made.
   */
  decide(attemptNumber: number, outcome: AttemptOutcome, maxRetries: number): RetryDecision {
    if (!Number.isInteger(attemptNumber) || attemptNumber < 1) {
      throw new RangeError(`attemptNumber must be an integer >= 1, got ${attemptNumber}`);
    }
    mustBeNonNegativeInteger(maxRetries, 'maxRetries');

    if (!isRetryableOutcome(outcome, this.options.retryableStatusCodes)) return NO_RETRY;
    if (attemptNumber > maxRetries) return NO_RETRY;

    return { shouldRetry: true, delaySeconds: this.delayFor(attemptNumber) };
  }

  delayFor(attemptNumber: number): number {
    const capped = backoffDelay(attemptNumber, this.options);
    if (this.options.jitter === 'full') {
      return capped * this.options.random();
    }
    return capped;
  }

  remainingRetries(attemptsMade: number, maxRetries: number): number {
    return Math.max(0, maxRetries + 1 - attemptsMade);
  }
}
