// Pure types for functional core
// No classes, only data structures

/**
 * Token bucket state (immutable)
 */
export interface RateLimitState {
  burstLimit: number;
  lastRefill: number;
  requestsPerSecond: number;
  tokens: number;
}

/**
 * Token bucket settings. burstLimit defaults to 1.
 */
export interface TokenBucketConfig {
  burstLimit?: number | undefined;
  requestsPerSecond: number;
}

/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Outcome of an abortable delay
 */
export type DelayOutcome = 'elapsed' | 'aborted';

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  delay: (ms: number, signal: AbortSignal) => Promise<DelayOutcome>;
  now: () => number;
  random: RandomSource;
}

const assertPositiveFinite = (fieldName: string, value: number): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid rate limit configuration: ${fieldName} must be a positive finite number, got ${value}`);
  }
};

export const createInitialRateLimitState = (config: TokenBucketConfig): RateLimitState => {
  assertPositiveFinite('requestsPerSecond', config.requestsPerSecond);

  if (config.burstLimit !== undefined && !(Number.isInteger(config.burstLimit) && config.burstLimit >= 1)) {
    throw new Error(
      `Invalid rate limit configuration: burstLimit must be an integer of at least 1, got ${config.burstLimit}`
    );
  }

  const burstLimit = config.burstLimit ?? 1;

  return {
    burstLimit,
    lastRefill: 0, // Set from effects.now() on first use
    requestsPerSecond: config.requestsPerSecond,
    tokens: burstLimit,
  };
};
