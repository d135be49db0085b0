// Pure token bucket functions
// All functions take state and return new state without side effects

import type { RateLimitState } from './types.js';

/**
 * Refill tokens based on time passed since last refill
 */
export const refillTokens = (state: RateLimitState, currentTime: number): RateLimitState => {
  if (state.lastRefill === 0) {
    return {
      ...state,
      lastRefill: currentTime,
    };
  }

  const timePassed = (currentTime - state.lastRefill) / 1000;

  if (timePassed <= 0) {
    return state;
  }

  const tokensToAdd = timePassed * state.requestsPerSecond;
  const newTokens = Math.min(state.burstLimit, state.tokens + tokensToAdd);

  return {
    ...state,
    lastRefill: currentTime,
    tokens: newTokens,
  };
};

/**
 * Check if a request can be admitted immediately
 */
export const shouldAllowRequest = (state: RateLimitState, currentTime: number): boolean => {
  return refillTokens(state, currentTime).tokens >= 1;
};

/**
 * Take one token from the bucket. Callers check shouldAllowRequest first.
 */
export const consumeToken = (state: RateLimitState, currentTime: number): RateLimitState => {
  const refilled = refillTokens(state, currentTime);
  return {
    ...refilled,
    tokens: refilled.tokens - 1,
  };
};

/**
 * Milliseconds until the next whole token is available, 0 when one is available now
 */
export const calculateWaitTime = (state: RateLimitState, currentTime: number): number => {
  const refilled = refillTokens(state, currentTime);
  if (refilled.tokens >= 1) {
    return 0;
  }

  const missing = 1 - refilled.tokens;
  return Math.max(1, Math.ceil((missing / state.requestsPerSecond) * 1000));
};

export const getRateLimitStatus = (
  state: RateLimitState,
  currentTime: number
): { maxTokens: number; requestsPerSecond: number; tokens: number } => {
  const refilled = refillTokens(state, currentTime);
  return {
    maxTokens: refilled.burstLimit,
    requestsPerSecond: refilled.requestsPerSecond,
    tokens: Math.floor(refilled.tokens * 100) / 100,
  };
};
