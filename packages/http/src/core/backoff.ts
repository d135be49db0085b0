// Pure backoff strategies
// Randomness is injected so jittered waits are reproducible in tests

import type { HttpResponse } from '../response.js';

import type { RandomSource } from './types.js';

/**
 * Decides how long to wait, in milliseconds, after a failed attempt.
 * attemptNum starts at 0 for the wait that follows the first attempt.
 */
export interface BackoffStrategy {
  wait(attemptNum: number, response: HttpResponse | undefined, error: Error | undefined): number;
}

/**
 * Uniform integer in [0, bound). Returns 0 for an empty range.
 */
export const randomBelow = (bound: number, random: RandomSource): number => {
  if (bound <= 0) {
    return 0;
  }
  return Math.min(bound - 1, Math.floor(random() * bound));
};

/**
 * Jittered waits fall in [interval / 2, interval * 1.5).
 */
export const createConstantBackoff = (
  intervalMs: number,
  jitter: boolean,
  random: RandomSource = Math.random
): BackoffStrategy => ({
  wait: () => {
    if (!jitter) {
      return intervalMs;
    }
    return Math.floor(intervalMs / 2) + randomBelow(intervalMs, random);
  },
});

/**
 * min(max, base * 2^n). Jittered waits fall in [capped / 2, capped).
 */
export const createExponentialBackoff = (
  baseIntervalMs: number,
  maxIntervalMs: number,
  jitter: boolean,
  random: RandomSource = Math.random
): BackoffStrategy => ({
  wait: (attemptNum) => {
    const capped = Math.min(maxIntervalMs, baseIntervalMs * Math.pow(2, attemptNum));
    if (!jitter) {
      return Math.floor(capped);
    }

    const half = Math.floor(capped / 2);
    return half + randomBelow(half, random);
  },
});

/**
 * Fibonacci multiple of the interval: 1, 1, 2, 3, 5, ... capped at maxValue
 * when maxValue is positive.
 */
export const createFibonacciBackoff = (maxValue: number, intervalMs: number): BackoffStrategy => ({
  wait: (attemptNum) => fibonacciFactor(attemptNum, maxValue) * intervalMs,
});

export const fibonacciFactor = (attemptNum: number, maxValue: number): number => {
  let current = 0;
  let next = 1;
  for (let n = attemptNum; n >= 0; n--) {
    if (maxValue > 0 && next >= maxValue) {
      current = maxValue;
      break;
    }
    [current, next] = [next, current + next];
  }
  return current;
};
