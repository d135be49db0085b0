import { describe, expect, it, vi } from 'vitest';

import type { DelayOutcome } from '../core/types.js';
import { RateLimiter } from '../rate-limiter.js';
import { CancellationError, PreparationError } from '../types.js';

const fakeClock = (start = 1000) => {
  const clock = { delays: [] as number[], now: start };
  const effects = {
    delay: (ms: number, signal: AbortSignal): Promise<DelayOutcome> => {
      clock.delays.push(ms);
      clock.now += ms;
      return Promise.resolve(signal.aborted ? 'aborted' : 'elapsed');
    },
    now: () => clock.now,
  };
  return { clock, effects };
};

const neverAborted = () => new AbortController().signal;

describe('RateLimiter', () => {
  it('should reject an invalid configuration', () => {
    const error = RateLimiter.create({ requestsPerSecond: 0 })._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(PreparationError);
    expect(error.message).toMatch(/^Invalid rate limit configuration: requestsPerSecond/);
  });

  it('should reject a burst below one whole token', () => {
    const error = RateLimiter.create({ burstLimit: 0.5, requestsPerSecond: 10 })._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(PreparationError);
    expect(error.message).toMatch(/^Invalid rate limit configuration: burstLimit/);
  });

  it('should admit a burst without waiting', async () => {
    const { clock, effects } = fakeClock();
    const limiter = RateLimiter.create({ burstLimit: 3, requestsPerSecond: 1 }, effects)._unsafeUnwrap();

    for (let i = 0; i < 3; i++) {
      expect((await limiter.acquire(neverAborted())).isOk()).toBe(true);
    }

    expect(clock.delays).toEqual([]);
  });

  it('should space requests by the refill rate once the bucket is empty', async () => {
    const { clock, effects } = fakeClock();
    const limiter = RateLimiter.create({ requestsPerSecond: 2 }, effects)._unsafeUnwrap();

    for (let i = 0; i < 3; i++) {
      await limiter.acquire(neverAborted());
    }

    expect(clock.delays).toEqual([500, 500]);
    expect(clock.now).toBe(2000);
  });

  it('should serialize concurrent callers', async () => {
    const { clock, effects } = fakeClock();
    const limiter = RateLimiter.create({ requestsPerSecond: 10 }, effects)._unsafeUnwrap();

    const results = await Promise.all([1, 2, 3].map(() => limiter.acquire(neverAborted())));

    expect(results.every((result) => result.isOk())).toBe(true);
    expect(clock.delays).toEqual([100, 100]);
  });

  it('should not take a token for an already cancelled request', async () => {
    const { effects } = fakeClock();
    const limiter = RateLimiter.create({ requestsPerSecond: 1 }, effects)._unsafeUnwrap();
    const controller = new AbortController();
    controller.abort(new Error('caller gave up'));

    const error = (await limiter.acquire(controller.signal))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(CancellationError);
    expect(limiter.getStatus().tokens).toBe(1);
  });

  it('should stop waiting when the signal fires during the wait', async () => {
    const controller = new AbortController();
    const delay = vi.fn((): Promise<DelayOutcome> => {
      controller.abort(new Error('deadline'));
      return Promise.resolve('aborted');
    });
    const limiter = RateLimiter.create({ requestsPerSecond: 1 }, { delay, now: () => 5000 })._unsafeUnwrap();
    await limiter.acquire(neverAborted());

    const error = (await limiter.acquire(controller.signal))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(CancellationError);
    expect(error.message).toBe('Request cancelled: deadline');
    expect(delay).toHaveBeenCalledTimes(1);
  });
});
