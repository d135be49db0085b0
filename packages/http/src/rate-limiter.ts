import { getLogger } from '@courier/logger';
import { err, ok, type Result } from 'neverthrow';

import { type RateLimitConfig, resolveRateLimitConfig } from './config.js';
import * as RateLimitCore from './core/rate-limit.js';
import type { HttpEffects, RateLimitState } from './core/types.js';
import { createInitialRateLimitState } from './core/types.js';
import { resolveEffects } from './effects.js';
import type { HttpRequest } from './request.js';
import { type BeforeRequestCallback, CancellationError } from './types.js';

/**
 * Token bucket admission gate shared by every request of a client
 */
export class RateLimiter implements BeforeRequestCallback {
  private readonly logger = getLogger('RateLimiter');
  private readonly effects: HttpEffects;

  // Mutable state (only place side effects live)
  private state: RateLimitState;

  // Async mutex for bucket access
  private lock: Promise<void> = Promise.resolve();

  private constructor(config: RateLimitConfig, effects?: Partial<HttpEffects>) {
    this.effects = resolveEffects(effects);
    this.state = createInitialRateLimitState(config);
  }

  static create(config: RateLimitConfig, effects?: Partial<HttpEffects>): Result<RateLimiter, Error> {
    return resolveRateLimitConfig(config).map((resolved) => new RateLimiter(resolved, effects));
  }

  enter(request: HttpRequest): Promise<Result<void, Error>> {
    return this.acquire(request.signal);
  }

  /**
   * Wait for a token. Never holds the lock while sleeping and never takes a
   * token once the signal has fired.
   */
  async acquire(signal: AbortSignal): Promise<Result<void, Error>> {
    while (true) {
      if (signal.aborted) {
        return err(new CancellationError(signal.reason));
      }

      const previousLock = this.lock;
      let releaseLock: () => void = () => undefined;
      this.lock = new Promise<void>((resolve) => {
        releaseLock = resolve;
      });

      let waitTimeMs = 0;

      try {
        await previousLock;

        if (signal.aborted) {
          return err(new CancellationError(signal.reason));
        }

        const now = this.effects.now();
        this.state = RateLimitCore.refillTokens(this.state, now);

        if (RateLimitCore.shouldAllowRequest(this.state, now)) {
          this.state = RateLimitCore.consumeToken(this.state, now);
          return ok();
        }

        waitTimeMs = RateLimitCore.calculateWaitTime(this.state, now);

        this.logger.debug(
          { status: RateLimitCore.getRateLimitStatus(this.state, now), waitTimeMs },
          'Rate limit enforced, waiting before sending request'
        );
      } finally {
        releaseLock();
      }

      if ((await this.effects.delay(waitTimeMs, signal)) === 'aborted') {
        return err(new CancellationError(signal.reason));
      }
    }
  }

  getStatus(): { maxTokens: number; requestsPerSecond: number; tokens: number } {
    return RateLimitCore.getRateLimitStatus(this.state, this.effects.now());
  }
}
