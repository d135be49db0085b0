import { getLogger } from '@courier/logger';
import { err, ok, type Result } from 'neverthrow';

import { type BackoffStrategy, createExponentialBackoff } from './core/backoff.js';
import type { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';
import { readAll } from './streams.js';
import { PreparationError } from './types.js';

export const DEFAULT_RETRY_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_INTERVAL_MS = 1000;
export const DEFAULT_RETRY_MAX_INTERVAL_MS = 30_000;

/**
 * Returns true when the outcome of an attempt should be retried
 */
export type RetryTrigger = (response: HttpResponse | undefined, error: Error | undefined) => boolean;

export interface RetryOptions {
  /** Retries after the first attempt; 0 disables retry */
  maxAttempts?: number | undefined;
  backoff?: BackoffStrategy | undefined;
  /** Replace the default policy: any error or a 429 */
  triggers?: readonly RetryTrigger[] | undefined;
}

/**
 * Opt-in trigger that also retries 5xx responses
 */
export const retryOnServerErrors: RetryTrigger = (response, error) =>
  error !== undefined || (response !== undefined && (response.status === 429 || response.status >= 500));

const logger = getLogger('Retrier');

export class Retrier {
  readonly maxAttempts: number;
  readonly backoff: BackoffStrategy;
  readonly triggers: readonly RetryTrigger[];

  private constructor(maxAttempts: number, backoff: BackoffStrategy, triggers: readonly RetryTrigger[]) {
    this.maxAttempts = maxAttempts;
    this.backoff = backoff;
    this.triggers = triggers;
  }

  static create(options: RetryOptions = {}): Result<Retrier, Error> {
    const maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 0) {
      return err(new PreparationError(`Invalid retry configuration: maxAttempts must be a non-negative integer, got ${maxAttempts}`));
    }

    return ok(
      new Retrier(
        maxAttempts,
        options.backoff ??
          createExponentialBackoff(DEFAULT_RETRY_BASE_INTERVAL_MS, DEFAULT_RETRY_MAX_INTERVAL_MS, true),
        [...(options.triggers ?? [])]
      )
    );
  }

  /**
   * Capture a stream body into memory so every attempt sends the same bytes
   */
  async prepare(request: HttpRequest): Promise<Result<void, Error>> {
    const body = request.body;
    if (this.maxAttempts === 0 || body === undefined || request.getBody !== undefined) {
      return ok();
    }
    if (body instanceof Uint8Array) {
      request.setContent(body);
      return ok();
    }

    try {
      const bytes = await readAll(body);
      request.setContent(bytes);
      logger.debug({ bytes: bytes.length }, 'Captured request body for replay');
      return ok();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new PreparationError(`Failed to capture request body: ${message}`, { cause: error }));
    }
  }

  shouldRetry(
    signal: AbortSignal,
    attemptNum: number,
    response: HttpResponse | undefined,
    error: Error | undefined
  ): boolean {
    if (signal.aborted || attemptNum >= this.maxAttempts) {
      return false;
    }

    if (this.triggers.length === 0) {
      return error !== undefined || response?.status === 429;
    }

    return this.triggers.some((trigger) => trigger(response, error));
  }

  waitFor(attemptNum: number, response: HttpResponse | undefined, error: Error | undefined): number {
    return Math.max(0, this.backoff.wait(attemptNum, response, error));
  }
}
