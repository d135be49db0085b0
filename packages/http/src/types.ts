import type { Result } from 'neverthrow';

import type { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'CONNECT' | 'TRACE';

export type HookResult = Result<void, Error>;

/**
 * Runs before each request is sent. An Err stops the request and is returned to the caller.
 */
export type BeforeRequestFn = (request: HttpRequest) => HookResult | Promise<HookResult>;

export interface BeforeRequestCallback {
  enter(request: HttpRequest): HookResult | Promise<HookResult>;
}

export type BeforeRequestHook = BeforeRequestFn | BeforeRequestCallback;

/**
 * Runs once after the final attempt, with the response and/or the error returned to the caller.
 */
export type AfterResponseFn = (response: HttpResponse | undefined, error: Error | undefined) => void | Promise<void>;

export interface AfterResponseCallback {
  exit(response: HttpResponse | undefined, error: Error | undefined): void | Promise<void>;
}

export type AfterResponseHook = AfterResponseFn | AfterResponseCallback;

/**
 * Mutates a request under construction
 */
export type RequestOption = (request: HttpRequest) => Result<void, Error>;

// Error taxonomy

/**
 * The request could not be built: bad URL, unserializable body, failed body capture
 */
export class PreparationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PreparationError';
  }
}

/**
 * The exchange failed: connection, TLS, protocol or per-attempt timeout
 */
export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The caller's signal fired. Carries the last response seen before cancellation, if any.
 */
export class CancellationError extends Error {
  constructor(
    public readonly reason: unknown,
    public readonly response?: HttpResponse
  ) {
    super(reason instanceof Error ? `Request cancelled: ${reason.message}` : 'Request cancelled', { cause: reason });
    this.name = 'CancellationError';
  }
}

/**
 * A body stream could not be read or decoded
 */
export class StreamError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StreamError';
  }
}
