import type { Writable } from 'node:stream';

import { getLogger } from '@courier/logger';
import { err, ok, type Result } from 'neverthrow';

import { ConcurrencyLimiter } from './concurrency.js';
import {
  type ClientConfig,
  type ClientConfigInput,
  defaultClientConfig,
  type RateLimitConfig,
  resolveClientConfig,
} from './config.js';
import { sanitizeUrl } from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import { Debugger } from './debug.js';
import { RequestExecutor } from './executor.js';
import { HookRegistry } from './hooks.js';
import { RateLimiter } from './rate-limiter.js';
import { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';
import type { HttpTransport } from './transport/types.js';
import { UndiciTransport } from './transport/undici-transport.js';
import {
  type AfterResponseHook,
  type BeforeRequestHook,
  CancellationError,
  type HttpMethod,
  PreparationError,
  type RequestOption,
  TransportError,
} from './types.js';

export interface HttpClientDeps {
  /** Defaults to an undici transport built from the client config */
  transport?: HttpTransport | undefined;
  effects?: Partial<HttpEffects> | undefined;
}

export class HttpClient {
  private readonly config: ClientConfig;
  private readonly logger: ReturnType<typeof getLogger>;
  private readonly hooks = new HookRegistry();
  private readonly transport: HttpTransport;
  private readonly executor: RequestExecutor;
  private readonly effects: Partial<HttpEffects> | undefined;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;
  private isClosed = false;

  constructor(config: ClientConfig = defaultClientConfig, deps: HttpClientDeps = {}) {
    this.config = config;
    this.logger = getLogger('HttpClient');
    this.effects = deps.effects;
    this.transport =
      deps.transport ??
      new UndiciTransport({
        connectTimeoutMs: config.connectTimeoutMs,
        keepAliveMaxTimeoutMs: config.keepAliveMaxTimeoutMs,
        keepAliveTimeoutMs: config.keepAliveTimeoutMs,
      });
    this.executor = new RequestExecutor(
      this.transport,
      this.hooks,
      { timeoutMs: config.timeoutMs, userAgent: config.userAgent },
      deps.effects
    );

    this.logger.debug(
      { timeoutMs: config.timeoutMs, userAgent: config.userAgent },
      'HTTP client initialized'
    );
  }

  registerBeforeRequestHooks(...hooks: BeforeRequestHook[]): void {
    this.hooks.registerBefore(...hooks);
  }

  registerAfterResponseHooks(...hooks: AfterResponseHook[]): void {
    this.hooks.registerAfter(...hooks);
  }

  /**
   * Admit requests through a token bucket shared by every call on this client
   */
  enableRateLimiting(config: RateLimitConfig): Result<RateLimiter, Error> {
    return RateLimiter.create(config, this.effects).map((limiter) => {
      this.registerBeforeRequestHooks(limiter);
      return limiter;
    });
  }

  /**
   * Cap the number of in-flight calls; the slot is held until after-response hooks run
   */
  setMaxConcurrency(limit: number): Result<ConcurrencyLimiter, Error> {
    if (!Number.isInteger(limit) || limit <= 0) {
      return err(new PreparationError(`Invalid concurrency limit: expected a positive integer, got ${limit}`));
    }
    const limiter = new ConcurrencyLimiter(limit);
    this.registerBeforeRequestHooks(limiter);
    this.registerAfterResponseHooks(limiter);
    return ok(limiter);
  }

  /**
   * Dump every exchange to out, bodies included when withBody is set
   */
  enableDebugging(out: Writable, withBody = false): Debugger {
    const debug = new Debugger(out, withBody);
    this.registerBeforeRequestHooks(debug);
    this.registerAfterResponseHooks(debug);
    return debug;
  }

  get(url: string | URL, ...options: RequestOption[]): Promise<Result<HttpResponse, Error>> {
    return this.send('GET', url, ...options);
  }

  head(url: string | URL, ...options: RequestOption[]): Promise<Result<HttpResponse, Error>> {
    return this.send('HEAD', url, ...options);
  }

  post(url: string | URL, ...options: RequestOption[]): Promise<Result<HttpResponse, Error>> {
    return this.send('POST', url, ...options);
  }

  put(url: string | URL, ...options: RequestOption[]): Promise<Result<HttpResponse, Error>> {
    return this.send('PUT', url, ...options);
  }

  patch(url: string | URL, ...options: RequestOption[]): Promise<Result<HttpResponse, Error>> {
    return this.send('PATCH', url, ...options);
  }

  delete(url: string | URL, ...options: RequestOption[]): Promise<Result<HttpResponse, Error>> {
    return this.send('DELETE', url, ...options);
  }

  options(url: string | URL, ...options: RequestOption[]): Promise<Result<HttpResponse, Error>> {
    return this.send('OPTIONS', url, ...options);
  }

  /**
   * Build a request, apply options in order and execute it
   */
  async send(method: HttpMethod, url: string | URL, ...options: RequestOption[]): Promise<Result<HttpResponse, Error>> {
    const created = HttpRequest.create(method, url);
    if (created.isErr()) {
      return err(created.error);
    }

    const request = created.value;
    for (const option of options) {
      const applied = option(request);
      if (applied.isErr()) {
        const error =
          applied.error instanceof PreparationError
            ? applied.error
            : new PreparationError(`Invalid request option: ${applied.error.message}`, { cause: applied.error });
        return err(error);
      }
    }

    return this.do(request);
  }

  /**
   * Execute a prepared request. Never throws.
   */
  async do(request: HttpRequest): Promise<Result<HttpResponse, Error>> {
    if (this.isClosed || this.closePromise) {
      return err(new TransportError('HTTP client is closed'));
    }

    this.logger.debug({ method: request.method, url: sanitizeUrl(request.url.toString()) }, 'Sending HTTP request');

    try {
      return await this.executor.execute(request);
    } catch (error) {
      if (request.signal.aborted) {
        return err(new CancellationError(request.signal.reason));
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ error: message, method: request.method }, 'Unexpected failure while executing request');
      return err(new TransportError(`Request failed: ${message}`, { cause: error }));
    }
  }

  /**
   * Close the transport and its pooled connections.
   * Idempotent: safe to call multiple times. Subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP client');
      await this.transport.close();
      this.isClosed = true;
    })();

    return this.closePromise;
  }
}

/**
 * Build a client from a partial config. Invalid values are reported, not thrown.
 */
export const createClient = (
  config: ClientConfigInput = {},
  deps: HttpClientDeps = {}
): Result<HttpClient, Error> => resolveClientConfig(config).map((resolved) => new HttpClient(resolved, deps));
