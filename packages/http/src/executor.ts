import { getLogger } from '@courier/logger';
import { err, ok, type Result } from 'neverthrow';

import { sanitizeUrl } from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import { resolveEffects } from './effects.js';
import type { HookRegistry } from './hooks.js';
import type { HttpRequest } from './request.js';
import { HttpResponse } from './response.js';
import { discard } from './streams.js';
import { ClientTrace, runWithTrace } from './trace.js';
import { transcodeResponse } from './transcoder.js';
import type { HttpTransport } from './transport/types.js';
import { CancellationError, TransportError } from './types.js';

export interface ExecutorOptions {
  /** Per-attempt limit, from sending the request to receiving response headers */
  timeoutMs: number;
  /** Sent when the request sets no User-Agent */
  userAgent: string;
}

type AttemptOutcome = { response: HttpResponse; error?: undefined } | { response?: HttpResponse | undefined; error: Error };

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Runs one logical call: hooks, body capture, the attempt loop and the wait
 * protocol between attempts
 */
export class RequestExecutor {
  private readonly logger = getLogger('RequestExecutor');
  private readonly effects: HttpEffects;

  constructor(
    private readonly transport: HttpTransport,
    private readonly hooks: HookRegistry,
    private readonly options: ExecutorOptions,
    effects?: Partial<HttpEffects>
  ) {
    this.effects = resolveEffects(effects);
  }

  async execute(request: HttpRequest): Promise<Result<HttpResponse, Error>> {
    const before = await this.hooks.runBefore(request);
    if (before.result.isErr()) {
      await this.hooks.releaseEntered(before.entered, before.result.error);
      return err(before.result.error);
    }

    if (request.retrier) {
      const prepared = await request.retrier.prepare(request);
      if (prepared.isErr()) {
        await this.hooks.releaseEntered(before.entered, prepared.error);
        return err(prepared.error);
      }
    }

    let outcome: AttemptOutcome;
    try {
      outcome = await this.attemptWithRetry(request);
    } catch (error) {
      // A throwing trigger or backoff still ends the call through the after hooks
      this.logger.warn(
        { error: messageOf(error), method: request.method, url: sanitizeUrl(request.url.toString()) },
        'Retry policy failed'
      );
      outcome = { error: new TransportError(`Request failed: ${messageOf(error)}`, { cause: error }) };
    }

    await this.releaseIdleConnections();
    await this.hooks.runAfter(outcome.response, outcome.error);

    if (outcome.error === undefined) {
      return ok(outcome.response);
    }
    return err(outcome.error);
  }

  private async releaseIdleConnections(): Promise<void> {
    if (!this.transport.closeIdleConnections) {
      return;
    }
    try {
      await this.transport.closeIdleConnections();
    } catch (error) {
      this.logger.warn({ error: messageOf(error) }, 'Failed to close idle connections');
    }
  }

  private async attemptWithRetry(request: HttpRequest): Promise<AttemptOutcome> {
    for (let attemptNum = 0; ; attemptNum++) {
      const trace = request.clientTrace ? new ClientTrace() : undefined;
      const outcome = await runWithTrace(trace, () => this.attempt(request));
      trace?.done();
      if (outcome.response && trace) {
        outcome.response.trace = trace;
      }

      const retrier = request.retrier;
      if (!retrier || !retrier.shouldRetry(request.signal, attemptNum, outcome.response, outcome.error)) {
        return outcome;
      }

      const waitMs = retrier.waitFor(attemptNum, outcome.response, outcome.error);
      if (outcome.response && !outcome.response.bodyConsumed) {
        const drained = await discard(outcome.response.body);
        if (drained.isErr()) {
          this.logger.debug({ error: drained.error.message }, 'Failed to drain response body before retry');
        }
      }
      request.rewindBody();

      this.logger.debug(
        {
          attempt: attemptNum + 1,
          error: outcome.error?.message,
          status: outcome.response?.status,
          url: sanitizeUrl(request.url.toString()),
          waitMs,
        },
        'Retrying request'
      );

      if ((await this.effects.delay(waitMs, request.signal)) === 'aborted') {
        return { error: new CancellationError(request.signal.reason, outcome.response), response: outcome.response };
      }
    }
  }

  private async attempt(request: HttpRequest): Promise<AttemptOutcome> {
    if (request.signal.aborted) {
      return { error: new CancellationError(request.signal.reason) };
    }

    const timeout = new AbortController();
    const timer = setTimeout(
      () => timeout.abort(new TransportError(`Request timeout after ${this.options.timeoutMs}ms`)),
      this.options.timeoutMs
    );

    const headers: Record<string, string | string[]> = { 'User-Agent': this.options.userAgent };
    for (const [key, values] of request.headerEntries()) {
      headers[key] = values.length === 1 && values[0] !== undefined ? values[0] : values;
    }
    if (request.host !== request.url.host) {
      headers['Host'] = request.host;
    }

    try {
      const raw = await this.transport.execute({
        body: request.body,
        headers,
        method: request.method,
        signal: AbortSignal.any([request.signal, timeout.signal]),
        url: request.url,
      });

      const decoded = await transcodeResponse(new HttpResponse(raw, request.method));
      if (decoded.isErr()) {
        return { error: decoded.error };
      }
      return { response: decoded.value };
    } catch (error) {
      if (request.signal.aborted) {
        return { error: new CancellationError(request.signal.reason) };
      }
      if (timeout.signal.aborted && timeout.signal.reason instanceof TransportError) {
        return { error: timeout.signal.reason };
      }

      this.logger.debug(
        { error: messageOf(error), method: request.method, url: sanitizeUrl(request.url.toString()) },
        'Transport request failed'
      );
      return { error: new TransportError(`Request failed: ${messageOf(error)}`, { cause: error }) };
    } finally {
      clearTimeout(timer);
    }
  }
}
