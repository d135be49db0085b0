import { STATUS_CODES } from 'node:http';

import { getLogger } from '@courier/logger';
import { Agent, type Dispatcher } from 'undici';

import { createTimedConnector } from './connector.js';
import { installTraceChannels } from './trace-channels.js';
import type { HttpTransport, TransportRequest, TransportResponse } from './types.js';

export interface UndiciTransportOptions {
  connectTimeoutMs: number;
  keepAliveTimeoutMs: number;
  keepAliveMaxTimeoutMs: number;
}

const normalizeHeaders = (headers: Record<string, string | string[] | undefined>): Record<string, string | string[]> => {
  const normalized: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) {
      normalized[name.toLowerCase()] = value;
    }
  }
  return normalized;
};

/**
 * HttpTransport over an undici Agent. Bodies are returned as sent by the
 * server; content decoding is left to the pipeline.
 */
export class UndiciTransport implements HttpTransport {
  private readonly logger = getLogger('UndiciTransport');
  private readonly options: UndiciTransportOptions;
  private agent: Agent;
  /** Exchanges whose response body has not finished */
  private inFlight = 0;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;
  private isClosed = false;

  constructor(options: UndiciTransportOptions) {
    installTraceChannels();
    this.options = options;
    this.agent = this.createAgent();
  }

  get activeExchanges(): number {
    return this.inFlight;
  }

  async execute(request: TransportRequest): Promise<TransportResponse> {
    this.inFlight++;
    let settled = false;
    const settle = () => {
      if (!settled) {
        settled = true;
        this.inFlight--;
      }
    };

    let result: Dispatcher.ResponseData;
    try {
      result = await this.agent.request({
        body: request.body ?? null,
        headers: request.headers,
        method: request.method,
        origin: request.url.origin,
        path: `${request.url.pathname}${request.url.search}`,
        signal: request.signal,
      });
    } catch (error) {
      settle();
      throw error;
    }

    const { statusCode, headers, body } = result;
    body.once('end', settle);
    body.once('close', settle);

    return {
      body,
      headers: normalizeHeaders(headers),
      httpVersion: 'HTTP/1.1',
      status: statusCode,
      statusText: STATUS_CODES[statusCode] ?? '',
    };
  }

  /**
   * Drop pooled keep-alive connections when no exchange is using the pool.
   * The agent is replaced and the old one closed; with bodies still being
   * read the pool is left alone.
   */
  async closeIdleConnections(): Promise<void> {
    if (this.inFlight > 0 || this.isClosed || this.closePromise) {
      return;
    }

    const previous = this.agent;
    this.agent = this.createAgent();
    this.logger.debug('Closing idle HTTP connections');
    await previous.close();
  }

  /**
   * Close the agent and all pooled connections (idempotent)
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error({ error: errorMessage }, 'Failed to close HTTP agent');
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`, { cause: error });
      }
    })();

    return this.closePromise;
  }

  private createAgent(): Agent {
    return new Agent({
      connect: createTimedConnector({ timeoutMs: this.options.connectTimeoutMs }),
      keepAliveMaxTimeout: this.options.keepAliveMaxTimeoutMs,
      keepAliveTimeout: this.options.keepAliveTimeoutMs,
      pipelining: 1,
    });
  }
}
