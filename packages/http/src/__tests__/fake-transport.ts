import { Readable } from 'node:stream';

import { vi } from 'vitest';

import type { HttpEffects } from '../core/types.js';
import { readAll } from '../streams.js';
import type { HttpTransport, TransportRequest, TransportResponse } from '../transport/types.js';

export interface FakeReply {
  status?: number;
  headers?: Record<string, string | string[]>;
  body?: string | Buffer | Readable;
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string | string[]>;
  body: Buffer | undefined;
}

export type FakeHandler = (request: TransportRequest, index: number) => FakeReply | Promise<FakeReply>;

/**
 * In-memory transport: records what was sent and replies through a handler
 */
export class FakeTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  readonly closeIdleConnections = vi.fn();
  readonly close = vi.fn(() => Promise.resolve());

  constructor(private readonly handler: FakeHandler = () => ({})) {}

  async execute(request: TransportRequest): Promise<TransportResponse> {
    let body: Buffer | undefined;
    if (request.body instanceof Uint8Array) {
      body = Buffer.from(request.body);
    } else if (request.body) {
      body = await readAll(request.body);
    }
    this.requests.push({ body, headers: request.headers, method: request.method, url: request.url.toString() });

    const reply = await this.handler(request, this.requests.length - 1);
    const replyBody = typeof reply.body === 'string' ? Buffer.from(reply.body, 'utf8') : (reply.body ?? Buffer.alloc(0));
    return {
      body: replyBody instanceof Readable ? replyBody : Readable.from(replyBody.length > 0 ? [replyBody] : []),
      headers: reply.headers ?? {},
      httpVersion: 'HTTP/1.1',
      status: reply.status ?? 200,
      statusText: 'OK',
    };
  }
}

/**
 * Effects whose delays resolve immediately and are recorded
 */
export const instantEffects = (): Partial<HttpEffects> & { delays: number[] } => {
  const delays: number[] = [];
  return {
    delay: (ms, signal) => {
      delays.push(ms);
      return Promise.resolve(signal.aborted ? 'aborted' : 'elapsed');
    },
    delays,
  };
};

export const textOf = async (stream: Readable): Promise<string> => (await readAll(stream)).toString('utf8');
