import type { Readable } from 'node:stream';

import type { HttpMethod } from '../types.js';

export interface TransportRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string | string[]>;
  body?: Uint8Array | Readable | undefined;
  /** Fires on caller cancellation or per-attempt timeout */
  signal: AbortSignal;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  httpVersion: string;
  headers: Record<string, string | string[]>;
  body: Readable;
}

/**
 * Performs one HTTP exchange. Rejects on network, TLS or protocol failure;
 * any status code is a successful exchange.
 */
export interface HttpTransport {
  execute(request: TransportRequest): Promise<TransportResponse>;
  /** Drop pooled keep-alive connections, when the transport supports it */
  closeIdleConnections?(): void | Promise<void>;
  close(): Promise<void>;
}
