import type { Readable } from 'node:stream';

import { responseMayHaveBody } from './core/http-utils.js';
import { isConsumed } from './streams.js';
import type { ClientTrace, TraceInfo } from './trace.js';
import type { TransportResponse } from './transport/types.js';
import type { HttpMethod } from './types.js';

export type ResponseHeaders = Record<string, string | string[]>;

export class HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly httpVersion: string;
  /** Lower-cased header names, in the order received */
  readonly headers: ResponseHeaders;
  readonly requestMethod: HttpMethod;

  /** Single consumer. May be replaced by a decoding stream. */
  body: Readable;
  trace: ClientTrace | undefined;

  constructor(raw: TransportResponse, requestMethod: HttpMethod) {
    this.status = raw.status;
    this.statusText = raw.statusText;
    this.httpVersion = raw.httpVersion;
    this.headers = raw.headers;
    this.body = raw.body;
    this.requestMethod = requestMethod;
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  get bodyConsumed(): boolean {
    return isConsumed(this.body);
  }

  /**
   * First value of a header, case-insensitive
   */
  header(name: string): string | undefined {
    const value = this.headers[name.toLowerCase()];
    return Array.isArray(value) ? value[0] : value;
  }

  headerValues(name: string): string[] {
    const value = this.headers[name.toLowerCase()];
    if (value === undefined) {
      return [];
    }
    return Array.isArray(value) ? [...value] : [value];
  }

  mayHaveBody(): boolean {
    return responseMayHaveBody(this.requestMethod, this.status, this.header('content-length'));
  }

  /**
   * Timing snapshot of the final attempt, when client trace was enabled
   */
  traceInfo(): TraceInfo | undefined {
    return this.trace?.info();
  }
}
