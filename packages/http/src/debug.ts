import { Readable, type Writable } from 'node:stream';

import { err, ok, type Result } from 'neverthrow';

import { canonicalHeaderKey } from './core/http-utils.js';
import type { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';
import { readAll } from './streams.js';
import { type AfterResponseCallback, type BeforeRequestCallback, StreamError } from './types.js';

const EXCLUDED_REQUEST_HEADERS = new Set(['Host', 'Transfer-Encoding', 'Trailer']);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Writes a curl-verbose style dump of every exchange. Dumped bodies are read
 * into memory and put back so the rest of the pipeline still sees them.
 */
export class Debugger implements BeforeRequestCallback, AfterResponseCallback {
  constructor(
    private readonly out: Writable,
    private readonly withBody: boolean
  ) {}

  async enter(request: HttpRequest): Promise<Result<void, Error>> {
    const result = await this.dumpRequest(request);
    if (result.isErr()) {
      this.writeError(result.error);
    }
    return result;
  }

  async exit(response: HttpResponse | undefined, error: Error | undefined): Promise<void> {
    if (error) {
      this.writeError(error);
      return;
    }
    if (!response) {
      return;
    }
    const result = await this.dumpResponse(response);
    if (result.isErr()) {
      this.writeError(result.error);
    }
  }

  private async dumpRequest(request: HttpRequest): Promise<Result<void, Error>> {
    const lines = [`> ${request.method} ${request.requestUri()} HTTP/1.1\r\n`];
    if (request.host) {
      lines.push(`> Host: ${request.host}\r\n`);
    }
    for (const [key, values] of request.headerEntries()) {
      if (EXCLUDED_REQUEST_HEADERS.has(key)) {
        continue;
      }
      for (const value of values) {
        lines.push(`> ${key}: ${value}\r\n`);
      }
    }
    lines.push('>\r\n');
    this.out.write(lines.join(''));

    const body = request.body;
    if (!this.withBody || body === undefined) {
      return ok();
    }

    let bytes: Uint8Array;
    if (body instanceof Uint8Array) {
      bytes = body;
    } else {
      try {
        bytes = await readAll(body);
      } catch (error) {
        return err(new StreamError(errorMessage(error), { cause: error }));
      }
      request.setContent(bytes);
    }
    this.out.write(bytes);
    this.out.write('\r\n');
    return ok();
  }

  private async dumpResponse(response: HttpResponse): Promise<Result<void, Error>> {
    const lines = [`< ${response.httpVersion} ${response.status} ${response.statusText}\r\n`];
    for (const [name, value] of Object.entries(response.headers)) {
      const key = canonicalHeaderKey(name);
      for (const item of Array.isArray(value) ? value : [value]) {
        lines.push(`< ${key}: ${item}\r\n`);
      }
    }
    lines.push('<\r\n');
    this.out.write(lines.join(''));

    if (!this.withBody || !response.mayHaveBody() || response.bodyConsumed) {
      return ok();
    }

    let bytes: Buffer;
    try {
      bytes = await readAll(response.body);
    } catch (error) {
      return err(new StreamError(errorMessage(error), { cause: error }));
    }
    response.body = Readable.from(bytes.length > 0 ? [bytes] : []);
    this.out.write(bytes);
    this.out.write('\r\n');
    return ok();
  }

  private writeError(error: Error): void {
    this.out.write(`* courier [ERROR] ${error.message}\r\n`);
  }
}
