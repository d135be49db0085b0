import type { Readable } from 'node:stream';

import { err, ok, type Result } from 'neverthrow';

import {
  canonicalHeaderKey,
  encodeBasicAuth,
  encodeForm,
  type ParamRecord,
  type ParamValue,
  TEXT_CONTENT_TYPE,
  toStrings,
} from './core/http-utils.js';
import { type FormFields, MultipartEncoder, type MultipartFiles } from './multipart.js';
import { Retrier, type RetryOptions } from './retry.js';
import { type HttpMethod, PreparationError } from './types.js';

export type RequestBody = Uint8Array | Readable;

const NEVER_ABORTED = new AbortController().signal;

/**
 * Mutable request envelope. Headers are stored under their canonical key;
 * setting a header replaces every previous value.
 */
export class HttpRequest {
  readonly method: HttpMethod;
  readonly url: URL;

  retrier: Retrier | undefined;
  clientTrace = false;

  private readonly headerMap = new Map<string, string[]>();
  private hostOverride: string | undefined;
  private currentBody: RequestBody | undefined;
  private replayBody: (() => RequestBody | undefined) | undefined;
  private knownLength: number | undefined;
  private abortSignal: AbortSignal = NEVER_ABORTED;

  private constructor(method: HttpMethod, url: URL) {
    this.method = method;
    this.url = url;
  }

  static create(method: HttpMethod, url: string | URL): Result<HttpRequest, Error> {
    if (url instanceof URL) {
      return ok(new HttpRequest(method, new URL(url.href)));
    }
    if (!URL.canParse(url)) {
      return err(new PreparationError(`Invalid request URL: ${url}`));
    }
    return ok(new HttpRequest(method, new URL(url)));
  }

  get host(): string {
    return this.hostOverride ?? this.url.host;
  }

  get body(): RequestBody | undefined {
    return this.currentBody;
  }

  /** Replay function, present when the body can be produced again */
  get getBody(): (() => RequestBody | undefined) | undefined {
    return this.replayBody;
  }

  get contentLength(): number | undefined {
    return this.knownLength;
  }

  get signal(): AbortSignal {
    return this.abortSignal;
  }

  /**
   * Path and query as sent on the request line
   */
  requestUri(): string {
    const path = this.url.pathname === '' ? '/' : this.url.pathname;
    return `${path}${this.url.search}`;
  }

  header(name: string): string | undefined {
    return this.headerMap.get(canonicalHeaderKey(name))?.[0];
  }

  headerEntries(): [string, string[]][] {
    return [...this.headerMap.entries()].map(([key, values]) => [key, [...values]]);
  }

  setHeader(name: string, value: string): void {
    this.headerMap.set(canonicalHeaderKey(name), [value]);
  }

  deleteHeader(name: string): void {
    this.headerMap.delete(canonicalHeaderKey(name));
  }

  /**
   * Replace query parameters; keys not named keep their values
   */
  setQuery(params: ParamRecord): void {
    for (const [key, value] of Object.entries(params)) {
      const values = toStrings(value);
      if (values.length === 0) {
        continue;
      }
      this.url.searchParams.delete(key);
      for (const item of values) {
        this.url.searchParams.append(key, item);
      }
    }
  }

  /**
   * Replace headers. A Host entry overrides the host sent on the wire.
   */
  setHeaders(headers: Record<string, ParamValue>): void {
    for (const [name, value] of Object.entries(headers)) {
      const values = toStrings(value);
      if (values.length === 0) {
        continue;
      }
      const key = canonicalHeaderKey(name);
      if (key === 'Host') {
        this.hostOverride = values[0];
      } else {
        this.headerMap.set(key, values);
      }
    }
  }

  setContentType(contentType: string): void {
    this.setHeader('Content-Type', contentType);
  }

  setUserAgent(userAgent: string): void {
    this.setHeader('User-Agent', userAgent);
  }

  setBearerToken(token: string): void {
    this.setHeader('Authorization', `Bearer ${token}`);
  }

  setBasicAuth(username: string, password: string): void {
    this.setHeader('Authorization', `Basic ${encodeBasicAuth(username, password)}`);
  }

  /**
   * Byte bodies are replayable and have a known length; an empty one means no body.
   * Streams are sent as-is and are captured only if retry needs them.
   */
  setBody(body: RequestBody | string | undefined): void {
    if (body === undefined) {
      this.currentBody = undefined;
      this.replayBody = undefined;
      this.knownLength = undefined;
      return;
    }

    if (typeof body === 'string' || body instanceof Uint8Array) {
      const bytes = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
      const replayed = bytes.length > 0 ? bytes : undefined;
      this.currentBody = replayed;
      this.replayBody = () => replayed;
      this.knownLength = bytes.length;
      return;
    }

    this.currentBody = body;
    this.replayBody = undefined;
    this.knownLength = undefined;
  }

  setContent(content: Uint8Array): void {
    this.setBody(content);
  }

  setText(text: string): void {
    this.setBody(text);
    this.setContentType(TEXT_CONTENT_TYPE);
  }

  setForm(form: ParamRecord): void {
    this.setBody(encodeForm(form));
    this.setContentType('application/x-www-form-urlencoded');
  }

  setJson(data: unknown): Result<void, Error> {
    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(data);
    } catch (error) {
      return err(
        new PreparationError(`Failed to encode JSON body: ${error instanceof Error ? error.message : String(error)}`, {
          cause: error,
        })
      );
    }
    if (encoded === undefined) {
      return err(new PreparationError('Failed to encode JSON body: value is not serializable'));
    }
    this.setBody(encoded);
    this.setContentType('application/json');
    return ok();
  }

  setFiles(files: MultipartFiles, form?: FormFields): MultipartEncoder {
    const encoder = new MultipartEncoder(files, form);
    this.setBody(encoder);
    this.setContentType(encoder.contentType());
    return encoder;
  }

  setSignal(signal: AbortSignal): void {
    this.abortSignal = signal;
  }

  enableRetry(options?: RetryOptions): Result<void, Error> {
    return Retrier.create(options).map((retrier) => {
      this.retrier = retrier;
    });
  }

  enableClientTrace(): void {
    this.clientTrace = true;
  }

  /**
   * Swap in a fresh copy of the body from the replay function
   */
  rewindBody(): void {
    if (this.replayBody) {
      this.currentBody = this.replayBody();
    }
  }
}
