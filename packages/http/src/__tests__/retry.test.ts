import { Readable } from 'node:stream';

import { describe, expect, it, vi } from 'vitest';

import { HttpRequest } from '../request.js';
import { HttpResponse } from '../response.js';
import { DEFAULT_RETRY_MAX_ATTEMPTS, Retrier, retryOnServerErrors } from '../retry.js';

const responseWith = (status: number) =>
  new HttpResponse(
    { body: Readable.from([]), headers: {}, httpVersion: 'HTTP/1.1', status, statusText: '' },
    'GET'
  );

const neverAborted = () => new AbortController().signal;

describe('Retrier', () => {
  it('should default to three retries', () => {
    expect(Retrier.create()._unsafeUnwrap().maxAttempts).toBe(DEFAULT_RETRY_MAX_ATTEMPTS);
  });

  describe('shouldRetry', () => {
    it('should retry errors and 429 with the default policy', () => {
      const retrier = Retrier.create()._unsafeUnwrap();

      expect(retrier.shouldRetry(neverAborted(), 0, undefined, new Error('reset'))).toBe(true);
      expect(retrier.shouldRetry(neverAborted(), 0, responseWith(429), undefined)).toBe(true);
      expect(retrier.shouldRetry(neverAborted(), 0, responseWith(500), undefined)).toBe(false);
      expect(retrier.shouldRetry(neverAborted(), 0, responseWith(200), undefined)).toBe(false);
    });

    it('should stop once the attempt number reaches the maximum', () => {
      const retrier = Retrier.create({ maxAttempts: 2 })._unsafeUnwrap();

      expect(retrier.shouldRetry(neverAborted(), 1, responseWith(429), undefined)).toBe(true);
      expect(retrier.shouldRetry(neverAborted(), 2, responseWith(429), undefined)).toBe(false);
    });

    it('should never retry when disabled or cancelled', () => {
      const controller = new AbortController();
      controller.abort();

      expect(Retrier.create({ maxAttempts: 0 })._unsafeUnwrap().shouldRetry(neverAborted(), 0, undefined, new Error('x'))).toBe(
        false
      );
      expect(Retrier.create()._unsafeUnwrap().shouldRetry(controller.signal, 0, undefined, new Error('x'))).toBe(false);
    });

    it('should retry when any configured trigger matches', () => {
      const never = vi.fn(() => false);
      const retrier = Retrier.create({ triggers: [never, retryOnServerErrors] })._unsafeUnwrap();

      expect(retrier.shouldRetry(neverAborted(), 0, responseWith(502), undefined)).toBe(true);
      expect(retrier.shouldRetry(neverAborted(), 0, responseWith(404), undefined)).toBe(false);
      expect(never).toHaveBeenCalledTimes(2);
    });
  });

  describe('prepare', () => {
    it('should capture a stream body into a replayable one', async () => {
      const request = HttpRequest.create('PUT', 'http://example.test/blob')._unsafeUnwrap();
      request.setBody(Readable.from([Buffer.from('stream'), Buffer.from('ed')]));

      const result = await Retrier.create()._unsafeUnwrap().prepare(request);

      expect(result.isOk()).toBe(true);
      expect(request.contentLength).toBe(8);
      expect(request.getBody?.()).toEqual(Buffer.from('streamed'));
    });

    it('should leave the body alone when retry is disabled', async () => {
      const request = HttpRequest.create('PUT', 'http://example.test/blob')._unsafeUnwrap();
      const stream = Readable.from(['untouched']);
      request.setBody(stream);

      await Retrier.create({ maxAttempts: 0 })._unsafeUnwrap().prepare(request);

      expect(request.body).toBe(stream);
    });
  });

  it('should clamp negative backoff waits to zero', () => {
    const retrier = Retrier.create({ backoff: { wait: () => -5 } })._unsafeUnwrap();

    expect(retrier.waitFor(0, undefined, undefined)).toBe(0);
  });
});
