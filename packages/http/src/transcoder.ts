import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream';
import { createGunzip } from 'node:zlib';

import { getLogger } from '@courier/logger';
import { err, ok, type Result } from 'neverthrow';

import { GZIP_HEADER_SIZE, hasGzipMagic, isGzipEncoding } from './core/http-utils.js';
import type { HttpResponse } from './response.js';
import { peek } from './streams.js';
import { StreamError } from './types.js';

const logger = getLogger('ResponseTranscoder');

const decodedBodies = new WeakSet<Readable>();

/**
 * Replace a gzip-encoded response body with a decoding stream. A body that does
 * not start with a gzip header is closed and reported as a StreamError.
 */
export const transcodeResponse = async (response: HttpResponse): Promise<Result<HttpResponse, Error>> => {
  if (!isGzipEncoding(response.header('content-encoding')) || !response.mayHaveBody()) {
    return ok(response);
  }

  const original = response.body;
  if (decodedBodies.has(original)) {
    return ok(response);
  }

  let head: Buffer;
  let body: Readable;
  try {
    ({ head, stream: body } = await peek(original, GZIP_HEADER_SIZE));
  } catch (error) {
    original.destroy();
    const message = error instanceof Error ? error.message : String(error);
    return err(new StreamError(`Failed to read gzip header: ${message}`, { cause: error }));
  }

  if (head.length === 0) {
    response.body = body;
    return ok(response);
  }

  if (!hasGzipMagic(head)) {
    original.destroy();
    body.destroy();
    return err(new StreamError('gzip: invalid header'));
  }

  const gunzip = createGunzip();
  pipeline(body, gunzip, (error) => {
    if (error) {
      logger.debug({ error: error.message }, 'gzip body stream ended early');
    }
  });
  decodedBodies.add(gunzip);
  response.body = gunzip;
  return ok(response);
};
