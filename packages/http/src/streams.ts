import { Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';
import { finished } from 'node:stream/promises';

import { err, ok, type Result } from 'neverthrow';

import { StreamError } from './types.js';

export interface PeekResult {
  /** Up to `size` leading bytes; shorter only when the stream ended first */
  head: Buffer;
  /** Yields every byte of the original stream, head included */
  stream: Readable;
}

export const toBuffer = (chunk: unknown): Buffer => {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  throw new StreamError(`Unsupported chunk type: ${typeof chunk}`);
};

const readChunk = (stream: Readable): Promise<Buffer | undefined> =>
  new Promise((resolve, reject) => {
    const cleanup = () => {
      stream.off('readable', attempt);
      stream.off('end', onEnd);
      stream.off('error', onError);
      stream.off('close', onClose);
    };
    const onEnd = () => {
      cleanup();
      resolve(undefined);
    };
    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };
    const onClose = () => {
      cleanup();
      if (stream.readableEnded) {
        resolve(undefined);
      } else {
        reject(new StreamError('Stream closed before end'));
      }
    };
    function attempt() {
      const chunk: unknown = stream.read();
      if (chunk !== null) {
        cleanup();
        try {
          resolve(toBuffer(chunk));
        } catch (error) {
          reject(error);
        }
      }
    }

    if (stream.readableEnded) {
      resolve(undefined);
      return;
    }
    if (stream.destroyed) {
      reject(new StreamError('Stream already destroyed'));
      return;
    }
    stream.on('readable', attempt);
    stream.once('end', onEnd);
    stream.once('error', onError);
    stream.once('close', onClose);
    attempt();
  });

async function* replay(head: Buffer, rest: Readable | undefined): AsyncGenerator<Buffer> {
  if (head.length > 0) {
    yield head;
  }
  if (rest) {
    for await (const chunk of rest) {
      yield toBuffer(chunk);
    }
  }
}

/**
 * Read the first `size` bytes without losing them: the returned stream yields
 * the peeked bytes followed by the rest of the source.
 */
export const peek = async (source: Readable, size: number): Promise<PeekResult> => {
  const chunks: Buffer[] = [];
  let length = 0;
  let ended = false;

  while (length < size) {
    const chunk = await readChunk(source);
    if (chunk === undefined) {
      ended = true;
      break;
    }
    chunks.push(chunk);
    length += chunk.length;
  }

  const buffered = Buffer.concat(chunks);
  return {
    head: buffered.subarray(0, size),
    stream: Readable.from(replay(buffered, ended ? undefined : source)),
  };
};

export const readAll = (stream: Readable): Promise<Buffer> => buffer(stream);

/**
 * Read and drop whatever is left so the connection can be reused
 */
export const discard = async (stream: Readable): Promise<Result<void, Error>> => {
  if (stream.readableEnded || stream.destroyed) {
    return ok();
  }
  stream.resume();
  try {
    await finished(stream);
    return ok();
  } catch (error) {
    return err(error instanceof Error ? error : new StreamError(String(error)));
  }
};

export const isConsumed = (stream: Readable): boolean => stream.readableEnded || stream.destroyed;
