import { randomBytes } from 'node:crypto';
import { createReadStream, openSync } from 'node:fs';
import { basename } from 'node:path';
import { Readable } from 'node:stream';

import { getLogger } from '@courier/logger';
import { fileTypeFromBuffer } from 'file-type';
import { err, ok, type Result } from 'neverthrow';

import {
  BINARY_CONTENT_TYPE,
  escapeQuotes,
  looksLikeText,
  type ParamRecord,
  TEXT_CONTENT_TYPE,
  toStrings,
} from './core/http-utils.js';
import { peek, toBuffer } from './streams.js';
import { PreparationError } from './types.js';

const SNIFF_SIZE = 512;
const UNKNOWN_FILENAME = '???';

const logger = getLogger('MultipartEncoder');

/**
 * One file section of a multipart body. The encoder closes it exactly once.
 */
export class MultipartFile {
  filename: string | undefined;
  mime: string | undefined;
  private closed = false;

  private constructor(private readonly source: Readable) {}

  static fromStream(stream: Readable): MultipartFile {
    return new MultipartFile(stream);
  }

  static fromBytes(content: Uint8Array | string): MultipartFile {
    const bytes = typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content);
    return new MultipartFile(Readable.from(bytes.length > 0 ? [bytes] : []));
  }

  /**
   * Open a file from disk, named after its base name
   */
  static open(path: string): Result<MultipartFile, Error> {
    try {
      const fd = openSync(path, 'r');
      return ok(new MultipartFile(createReadStream(path, { fd })).withFilename(basename(path)));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new PreparationError(`Failed to open ${path}: ${message}`, { cause: error }));
    }
  }

  get stream(): Readable {
    return this.source;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  withFilename(filename: string): this {
    this.filename = filename;
    return this;
  }

  withMime(mime: string): this {
    this.mime = mime;
    return this;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.source.destroy();
  }
}

/**
 * Like MultipartFile.open but throws when the file cannot be opened
 */
export const mustOpenFile = (path: string): MultipartFile => {
  const result = MultipartFile.open(path);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
};

export type MultipartFiles = Map<string, MultipartFile> | Record<string, MultipartFile>;
export type FormFields = ParamRecord;

/**
 * Sniff a content type from the leading bytes of a file
 */
export const detectContentType = async (head: Uint8Array): Promise<string> => {
  const detected = await fileTypeFromBuffer(head);
  if (detected) {
    return detected.mime;
  }
  return looksLikeText(head) ? TEXT_CONTENT_TYPE : BINARY_CONTENT_TYPE;
};

export interface MultipartEncoderOptions {
  highWaterMark?: number | undefined;
}

/**
 * Streams a multipart/form-data body: files first in insertion order, then form
 * fields sorted by name. Production starts on the first read and pauses while
 * the internal buffer is full.
 */
export class MultipartEncoder extends Readable {
  readonly boundary: string;

  private readonly pendingFiles: [string, MultipartFile][];
  private readonly form: FormFields;
  private producer: Promise<void> | undefined;
  private resumeProducer: (() => void) | undefined;
  private wrotePart = false;

  constructor(files: MultipartFiles, form: FormFields = {}, options: MultipartEncoderOptions = {}) {
    super({ highWaterMark: options.highWaterMark ?? 64 * 1024 });
    this.boundary = randomBytes(30).toString('hex');
    this.pendingFiles = files instanceof Map ? [...files.entries()] : Object.entries(files);
    this.form = form;
  }

  contentType(): string {
    return `multipart/form-data; boundary=${this.boundary}`;
  }

  override _read(): void {
    const resume = this.resumeProducer;
    this.resumeProducer = undefined;
    resume?.();
    this.producer ??= this.produce();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    for (const [, file] of this.pendingFiles.splice(0)) {
      file.close();
    }
    const resume = this.resumeProducer;
    this.resumeProducer = undefined;
    resume?.();
    callback(error);
  }

  private async produce(): Promise<void> {
    try {
      for (let entry = this.pendingFiles.shift(); entry; entry = this.pendingFiles.shift()) {
        const [name, file] = entry;
        if (!(await this.writeFile(name, file))) {
          return;
        }
      }

      for (const name of Object.keys(this.form).sort()) {
        for (const value of toStrings(this.form[name])) {
          const header = this.partHeader([['Content-Disposition', `form-data; name="${escapeQuotes(name)}"`]]);
          if (!(await this.pushChunk(Buffer.concat([header, Buffer.from(value, 'utf8')])))) {
            return;
          }
        }
      }

      const closing = `${this.wrotePart ? '\r\n' : ''}--${this.boundary}--\r\n`;
      if (await this.pushChunk(Buffer.from(closing, 'ascii'))) {
        this.push(null);
      }
    } catch (error) {
      this.destroy(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private async writeFile(name: string, file: MultipartFile): Promise<boolean> {
    const filename = file.filename || UNKNOWN_FILENAME;
    try {
      let source = file.stream;
      let mime = file.mime;
      if (!mime) {
        const peeked = await peek(source, SNIFF_SIZE);
        source = peeked.stream;
        mime = await detectContentType(peeked.head);
      }

      const header = this.partHeader([
        ['Content-Disposition', `form-data; name="${escapeQuotes(name)}"; filename="${escapeQuotes(filename)}"`],
        ['Content-Type', mime],
      ]);
      if (!(await this.pushChunk(header))) {
        return false;
      }

      for await (const chunk of source) {
        if (!(await this.pushChunk(toBuffer(chunk)))) {
          return false;
        }
      }
      return true;
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error), field: name, filename },
        `Can't bind multipart section ${name}=@${filename}`
      );
      return !this.destroyed;
    } finally {
      file.close();
    }
  }

  private partHeader(headers: [string, string][]): Buffer {
    const opening = `${this.wrotePart ? '\r\n' : ''}--${this.boundary}\r\n`;
    this.wrotePart = true;
    const lines = headers.map(([key, value]) => `${key}: ${value}\r\n`).join('');
    return Buffer.from(`${opening}${lines}\r\n`, 'utf8');
  }

  /**
   * Push a chunk, waiting for the next _read when the buffer is full.
   * Resolves false once the encoder has been destroyed.
   */
  private async pushChunk(chunk: Buffer): Promise<boolean> {
    if (this.destroyed) {
      return false;
    }
    if (this.push(chunk)) {
      return true;
    }
    await new Promise<void>((resolve) => {
      this.resumeProducer = resolve;
    });
    return !this.destroyed;
  }
}
