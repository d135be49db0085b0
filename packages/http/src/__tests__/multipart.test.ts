import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';

import busboy from 'busboy';
import { afterAll, describe, expect, it, vi } from 'vitest';

import { detectContentType, MultipartEncoder, MultipartFile, mustOpenFile } from '../multipart.js';
import { readAll } from '../streams.js';
import { PreparationError } from '../types.js';

interface ParsedFile {
  name: string;
  filename: string;
  mimeType: string;
  content: Buffer;
}

interface ParsedForm {
  files: ParsedFile[];
  fields: [string, string][];
}

const parse = (body: Buffer, contentType: string): Promise<ParsedForm> =>
  new Promise((resolve, reject) => {
    const parser = busboy({ headers: { 'content-type': contentType } });
    const files: ParsedFile[] = [];
    const fields: [string, string][] = [];
    const reads: Promise<void>[] = [];

    parser.on('file', (name, stream, info) => {
      const file: ParsedFile = { content: Buffer.alloc(0), filename: info.filename, mimeType: info.mimeType, name };
      files.push(file);
      reads.push(
        readAll(stream).then((content) => {
          file.content = content;
        })
      );
    });
    parser.on('field', (name, value) => {
      fields.push([name, value]);
    });
    parser.on('close', () => {
      Promise.all(reads).then(() => resolve({ fields, files }), reject);
    });
    parser.on('error', reject);
    parser.end(body);
  });

const encodeAndParse = async (encoder: MultipartEncoder): Promise<ParsedForm> =>
  parse(await readAll(encoder), encoder.contentType());

const PNG_HEAD = Buffer.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x00, 0x49, 0x44, 0x41, 0x54, 0xae, 0x42, 0x60,
  0x82,
]);

describe('MultipartEncoder', () => {
  const dir = mkdtempSync(join(tmpdir(), 'courier-multipart-'));

  afterAll(() => {
    rmSync(dir, { force: true, recursive: true });
  });

  it('encodes files before sorted form fields', async () => {
    const encoder = new MultipartEncoder(
      {
        notes: MultipartFile.fromBytes('first file').withFilename('notes.txt'),
        raw: MultipartFile.fromBytes('second').withFilename('raw.bin').withMime('application/x-custom'),
      },
      { b: ['2', '3'], a: '1' }
    );

    const parsed = await encodeAndParse(encoder);

    expect(parsed.files.map((file) => [file.name, file.filename, file.mimeType, file.content.toString()])).toEqual([
      ['notes', 'notes.txt', 'text/plain', 'first file'],
      ['raw', 'raw.bin', 'application/x-custom', 'second'],
    ]);
    expect(parsed.fields).toEqual([
      ['a', '1'],
      ['b', '2'],
      ['b', '3'],
    ]);
  });

  it('exposes its boundary in the content type', () => {
    const encoder = new MultipartEncoder({});

    expect(encoder.boundary).toMatch(/^[0-9a-f]{60}$/);
    expect(encoder.contentType()).toBe(`multipart/form-data; boundary=${encoder.boundary}`);
  });

  it('writes only the closing delimiter when there is nothing to send', async () => {
    const encoder = new MultipartEncoder({});

    const body = await readAll(encoder);

    expect(body.toString('ascii')).toBe(`--${encoder.boundary}--\r\n`);
  });

  it('starts the first part without a leading line break', async () => {
    const encoder = new MultipartEncoder({}, { field: 'value' });

    const body = await readAll(encoder);

    expect(body.toString('utf8')).toBe(
      `--${encoder.boundary}\r\nContent-Disposition: form-data; name="field"\r\n\r\nvalue\r\n--${encoder.boundary}--\r\n`
    );
  });

  it('names a file without a filename ???', async () => {
    const encoder = new MultipartEncoder(new Map([['upload', MultipartFile.fromBytes('data')]]));

    const parsed = await encodeAndParse(encoder);

    expect(parsed.files[0]?.filename).toBe('???');
  });

  it('sniffs a png from its signature', async () => {
    const encoder = new MultipartEncoder({ image: MultipartFile.fromBytes(PNG_HEAD).withFilename('pixel.png') });

    const parsed = await encodeAndParse(encoder);

    expect(parsed.files[0]?.mimeType).toBe('image/png');
    expect(parsed.files[0]?.content).toEqual(PNG_HEAD);
  });

  it('streams large files through a small buffer', async () => {
    const content = Buffer.alloc(100 * 1024, 'x');
    const encoder = new MultipartEncoder(
      { big: MultipartFile.fromStream(Readable.from([content.subarray(0, 50_000), content.subarray(50_000)])) },
      {},
      { highWaterMark: 16 }
    );

    const parsed = await encodeAndParse(encoder);

    expect(parsed.files[0]?.content.equals(content)).toBe(true);
  });

  it('closes every file exactly once', async () => {
    const first = MultipartFile.fromBytes('one');
    const second = MultipartFile.fromBytes('two');
    const firstClose = vi.spyOn(first, 'close');
    const secondClose = vi.spyOn(second, 'close');

    await readAll(new MultipartEncoder({ first, second }));

    expect(firstClose).toHaveBeenCalledTimes(1);
    expect(secondClose).toHaveBeenCalledTimes(1);
    expect(first.isClosed).toBe(true);
    expect(second.isClosed).toBe(true);
  });

  it('skips a file whose source fails and keeps encoding', async () => {
    const broken = MultipartFile.fromStream(
      new Readable({
        read() {
          this.destroy(new Error('read failed'));
        },
      })
    ).withFilename('broken.txt');
    const encoder = new MultipartEncoder(
      { broken, good: MultipartFile.fromBytes('fine').withFilename('good.txt') },
      { after: 'yes' }
    );

    const parsed = await encodeAndParse(encoder);

    expect(parsed.files.map((file) => file.name)).toEqual(['good']);
    expect(parsed.fields).toEqual([['after', 'yes']]);
    expect(broken.isClosed).toBe(true);
  });

  it('closes pending files when destroyed before reading', () => {
    const first = MultipartFile.fromBytes('one');
    const second = MultipartFile.fromBytes('two');
    const encoder = new MultipartEncoder({ first, second });

    encoder.destroy();

    expect(first.isClosed).toBe(true);
    expect(second.isClosed).toBe(true);
  });

  describe('MultipartFile.open', () => {
    it('opens a file named after its base name', async () => {
      const path = join(dir, 'report.csv');
      writeFileSync(path, 'a,b\n1,2\n');

      const file = MultipartFile.open(path)._unsafeUnwrap();

      expect(file.filename).toBe('report.csv');
      expect((await readAll(file.stream)).toString()).toBe('a,b\n1,2\n');
    });

    it('returns a preparation error for a missing file', () => {
      const result = MultipartFile.open(join(dir, 'missing.txt'));

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(PreparationError);
      expect(error.message.startsWith(`Failed to open ${join(dir, 'missing.txt')}:`)).toBe(true);
    });

    it('throws from mustOpenFile for a missing file', () => {
      expect(() => mustOpenFile(join(dir, 'missing.txt'))).toThrow(PreparationError);
    });
  });
});

describe('detectContentType', () => {
  it('falls back to text for printable bytes', async () => {
    expect(await detectContentType(Buffer.from('hello world\n'))).toBe('text/plain; charset=utf-8');
  });

  it('falls back to octet-stream for control bytes', async () => {
    expect(await detectContentType(Buffer.from([0x01, 0x02, 0x03, 0x04]))).toBe('application/octet-stream');
  });
});
