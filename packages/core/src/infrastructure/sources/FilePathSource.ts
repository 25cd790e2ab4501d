import { createReadStream } from 'node:fs';
import { createGunzip } from 'node:zlib';
import type { Readable } from 'node:stream';
import type { DataSource } from '../../domain/ports/DataSource.js';
import { isGzipPath } from '../gzip.js';

export interface FilePathSourceOptions {
  /** Decode chunks with this encoding. Default: unset, chunks are raw bytes decoded line by line. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
  /** Decompress while reading. Default: `'auto'` (gzip when the path ends in `.gz`). */
  readonly decompress?: 'auto' | 'gzip' | 'none';
}

/** Data source that streams a local export file, gunzipping `.gz` files on the fly. Node.js only. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding | undefined;
  private readonly highWaterMark: number;
  private readonly gzip: boolean;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding;
    this.highWaterMark = options?.highWaterMark ?? 65536;
    const decompress = options?.decompress ?? 'auto';
    this.gzip = decompress === 'gzip' || (decompress === 'auto' && isGzipPath(filePath));
  }

  async *read(): AsyncIterable<string | Buffer> {
    const stream: AsyncIterable<unknown> = this.open();
    for await (const chunk of stream) {
      if (typeof chunk === 'string') {
        yield chunk;
      } else if (Buffer.isBuffer(chunk)) {
        yield this.encoding ? chunk.toString(this.encoding) : chunk;
      }
    }
  }

  private open(): Readable {
    const file = createReadStream(this.filePath, { highWaterMark: this.highWaterMark });
    if (!this.gzip) return file;

    const gunzip = createGunzip();
    file.on('error', (error) => gunzip.destroy(error));
    return file.pipe(gunzip);
  }
}
