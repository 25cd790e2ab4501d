import type { DataSource } from '../../domain/ports/DataSource.js';
import { SourceConsumedError } from '../../errors/state-errors.js';

export interface StreamSourceOptions {
  /** Decode `Buffer` chunks with this encoding. Default: unset, chunks stay raw bytes. */
  readonly encoding?: BufferEncoding;
}

/** Data source that wraps an `AsyncIterable` or `ReadableStream`, e.g. a decompression pipeline. Single read. */
export class StreamSource implements DataSource {
  private readonly stream: AsyncIterable<string | Buffer> | ReadableStream<string | Buffer>;
  private readonly encoding: BufferEncoding | undefined;
  private consumed = false;

  constructor(stream: AsyncIterable<string | Buffer> | ReadableStream<string | Buffer>, options?: StreamSourceOptions) {
    this.stream = stream;
    this.encoding = options?.encoding;
  }

  async *read(): AsyncIterable<string | Buffer> {
    if (this.consumed) {
      throw new SourceConsumedError('StreamSource');
    }
    this.consumed = true;

    const iterable = isReadableStream(this.stream) ? fromReadableStream(this.stream) : this.stream;

    for await (const chunk of iterable) {
      if (typeof chunk === 'string' || this.encoding === undefined) {
        yield chunk;
      } else {
        yield Buffer.from(chunk).toString(this.encoding);
      }
    }
  }
}

function isReadableStream(
  stream: AsyncIterable<string | Buffer> | ReadableStream<string | Buffer>,
): stream is ReadableStream<string | Buffer> {
  return 'getReader' in stream && typeof stream.getReader === 'function';
}

async function* fromReadableStream(stream: ReadableStream<string | Buffer>): AsyncIterable<string | Buffer> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
