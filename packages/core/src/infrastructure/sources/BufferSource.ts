import type { DataSource } from '../../domain/ports/DataSource.js';

/** Data source over an in-memory export. `Buffer` data is handed to the parser as raw bytes. */
export class BufferSource implements DataSource {
  private readonly content: string | Buffer;

  constructor(data: string | Buffer) {
    this.content = data;
  }

  async *read(): AsyncIterable<string | Buffer> {
    yield await Promise.resolve(this.content);
  }
}
