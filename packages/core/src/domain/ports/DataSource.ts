/**
 * Port for reading export data from any origin (file, buffer, stream).
 *
 * `read()` yields chunks with no regard for line boundaries. `Buffer` chunks
 * carry raw bytes that the parser decodes line by line; `string` chunks are
 * taken as already-decoded text.
 */
export interface DataSource {
  /** Yield data chunks for lazy/streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
}
