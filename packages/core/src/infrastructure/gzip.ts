import { gunzipSync, constants as zlib } from 'node:zlib';

/** Return `true` when `filePath` names a gzip-compressed export. */
export function isGzipPath(filePath: string): boolean {
  return filePath.endsWith('.gz');
}

/**
 * Decompress the leading bytes of a gzip stream.
 *
 * The input may be cut anywhere: whatever inflates is returned and the
 * missing trailer (CRC and length) is not checked.
 */
export function gunzipPartial(compressed: Buffer): Buffer {
  if (compressed.length === 0) return compressed;
  return gunzipSync(compressed, { finishFlush: zlib.Z_SYNC_FLUSH });
}
