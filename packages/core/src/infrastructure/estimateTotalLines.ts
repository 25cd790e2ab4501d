import { open } from 'node:fs/promises';
import { gunzipPartial, isGzipPath } from './gzip.js';

export interface EstimateOptions {
  /** Number of leading (compressed) bytes to sample. Default: 1,000,000. */
  readonly sampleBytes?: number;
  /** Treat the file as gzip. Default: by `.gz` extension. */
  readonly gzip?: boolean;
}

export const DEFAULT_SAMPLE_BYTES = 1_000_000;

/**
 * Estimate the number of lines in an export from a leading sample.
 *
 * Counts the lines in the first `sampleBytes` of the file (inflated for gzip
 * files) and scales by the file size: `floor(fileSize * sampleLines / bytesSampled)`.
 */
export async function estimateTotalLines(filePath: string, options?: EstimateOptions): Promise<number> {
  const sampleBytes = options?.sampleBytes ?? DEFAULT_SAMPLE_BYTES;
  const gzip = options?.gzip ?? isGzipPath(filePath);

  const handle = await open(filePath, 'r');
  let fileSize: number;
  let sample: Buffer;
  try {
    fileSize = (await handle.stat()).size;
    const buffer = Buffer.alloc(Math.min(sampleBytes, fileSize));
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
    sample = buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }

  if (sample.length === 0) return 0;

  const lines = countLines(gzip ? gunzipPartial(sample) : sample);
  return Math.floor((fileSize * lines) / sample.length);
}

/** Count lines the way a line reader would: a trailing unterminated line counts as one. */
export function countLines(data: Buffer): number {
  if (data.length === 0) return 0;

  let lines = 0;
  let at = data.indexOf(0x0a);
  while (at !== -1) {
    lines++;
    at = data.indexOf(0x0a, at + 1);
  }
  return data[data.length - 1] === 0x0a ? lines : lines + 1;
}
