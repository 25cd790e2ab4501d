/** Running counters of one parse session, for external progress reporting. */
export interface ParseProgress {
  readonly linesConsumed: number;
  readonly recordsProduced: number;
  /** Estimated total number of lines, supplied by the caller. `null` when unknown. */
  readonly estimatedTotalLines: number | null;
  /** `linesConsumed / estimatedTotalLines` as a percentage (capped at 100), or `null` without an estimate. */
  readonly percentage: number | null;
}

/** Final counters emitted with the `parse:completed` event. */
export interface ParseSummary {
  readonly linesConsumed: number;
  readonly recordsProduced: number;
  readonly diagnostics: number;
  readonly elapsedMs: number;
}

export function buildProgress(
  linesConsumed: number,
  recordsProduced: number,
  estimatedTotalLines: number | null,
): ParseProgress {
  const percentage =
    estimatedTotalLines !== null && estimatedTotalLines > 0
      ? Math.min(100, (linesConsumed / estimatedTotalLines) * 100)
      : null;

  return { linesConsumed, recordsProduced, estimatedTotalLines, percentage };
}
