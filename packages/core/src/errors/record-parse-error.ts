import { KeExportError, type KeExportErrorCode } from './base.js';

/** Location of a fatal error in the input. */
export interface ParseErrorLocation {
  /** One-based line number. */
  readonly lineNumber: number;
  /** `irn` of the record in progress, when it had been read. */
  readonly irn?: number;
  /** The offending line, decoded as far as possible. */
  readonly line?: string;
}

/**
 * A fatal condition that aborts the current parse. Carries the offending line
 * number and, when known, the `irn` of the record being assembled.
 */
export class RecordParseError extends KeExportError {
  readonly lineNumber: number;
  readonly irn?: number;
  readonly line?: string;

  constructor(
    message: string,
    location: ParseErrorLocation,
    options?: { code?: KeExportErrorCode; hint?: string; cause?: unknown },
  ) {
    const line = `line ${String(location.lineNumber)}`;
    const where = location.irn !== undefined ? `record ${String(location.irn)}, ${line}` : line;
    super(options?.code ?? 'RECORD_PARSE', `${message} (${where})`, options);
    this.name = 'RecordParseError';
    this.lineNumber = location.lineNumber;
    this.irn = location.irn;
    this.line = location.line;
  }
}
