import type { ExportRecord } from '../model/Record.js';

/** Position of the terminator line that closed the record. */
export interface FinalizeContext {
  readonly lineNumber: number;
  readonly irn?: number;
}

/**
 * Hook run on every record after flattening and before it is emitted.
 * Implementations may add derived fields to the record in place. Throwing
 * aborts the parse.
 */
export interface RecordFinalizer {
  readonly name: string;
  finalize(record: ExportRecord, ctx: FinalizeContext): void;
}
