import type { ParseDiagnostic } from '../model/Diagnostic.js';
import type { ParseProgress, ParseSummary } from '../model/Progress.js';

/** Emitted for every non-fatal condition (skipped line, unusable value, discarded record). */
export interface LineSkippedEvent {
  readonly type: 'line:skipped';
  readonly diagnostic: ParseDiagnostic;
  readonly timestamp: number;
}

/** Emitted for each record that is finalized and handed to the caller. */
export interface RecordParsedEvent {
  readonly type: 'record:parsed';
  /** Zero-based position of the record in the export. */
  readonly recordIndex: number;
  readonly irn?: number;
  /** Line number of the terminator that closed the record. */
  readonly lineNumber: number;
  readonly timestamp: number;
}

/** Emitted every `progressInterval` records. */
export interface ParseProgressEvent {
  readonly type: 'parse:progress';
  readonly progress: ParseProgress;
  readonly timestamp: number;
}

/** Emitted when the input is exhausted. */
export interface ParseCompletedEvent {
  readonly type: 'parse:completed';
  readonly summary: ParseSummary;
  readonly timestamp: number;
}

/** Emitted when a fatal error aborts the parse. */
export interface ParseFailedEvent {
  readonly type: 'parse:failed';
  readonly error: string;
  readonly lineNumber?: number;
  readonly irn?: number;
  readonly timestamp: number;
}

export type DomainEvent =
  | LineSkippedEvent
  | RecordParsedEvent
  | ParseProgressEvent
  | ParseCompletedEvent
  | ParseFailedEvent;

export type EventType = DomainEvent['type'];

/** Extract the payload type for a given event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
