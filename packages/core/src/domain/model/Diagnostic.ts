/** Codes for non-fatal conditions reported while parsing. */
export type DiagnosticCode =
  | 'EMPTY_LINE'
  | 'MALFORMED_LINE'
  | 'MALFORMED_INDEX'
  | 'NUMERIC_COERCION'
  | 'UNKNOWN_FIELD'
  | 'RECORD_DISCARDED';

/** A non-fatal parse condition. Diagnostics are logged and published, never thrown. */
export interface ParseDiagnostic {
  /** Machine-readable code. */
  readonly code: DiagnosticCode;
  /** Human-readable description. */
  readonly message: string;
  /** One-based number of the line that triggered the diagnostic. */
  readonly lineNumber: number;
  /** `irn` of the record in progress, when it has been read already. */
  readonly irn?: number;
  /** Canonical field name involved, if any. */
  readonly field?: string;
  /** Raw value that could not be used, if any. */
  readonly value?: string;
}

/** Where a line sits in the input, passed down to services that report diagnostics. */
export interface LineContext {
  readonly lineNumber: number;
  readonly irn?: number;
  readonly line: string;
}

/** Callback that receives non-fatal diagnostics. */
export type DiagnosticSink = (diagnostic: ParseDiagnostic) => void;

/** Build a diagnostic for the given line, copying the line's `irn` when known. */
export function diagnostic(
  code: DiagnosticCode,
  message: string,
  ctx: LineContext,
  extra?: { readonly field?: string; readonly value?: string },
): ParseDiagnostic {
  return {
    code,
    message,
    lineNumber: ctx.lineNumber,
    ...(ctx.irn !== undefined ? { irn: ctx.irn } : {}),
    ...(extra?.field !== undefined ? { field: extra.field } : {}),
    ...(extra?.value !== undefined ? { value: extra.value } : {}),
  };
}
