/** Machine-readable codes carried by every error the package throws. */
export type KeExportErrorCode =
  | 'RECORD_PARSE'
  | 'UNKNOWN_FIELD'
  | 'DERIVED_FIELD'
  | 'SCHEMA_NOT_FOUND'
  | 'SOURCE_CONSUMED'
  | 'PARSER_STATE';

/**
 * Base class for all errors thrown by the export parser and its collaborators.
 * Non-fatal conditions are reported as diagnostics and never use this type.
 */
export class KeExportError extends Error {
  readonly code: KeExportErrorCode;
  readonly hint?: string;

  constructor(code: KeExportErrorCode, message: string, options?: { hint?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'KeExportError';
    this.code = code;
    this.hint = options?.hint;
  }

  /** Message followed by the hint, when one is set. */
  format(): string {
    return this.hint ? `${this.message}\nhelp: ${this.hint}` : this.message;
  }
}
