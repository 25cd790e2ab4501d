import { RecordParseError, type ParseErrorLocation } from './record-parse-error.js';

/** Thrown when a derived field cannot be computed from its source fields. */
export class DerivedFieldError extends RecordParseError {
  readonly field: string;

  constructor(field: string, reason: string, location: ParseErrorLocation) {
    super(`Cannot derive ${field}: ${reason}`, location, { code: 'DERIVED_FIELD' });
    this.name = 'DerivedFieldError';
    this.field = field;
  }
}
