import { RecordParseError, type ParseErrorLocation } from './record-parse-error.js';

/** Thrown for a field with no declared type when `unknownFieldPolicy` is `'raise'`. */
export class UnknownFieldError extends RecordParseError {
  readonly field: string;

  constructor(field: string, location: ParseErrorLocation) {
    super(`Field ${field} not found in schema`, location, {
      code: 'UNKNOWN_FIELD',
      hint: "Rebuild the schema for this module, or set unknownFieldPolicy to 'skip'",
    });
    this.name = 'UnknownFieldError';
    this.field = field;
  }
}
