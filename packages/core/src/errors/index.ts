export { KeExportError } from './base.js';
export type { KeExportErrorCode } from './base.js';
export { RecordParseError } from './record-parse-error.js';
export type { ParseErrorLocation } from './record-parse-error.js';
export { UnknownFieldError } from './unknown-field-error.js';
export { DerivedFieldError } from './derived-field-error.js';
export { SchemaNotFoundError } from './schema-not-found-error.js';
export { SourceConsumedError, ParserStateError } from './state-errors.js';
