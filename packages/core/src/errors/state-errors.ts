import { KeExportError } from './base.js';

/** Thrown when a single-pass source or parser is read a second time. */
export class SourceConsumedError extends KeExportError {
  constructor(what: string) {
    super('SOURCE_CONSUMED', `${what}: input has already been consumed. Exports can only be read once.`);
    this.name = 'SourceConsumedError';
  }
}

/** Thrown when an operation is not allowed in the current parser state. */
export class ParserStateError extends KeExportError {
  constructor(message: string) {
    super('PARSER_STATE', message);
    this.name = 'ParserStateError';
  }
}
