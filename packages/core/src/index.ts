// Main entry point
export { KeExportParser } from './KeExportParser.js';
export type { KeExportParserConfig } from './KeExportParser.js';

// Domain model
export type { ExportRecord, FieldValue, RecordValue } from './domain/model/Record.js';
export { recordIrn } from './domain/model/Record.js';
export { FieldList } from './domain/model/FieldList.js';
export type { Schema, FieldDescriptor, DataType } from './domain/model/Schema.js';
export { hasColumn, columnType, isNumericType } from './domain/model/Schema.js';
export type { TypeOverrideTable } from './domain/model/TypeOverrides.js';
export { DEFAULT_TYPE_OVERRIDES } from './domain/model/TypeOverrides.js';
export type { ParseDiagnostic, DiagnosticCode, DiagnosticSink, LineContext } from './domain/model/Diagnostic.js';
export type { ParseProgress, ParseSummary } from './domain/model/Progress.js';

// Domain services (for building custom pipelines)
export { LineDecoder } from './domain/services/LineDecoder.js';
export type { EncodingStrategy } from './domain/services/LineDecoder.js';
export { FieldKeyResolver, UNKNOWN_ARRAY_SUFFIX, IRN_TOKEN } from './domain/services/FieldKeyResolver.js';
export type { FieldKey } from './domain/services/FieldKeyResolver.js';
export { ValueCoercer, parseNumber, coerceText } from './domain/services/ValueCoercer.js';
export type { ValueCoercerOptions, UnknownFieldPolicy, Coercion } from './domain/services/ValueCoercer.js';
export { flattenRecord, flattenValue, JOIN_SEPARATOR } from './domain/services/FlattenPolicy.js';
export type { FlattenMode } from './domain/services/FlattenPolicy.js';
export { DerivedDateHook } from './domain/services/DerivedDateHook.js';
export type { DerivedDateOptions } from './domain/services/DerivedDateHook.js';

// Application
export { RecordAssembler, RECORD_TERMINATOR } from './application/RecordAssembler.js';
export type { AssemblerState, RecordAssemblerDeps } from './application/RecordAssembler.js';
export { LineSplitter } from './application/LineSplitter.js';
export type { LineEnding } from './application/LineSplitter.js';
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource } from './domain/ports/DataSource.js';
export type { SchemaProvider } from './domain/ports/SchemaProvider.js';
export type { RecordFinalizer, FinalizeContext } from './domain/ports/RecordFinalizer.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  LineSkippedEvent,
  RecordParsedEvent,
  ParseProgressEvent,
  ParseCompletedEvent,
  ParseFailedEvent,
} from './domain/events/DomainEvents.js';

// Errors
export {
  KeExportError,
  RecordParseError,
  UnknownFieldError,
  DerivedFieldError,
  SchemaNotFoundError,
  SourceConsumedError,
  ParserStateError,
} from './errors/index.js';
export type { KeExportErrorCode, ParseErrorLocation } from './errors/index.js';

// Infrastructure adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { InMemorySchemaProvider } from './infrastructure/schema/InMemorySchemaProvider.js';
export { estimateTotalLines, countLines, DEFAULT_SAMPLE_BYTES } from './infrastructure/estimateTotalLines.js';
export type { EstimateOptions } from './infrastructure/estimateTotalLines.js';
export { gunzipPartial, isGzipPath } from './infrastructure/gzip.js';
export { moduleNameFromPath } from './infrastructure/moduleNameFromPath.js';
export { createLogger, defaultLogger } from './infrastructure/logger.js';
export type { LoggerOptions } from './infrastructure/logger.js';
