import { EOL } from 'node:os';
import type { Logger } from 'pino';
import type { ExportRecord } from './domain/model/Record.js';
import type { Schema } from './domain/model/Schema.js';
import type { TypeOverrideTable } from './domain/model/TypeOverrides.js';
import type { ParseDiagnostic } from './domain/model/Diagnostic.js';
import type { ParseProgress } from './domain/model/Progress.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { RecordFinalizer } from './domain/ports/RecordFinalizer.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { EncodingStrategy } from './domain/services/LineDecoder.js';
import type { UnknownFieldPolicy } from './domain/services/ValueCoercer.js';
import type { FlattenMode } from './domain/services/FlattenPolicy.js';
import type { DerivedDateOptions } from './domain/services/DerivedDateHook.js';
import type { LineEnding } from './application/LineSplitter.js';
import { DEFAULT_TYPE_OVERRIDES } from './domain/model/TypeOverrides.js';
import { buildProgress } from './domain/model/Progress.js';
import { recordIrn } from './domain/model/Record.js';
import { LineDecoder } from './domain/services/LineDecoder.js';
import { FieldKeyResolver } from './domain/services/FieldKeyResolver.js';
import { ValueCoercer } from './domain/services/ValueCoercer.js';
import { DerivedDateHook } from './domain/services/DerivedDateHook.js';
import { EventBus } from './application/EventBus.js';
import { LineSplitter } from './application/LineSplitter.js';
import { RecordAssembler } from './application/RecordAssembler.js';
import { RecordParseError } from './errors/record-parse-error.js';
import { ParserStateError, SourceConsumedError } from './errors/state-errors.js';
import { defaultLogger } from './infrastructure/logger.js';

/** Configuration for a parse session. */
export interface KeExportParserConfig {
  /** Resolved schema of the module being parsed. Shared, never copied. */
  readonly schema: Schema;
  /** List flattening applied when a record is finalized. Default: `'single'`. */
  readonly flatten?: FlattenMode;
  /** How raw line bytes are decoded. Default: `'latin1-to-utf8'`. */
  readonly encodingStrategy?: EncodingStrategy;
  /** Consult the type override table before the schema. Default: `true`. */
  readonly useTypeOverrides?: boolean;
  /** Override table used when `useTypeOverrides` is on. Default: `DEFAULT_TYPE_OVERRIDES`. */
  readonly typeOverrides?: TypeOverrideTable;
  /** Handling of fields with no declared type. Default: `'skip'`. */
  readonly unknownFieldPolicy?: UnknownFieldPolicy;
  /** Turn numeric zero into `null` as well. Default: `false`. */
  readonly nullifyNumericZero?: boolean;
  /**
   * Add `ISODateInserted` from the insertion date and time fields. Pass an
   * options object to change the field names or formats. Default: `false`.
   */
  readonly deriveInsertDate?: boolean | DerivedDateOptions;
  /** Extra hooks run on each record after flattening and the derived date. */
  readonly finalizers?: readonly RecordFinalizer[];
  /** Line terminator of the export. Default: the platform's `EOL`. */
  readonly lineEnding?: LineEnding;
  /** Estimated number of lines in the input, used for `getProgress().percentage`. */
  readonly estimatedTotalLines?: number;
  /** Emit `parse:progress` every this many records. Default: `100`. */
  readonly progressInterval?: number;
  /** Logger for diagnostics. Default: the package logger. */
  readonly logger?: Logger;
}

/**
 * Streaming parser for KE EMu `KEY=VALUE` exports.
 *
 * One instance parses exactly one input, once. Records are produced lazily;
 * stopping early is always safe because a record is only exposed after its
 * terminator line.
 *
 * @example
 * ```typescript
 * const parser = new KeExportParser({ schema, flatten: 'all' });
 * parser.from(new FilePathSource('ecatalogue.export.gz'));
 * for await (const record of parser.records()) {
 *   await sink.write(record);
 * }
 * ```
 */
export class KeExportParser {
  private readonly assembler: RecordAssembler;
  private readonly eventBus: EventBus;
  private readonly logger: Logger;
  private readonly lineEnding: LineEnding;
  private readonly progressInterval: number;
  private estimatedTotalLines: number | null;
  private source: DataSource | null = null;
  private consumed = false;
  private diagnosticCount = 0;

  constructor(config: KeExportParserConfig) {
    this.logger = (config.logger ?? defaultLogger).child({ module: 'parser' });
    this.eventBus = new EventBus(this.logger);
    this.lineEnding = config.lineEnding ?? (EOL === '\r\n' ? '\r\n' : '\n');
    this.progressInterval = Math.max(1, config.progressInterval ?? 100);
    this.estimatedTotalLines = config.estimatedTotalLines ?? null;

    const report = (d: ParseDiagnostic): void => this.report(d);
    const useOverrides = config.useTypeOverrides ?? true;

    const finalizers: RecordFinalizer[] = [];
    if (config.deriveInsertDate) {
      finalizers.push(new DerivedDateHook(config.deriveInsertDate === true ? undefined : config.deriveInsertDate));
    }
    finalizers.push(...(config.finalizers ?? []));

    this.assembler = new RecordAssembler({
      decoder: new LineDecoder(config.encodingStrategy ?? 'latin1-to-utf8'),
      resolver: new FieldKeyResolver(config.schema),
      coercer: new ValueCoercer(config.schema, {
        typeOverrides: useOverrides ? (config.typeOverrides ?? DEFAULT_TYPE_OVERRIDES) : null,
        unknownFieldPolicy: config.unknownFieldPolicy ?? 'skip',
        nullifyNumericZero: config.nullifyNumericZero ?? false,
        report,
        logger: this.logger,
      }),
      flatten: config.flatten ?? 'single',
      finalizers,
      report,
      logger: this.logger,
    });
  }

  /** Set the data source. Returns `this` for chaining. */
  from(source: DataSource): this {
    if (this.consumed) {
      throw new ParserStateError('KeExportParser: cannot change the source after parsing started');
    }
    this.source = source;
    return this;
  }

  /** Subscribe to a parser event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /** Feed the externally computed line estimate used by `getProgress()`. */
  setEstimatedTotalLines(lines: number): void {
    this.estimatedTotalLines = lines;
  }

  getProgress(): ParseProgress {
    return buildProgress(this.assembler.linesConsumed, this.assembler.recordsProduced, this.estimatedTotalLines);
  }

  /**
   * Stream finalized records from the configured source.
   *
   * @throws ParserStateError if no source was configured.
   * @throws SourceConsumedError if the parser was already used.
   * @throws RecordParseError on a fatal condition in the input.
   */
  async *records(): AsyncIterable<ExportRecord> {
    const source = this.source;
    if (!source) {
      throw new ParserStateError('KeExportParser: no source configured. Call from() first.');
    }
    this.beginSession();

    const startedAt = Date.now();
    const splitter = new LineSplitter(this.lineEnding);
    try {
      for await (const chunk of source.read()) {
        yield* this.consumeLines(splitter.push(chunk));
      }
      yield* this.consumeLines(splitter.flush());
    } catch (error) {
      this.fail(error);
      throw error;
    }
    this.complete(startedAt);
  }

  /**
   * Parse a complete in-memory export synchronously.
   *
   * @throws SourceConsumedError if the parser was already used.
   * @throws RecordParseError on a fatal condition in the input.
   */
  *parse(data: string | Buffer): Iterable<ExportRecord> {
    this.beginSession();

    const startedAt = Date.now();
    const splitter = new LineSplitter(this.lineEnding);
    try {
      yield* this.consumeLines(splitter.push(data));
      yield* this.consumeLines(splitter.flush());
    } catch (error) {
      this.fail(error);
      throw error;
    }
    this.complete(startedAt);
  }

  private beginSession(): void {
    if (this.consumed) {
      throw new SourceConsumedError('KeExportParser');
    }
    this.consumed = true;
  }

  private *consumeLines(lines: Iterable<string | Buffer>): Iterable<ExportRecord> {
    for (const line of lines) {
      const record = this.assembler.consume(line);
      if (record) {
        this.published(record);
        yield record;
      }
    }
  }

  private published(record: ExportRecord): void {
    const produced = this.assembler.recordsProduced;
    this.eventBus.emit({
      type: 'record:parsed',
      recordIndex: produced - 1,
      irn: recordIrn(record),
      lineNumber: this.assembler.linesConsumed,
      timestamp: Date.now(),
    });

    if (produced % this.progressInterval === 0) {
      const progress = this.getProgress();
      this.logger.info(progress, 'Parse progress');
      this.eventBus.emit({ type: 'parse:progress', progress, timestamp: Date.now() });
    }
  }

  private report(d: ParseDiagnostic): void {
    this.diagnosticCount++;
    this.logger.warn(
      { code: d.code, line: d.lineNumber, irn: d.irn, field: d.field, value: d.value },
      d.irn !== undefined ? `Record ${String(d.irn)}: ${d.message}` : d.message,
    );
    this.eventBus.emit({ type: 'line:skipped', diagnostic: d, timestamp: Date.now() });
  }

  private complete(startedAt: number): void {
    this.assembler.finish();
    const summary = {
      linesConsumed: this.assembler.linesConsumed,
      recordsProduced: this.assembler.recordsProduced,
      diagnostics: this.diagnosticCount,
      elapsedMs: Date.now() - startedAt,
    };
    this.logger.info(summary, 'Parse completed');
    this.eventBus.emit({ type: 'parse:completed', summary, timestamp: Date.now() });
  }

  private fail(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    const location = error instanceof RecordParseError ? { lineNumber: error.lineNumber, irn: error.irn } : {};
    this.logger.error({ err: error, ...location }, 'Parse failed');
    this.eventBus.emit({ type: 'parse:failed', error: message, ...location, timestamp: Date.now() });
  }
}
