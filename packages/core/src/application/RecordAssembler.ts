import type { Logger } from 'pino';
import type { ExportRecord, FieldValue, RecordValue } from '../domain/model/Record.js';
import type { DiagnosticSink, LineContext } from '../domain/model/Diagnostic.js';
import type { RecordFinalizer } from '../domain/ports/RecordFinalizer.js';
import type { FieldKeyResolver } from '../domain/services/FieldKeyResolver.js';
import type { ValueCoercer } from '../domain/services/ValueCoercer.js';
import type { LineDecoder } from '../domain/services/LineDecoder.js';
import type { FlattenMode } from '../domain/services/FlattenPolicy.js';
import { FieldList } from '../domain/model/FieldList.js';
import { diagnostic } from '../domain/model/Diagnostic.js';
import { flattenRecord } from '../domain/services/FlattenPolicy.js';
import { RecordParseError } from '../errors/record-parse-error.js';
import { ParserStateError } from '../errors/state-errors.js';

/** Marker line that closes a record. */
export const RECORD_TERMINATOR = '###';

const INTEGER = /^\s*[+-]?\d+\s*$/;

/**
 * - `AwaitingLine`: the record in progress is empty.
 * - `InRecord`: at least one field has been read into the record in progress.
 * - `RecordComplete`: the terminator was seen and the record is being finalized.
 * - `Exhausted`: the input ended; no more lines are accepted.
 */
export type AssemblerState = 'AwaitingLine' | 'InRecord' | 'RecordComplete' | 'Exhausted';

export interface RecordAssemblerDeps {
  readonly decoder: LineDecoder;
  readonly resolver: FieldKeyResolver;
  readonly coercer: ValueCoercer;
  readonly flatten: FlattenMode;
  readonly finalizers: readonly RecordFinalizer[];
  readonly report: DiagnosticSink;
  readonly logger: Logger;
}

/**
 * Line-by-line state machine that builds one record at a time.
 *
 * `consume()` takes one line (terminator removed) and returns the finalized
 * record when the line closes it. Non-fatal conditions go to the diagnostic
 * sink; fatal ones throw a `RecordParseError`.
 */
export class RecordAssembler {
  private readonly deps: RecordAssemblerDeps;
  private current = new Map<string, FieldValue | FieldList>();
  private currentIrn: number | undefined;
  private _state: AssemblerState = 'AwaitingLine';
  private _linesConsumed = 0;
  private _recordsProduced = 0;

  constructor(deps: RecordAssemblerDeps) {
    this.deps = deps;
  }

  get state(): AssemblerState {
    return this._state;
  }

  get linesConsumed(): number {
    return this._linesConsumed;
  }

  get recordsProduced(): number {
    return this._recordsProduced;
  }

  /**
   * Consume one line.
   *
   * @returns the finalized record when `line` is the terminator, otherwise `null`.
   * @throws RecordParseError on a fatal condition.
   */
  consume(line: string | Buffer): ExportRecord | null {
    if (this._state === 'Exhausted') {
      throw new ParserStateError('RecordAssembler: input already ended');
    }

    this._linesConsumed++;
    const text = typeof line === 'string' ? line : this.deps.decoder.decode(line);
    if (text === '') return null;

    if (text === RECORD_TERMINATOR) {
      return this.complete();
    }

    const ctx: LineContext = { lineNumber: this._linesConsumed, irn: this.currentIrn, line: text };
    const eq = text.indexOf('=');
    if (eq === -1) {
      this.reportNoValue(ctx);
      return null;
    }

    this.assign(text.slice(0, eq), text.slice(eq + 1), ctx);
    return null;
  }

  /** Mark the input as ended. A record without a terminator is discarded. */
  finish(): void {
    if (this._state === 'Exhausted') return;

    if (this.current.size > 0) {
      const ctx = { lineNumber: this._linesConsumed, irn: this.currentIrn, line: '' };
      this.deps.report(
        diagnostic('RECORD_DISCARDED', 'Input ended before the record terminator; partial record discarded', ctx),
      );
    }
    this.reset();
    this._state = 'Exhausted';
  }

  private reportNoValue(ctx: LineContext): void {
    if (ctx.line.trim() === '') {
      this.deps.report(diagnostic('EMPTY_LINE', `Empty line on ${String(ctx.lineNumber)}`, ctx));
    } else {
      this.deps.report(
        diagnostic('MALFORMED_LINE', `Malformed key=value ${ctx.line} on line ${String(ctx.lineNumber)}`, ctx),
      );
    }
  }

  private assign(token: string, raw: string, ctx: LineContext): void {
    const key = this.deps.resolver.resolve(token);

    switch (key.kind) {
      case 'skip':
        if (key.reason === 'malformed-index') {
          this.deps.report(
            diagnostic('MALFORMED_INDEX', `Malformed key=value ${ctx.line} on line ${String(ctx.lineNumber)}`, ctx, {
              ...(key.field !== undefined ? { field: key.field } : {}),
              value: raw,
            }),
          );
        }
        return;

      case 'irn':
        if (!INTEGER.test(raw)) {
          throw new RecordParseError(`Invalid irn value "${raw}"`, ctx);
        }
        this.currentIrn = Number.parseInt(raw.trim(), 10);
        this.set('irn', this.currentIrn);
        return;

      case 'field': {
        const coercion = this.deps.coercer.coerceField(key.field, raw, ctx);
        if (coercion.kind === 'skip') return;
        if (key.index === undefined) {
          this.set(key.field, coercion.value);
        } else {
          this.setIndexed(key.field, key.index, coercion.value, ctx);
        }
      }
    }
  }

  private set(field: string, value: FieldValue): void {
    this.current.set(field, value);
    this._state = 'InRecord';
  }

  private setIndexed(field: string, index: number, value: FieldValue, ctx: LineContext): void {
    let list = this.current.get(field);
    if (list === undefined) {
      list = new FieldList();
      this.current.set(field, list);
    } else if (!(list instanceof FieldList)) {
      throw new RecordParseError(
        `Field ${field} already holds a single value and cannot take index ${String(index + 1)}`,
        ctx,
      );
    }
    list.set(index, value);
    this._state = 'InRecord';
  }

  private complete(): ExportRecord {
    this._state = 'RecordComplete';
    const ctx = { lineNumber: this._linesConsumed, irn: this.currentIrn };

    const record: ExportRecord = {};
    for (const [field, value] of this.current) {
      const plain: RecordValue = value instanceof FieldList ? value.toArray() : value;
      record[field] = plain;
    }

    flattenRecord(record, this.deps.flatten);
    for (const finalizer of this.deps.finalizers) {
      finalizer.finalize(record, ctx);
    }

    this._recordsProduced++;
    this.reset();
    return record;
  }

  private reset(): void {
    this.current = new Map();
    this.currentIrn = undefined;
    this._state = 'AwaitingLine';
  }
}
