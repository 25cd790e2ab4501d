import { format, isValid, parse } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import type { ExportRecord } from '../model/Record.js';
import type { FinalizeContext, RecordFinalizer } from '../ports/RecordFinalizer.js';
import { DerivedFieldError } from '../../errors/derived-field-error.js';

export interface DerivedDateOptions {
  /** Field that receives the combined timestamp. Default: `'ISODateInserted'`. */
  readonly targetField?: string;
  /** Text field holding the date. Default: `'AdmDateInserted'`. */
  readonly dateField?: string;
  /** Text field holding the time of day. Default: `'AdmTimeInserted'`. */
  readonly timeField?: string;
  /** date-fns pattern of `dateField`. Default: `'yyyy-MM-dd'`. */
  readonly dateFormat?: string;
  /** date-fns pattern of `timeField`. Default: `'HH:mm:ss'`. */
  readonly timeFormat?: string;
}

const ISO_LOCAL = "yyyy-MM-dd'T'HH:mm:ss";

/**
 * Combines the insertion date and time fields into a single ISO 8601 local
 * timestamp (`2012-03-15T14:30:05`). A record missing either source field,
 * or holding text that does not match the pattern, aborts the parse.
 */
export class DerivedDateHook implements RecordFinalizer {
  readonly name = 'derived-date';
  private readonly targetField: string;
  private readonly dateField: string;
  private readonly timeField: string;
  private readonly pattern: string;

  constructor(options?: DerivedDateOptions) {
    this.targetField = options?.targetField ?? 'ISODateInserted';
    this.dateField = options?.dateField ?? 'AdmDateInserted';
    this.timeField = options?.timeField ?? 'AdmTimeInserted';
    this.pattern = `${options?.dateFormat ?? 'yyyy-MM-dd'} ${options?.timeFormat ?? 'HH:mm:ss'}`;
  }

  finalize(record: ExportRecord, ctx: FinalizeContext): void {
    const date = this.sourceText(record, this.dateField, ctx);
    const time = this.sourceText(record, this.timeField, ctx);

    // A UTC reference keeps wall-clock times that fall in a DST gap of the host zone
    const parsed = parse(`${date} ${time}`, this.pattern, new UTCDate(0));
    if (!isValid(parsed)) {
      throw new DerivedFieldError(this.targetField, `"${date} ${time}" does not match "${this.pattern}"`, ctx);
    }

    record[this.targetField] = format(parsed, ISO_LOCAL);
  }

  private sourceText(record: ExportRecord, field: string, ctx: FinalizeContext): string {
    const value = record[field];
    if (typeof value !== 'string') {
      throw new DerivedFieldError(this.targetField, `source field ${field} is missing or not text`, ctx);
    }
    return value;
  }
}
