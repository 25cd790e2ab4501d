import type { Logger } from 'pino';
import type { FieldValue } from '../model/Record.js';
import type { DataType, Schema } from '../model/Schema.js';
import type { TypeOverrideTable } from '../model/TypeOverrides.js';
import type { DiagnosticSink, LineContext } from '../model/Diagnostic.js';
import { columnType, isNumericType } from '../model/Schema.js';
import { diagnostic } from '../model/Diagnostic.js';
import { UnknownFieldError } from '../../errors/unknown-field-error.js';

/** What to do with a field that has no declared type in the override table or the schema. */
export type UnknownFieldPolicy = 'raise' | 'skip';

export interface ValueCoercerOptions {
  /** Forced data types, consulted before the schema. `null` disables overrides. */
  readonly typeOverrides: TypeOverrideTable | null;
  readonly unknownFieldPolicy: UnknownFieldPolicy;
  /**
   * When `true`, a numeric field whose value parses to `0` becomes `null`,
   * the same as `"0"` on a text field. Default `false` keeps the number.
   */
  readonly nullifyNumericZero: boolean;
  readonly report: DiagnosticSink;
  readonly logger: Logger;
}

/** Outcome of coercing one field value. `skip` means the line contributes nothing to the record. */
export type Coercion = { readonly kind: 'value'; readonly value: FieldValue } | { readonly kind: 'skip' };

const INTEGER = /^\s*[+-]?\d+\s*$/;
const FLOAT = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/;
// Two bounds around a hyphen; a hyphen leading either bound is its sign
const RANGE = /^\s*([+-]?[^-]+?)\s*-\s*([+-]?[^-]+?)\s*$/;

/** Turns decoded text values into typed values according to the schema. */
export class ValueCoercer {
  private readonly schema: Schema;
  private readonly options: ValueCoercerOptions;

  constructor(schema: Schema, options: ValueCoercerOptions) {
    this.schema = schema;
    this.options = options;
  }

  /** Declared type of `field`: the override table wins over the schema. */
  resolveType(field: string): DataType | undefined {
    const overrides = this.options.typeOverrides;
    if (overrides && Object.hasOwn(overrides, field)) {
      return overrides[field];
    }
    return columnType(this.schema, field);
  }

  /**
   * Coerce `raw` for `field`.
   *
   * @throws UnknownFieldError when the field has no type and the policy is `'raise'`.
   */
  coerceField(field: string, raw: string, ctx: LineContext): Coercion {
    const type = this.resolveType(field);

    if (type === undefined) {
      if (this.options.unknownFieldPolicy === 'raise') {
        throw new UnknownFieldError(field, ctx);
      }
      this.options.report(diagnostic('UNKNOWN_FIELD', `Field ${field} not found in schema`, ctx, { field }));
      return { kind: 'skip' };
    }

    return { kind: 'value', value: this.coerce(field, type, raw, ctx) };
  }

  /** Coerce `raw` as a value of `type`. Never throws; unusable numbers become `null`. */
  coerce(field: string, type: DataType, raw: string, ctx: LineContext): FieldValue {
    if (raw === '') return null;

    if (isNumericType(type)) {
      const value = this.coerceNumber(field, type, raw, raw, ctx);
      return value === 0 && this.options.nullifyNumericZero ? null : value;
    }

    return coerceText(raw);
  }

  private coerceNumber(
    field: string,
    type: 'Integer' | 'Float',
    text: string,
    rawValue: string,
    ctx: LineContext,
  ): number | null {
    const parsed = parseNumber(type, text);
    if (parsed !== undefined) return parsed;

    // Legacy data holds ranges whose bounds are equal: "1966 - 1966"
    const range = RANGE.exec(text);
    const low = range?.[1]?.trim();
    if (low !== undefined && low === range?.[2]?.trim()) {
      this.options.logger.debug({ field, value: rawValue, line: ctx.lineNumber }, 'Collapsed legacy range value');
      return this.coerceNumber(field, type, low, rawValue, ctx);
    }

    this.options.report(
      diagnostic('NUMERIC_COERCION', `Cannot convert ${rawValue} to ${type} for field ${field}`, ctx, {
        field,
        value: rawValue,
      }),
    );
    return null;
  }
}

/** Parse `text` as a number of the given type, or return `undefined`. */
export function parseNumber(type: 'Integer' | 'Float', text: string): number | undefined {
  if (type === 'Integer') {
    return INTEGER.test(text) ? Number.parseInt(text.trim(), 10) : undefined;
  }
  return FLOAT.test(text) ? Number.parseFloat(text.trim()) : undefined;
}

/** Normalize a text-like value: yes/no flags become booleans and `"0"` becomes `null`. */
export function coerceText(raw: string): FieldValue {
  switch (raw) {
    case 'yes':
    case 'Yes':
      return true;
    case 'no':
    case 'No':
      return false;
    case '0':
      return null;
    default:
      return raw;
  }
}
