import type { ExportRecord, FieldValue, RecordValue } from '../model/Record.js';

/**
 * How list values are reduced when a record is finalized.
 *
 * - `none`: every list stays a list, even with a single element.
 * - `single`: one-element lists collapse to that element; longer lists stay lists.
 * - `all`: one-element lists collapse; longer lists are joined with `"; "`.
 */
export type FlattenMode = 'none' | 'single' | 'all';

export const JOIN_SEPARATOR = '; ';

/** Apply `mode` to every list-valued field of `record`, in place. Scalar fields are untouched. */
export function flattenRecord(record: ExportRecord, mode: FlattenMode): ExportRecord {
  if (mode === 'none') return record;

  for (const [field, value] of Object.entries(record)) {
    if (Array.isArray(value)) {
      record[field] = flattenValue(value, mode);
    }
  }
  return record;
}

export function flattenValue(values: FieldValue[], mode: FlattenMode): RecordValue {
  if (mode === 'none') return values;
  if (values.length === 1) return values[0] ?? null;
  if (mode === 'single') return values;
  return values.map(joinable).join(JOIN_SEPARATOR);
}

function joinable(value: FieldValue): string {
  return value === null ? '' : String(value);
}
