/** A single scalar value after coercion. */
export type FieldValue = null | boolean | number | string;

/** The value of one field in a finalized record: a scalar or an ordered list of scalars. */
export type RecordValue = FieldValue | FieldValue[];

/**
 * A finalized record as emitted by the parser.
 *
 * Keys keep the order in which fields first appeared in the export block.
 * Once emitted, the record belongs to the caller and is never touched again
 * by the parser.
 */
export interface ExportRecord {
  [field: string]: RecordValue;
}

/** Read the numeric `irn` of a record, or `undefined` when it is absent or not a number. */
export function recordIrn(record: ExportRecord): number | undefined {
  const irn = record['irn'];
  return typeof irn === 'number' ? irn : undefined;
}
