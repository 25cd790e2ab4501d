import type { DataType } from './Schema.js';

/** Field name → data type that replaces the schema's declared type. */
export type TypeOverrideTable = Readonly<Record<string, DataType>>;

/**
 * Date and time columns that some schema revisions declare as numeric while
 * the exports carry formatted text (`2013-04-02`, `09:15:00`).
 */
export const DEFAULT_TYPE_OVERRIDES: TypeOverrideTable = {
  AdmDateInserted: 'Text',
  AdmTimeInserted: 'Text',
  AdmDateModified: 'Text',
  AdmTimeModified: 'Text',
};
