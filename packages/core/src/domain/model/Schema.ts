/**
 * Declared data type of a schema column.
 *
 * `Integer` and `Float` are coerced to numbers. Every other type, including
 * types the export dialect adds later, is treated as text.
 */
export type DataType = 'Integer' | 'Float' | 'Text' | 'Boolean' | (string & {});

/** Describes a single column of a module schema. */
export interface FieldDescriptor {
  /** Storage kind as reported by the schema (e.g. `'dkAtom'`, `'dkTable'`). */
  readonly dataKind: string;
  /** Declared data type used for coercion. */
  readonly dataType: DataType;
  /** Underlying database column name. */
  readonly columnName: string;
  /** For multi-value bases: the number of items the column holds. */
  readonly itemCount?: number;
}

/**
 * Field-type mapping for one module (table), keyed by the field name used in
 * the export files.
 */
export interface Schema {
  readonly columns: Readonly<Record<string, FieldDescriptor>>;
}

/** Return `true` when `field` is a column of `schema`. */
export function hasColumn(schema: Schema, field: string): boolean {
  return Object.hasOwn(schema.columns, field);
}

/** Look up the declared data type of `field`, or `undefined` if the schema has no such column. */
export function columnType(schema: Schema, field: string): DataType | undefined {
  return hasColumn(schema, field) ? schema.columns[field]?.dataType : undefined;
}

/** Return `true` for the data types that are coerced to numbers. */
export function isNumericType(type: DataType): type is 'Integer' | 'Float' {
  return type === 'Integer' || type === 'Float';
}
