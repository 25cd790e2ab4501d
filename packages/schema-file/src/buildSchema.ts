import { parseAllDocuments } from 'yaml';
import type { FieldDescriptor, Schema } from '@keexport/core';

/** One column as written by the EMu schema dump. */
export interface RawColumnDefinition {
  readonly DataKind: string;
  readonly DataType: string;
  readonly ColumnName: string;
  /** Export key of single-value columns, when it differs from the column key. */
  readonly ItemName?: string;
  /** Export key of multi-value columns (`AssRegistrationNumberRefLocal` for `…Local0`, `…Local1`). */
  readonly ItemBase?: string;
  readonly ItemCount?: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

export function isRawColumnDefinition(value: unknown): value is RawColumnDefinition {
  return (
    isObject(value) &&
    typeof value['DataKind'] === 'string' &&
    typeof value['DataType'] === 'string' &&
    typeof value['ColumnName'] === 'string' &&
    isOptionalString(value['ItemName']) &&
    isOptionalString(value['ItemBase']) &&
    (value['ItemCount'] === undefined || typeof value['ItemCount'] === 'number')
  );
}

export function isFieldDescriptor(value: unknown): value is FieldDescriptor {
  return (
    isObject(value) &&
    typeof value['dataKind'] === 'string' &&
    typeof value['dataType'] === 'string' &&
    typeof value['columnName'] === 'string' &&
    (value['itemCount'] === undefined || typeof value['itemCount'] === 'number')
  );
}

export function isSchema(value: unknown): value is Schema {
  return isObject(value) && isObject(value['columns']) && Object.values(value['columns']).every(isFieldDescriptor);
}

/**
 * Build the parser schema of one module from its raw columns.
 *
 * Only the data kind, data type and column name are kept. Exports are keyed
 * by `ItemBase` for multi-value columns (which also carry `ItemCount`) and by
 * `ItemName` where present, not by the column key.
 *
 * @throws TypeError when a column definition is malformed.
 */
export function buildModuleSchema(module: string, rawColumns: unknown): Schema {
  if (!isObject(rawColumns)) {
    throw new TypeError(`Schema dump: module ${module} has no columns object`);
  }

  const columns: Record<string, FieldDescriptor> = {};
  for (const [key, definition] of Object.entries(rawColumns)) {
    if (!isRawColumnDefinition(definition)) {
      throw new TypeError(`Schema dump: column ${module}.${key} is malformed`);
    }

    const field = {
      dataKind: definition.DataKind,
      dataType: definition.DataType,
      columnName: definition.ColumnName,
    };

    if (definition.ItemBase !== undefined) {
      columns[definition.ItemBase] =
        definition.ItemCount !== undefined ? { ...field, itemCount: definition.ItemCount } : field;
    } else {
      columns[definition.ItemName ?? key] = field;
    }
  }

  return { columns };
}

/**
 * Build the schemas of every module from the documents of a schema dump.
 *
 * The dump alternates a module-name document with the `{ columns }` mapping
 * of that module.
 *
 * @throws TypeError when the documents do not pair up.
 */
export function buildSchemas(documents: Iterable<unknown>): Map<string, Schema> {
  const schemas = new Map<string, Schema>();
  let module: string | undefined;

  for (const document of documents) {
    if (typeof document === 'string') {
      if (module !== undefined) {
        throw new TypeError(`Schema dump: module ${module} has no definition`);
      }
      module = document;
      continue;
    }

    if (module === undefined) {
      throw new TypeError('Schema dump: expected a module name before each module definition');
    }
    if (!isObject(document)) {
      throw new TypeError(`Schema dump: module ${module} is not an object`);
    }
    schemas.set(module, buildModuleSchema(module, document['columns']));
    module = undefined;
  }

  if (module !== undefined) {
    throw new TypeError(`Schema dump: module ${module} has no definition`);
  }
  return schemas;
}

/**
 * Parse the YAML stream written by the EMu schema export and build every module.
 *
 * @throws TypeError when the stream is not valid YAML or does not pair up.
 */
export function parseSchemaDump(text: string): Map<string, Schema> {
  const documents: unknown[] = [];
  for (const document of parseAllDocuments(text)) {
    const [error] = document.errors;
    if (error) {
      throw new TypeError(`Schema dump: ${error.message}`, { cause: error });
    }
    const value: unknown = document.toJS();
    documents.push(value);
  }
  return buildSchemas(documents);
}
