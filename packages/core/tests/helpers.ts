import type { Schema } from '../src/domain/model/Schema.js';
import type { ParseDiagnostic } from '../src/domain/model/Diagnostic.js';
import type { FlattenMode } from '../src/domain/services/FlattenPolicy.js';
import type { UnknownFieldPolicy } from '../src/domain/services/ValueCoercer.js';
import type { RecordFinalizer } from '../src/domain/ports/RecordFinalizer.js';
import type { EncodingStrategy } from '../src/domain/services/LineDecoder.js';
import type { ExportRecord } from '../src/domain/model/Record.js';
import { RecordAssembler } from '../src/application/RecordAssembler.js';
import { KeExportParser, type KeExportParserConfig } from '../src/KeExportParser.js';
import { FieldKeyResolver } from '../src/domain/services/FieldKeyResolver.js';
import { ValueCoercer } from '../src/domain/services/ValueCoercer.js';
import { LineDecoder } from '../src/domain/services/LineDecoder.js';
import { DEFAULT_TYPE_OVERRIDES } from '../src/domain/model/TypeOverrides.js';
import { createLogger } from '../src/infrastructure/logger.js';

export const silentLogger = createLogger({ level: 'silent' });

function text(columnName: string, dataKind = 'dkAtom') {
  return { dataKind, dataType: 'Text', columnName };
}

export const catalogueSchema: Schema = {
  columns: {
    irn: { dataKind: 'dkAtom', dataType: 'Integer', columnName: 'irn' },
    CatDisplayName: text('CatDisplayName'),
    CatKindOfObject: text('CatKindOfObject'),
    CatPublished: { dataKind: 'dkAtom', dataType: 'Boolean', columnName: 'CatPublished' },
    SecCanDisplay: text('SecCanDisplay_tab', 'dkTable'),
    DarYearCollected: { dataKind: 'dkAtom', dataType: 'Integer', columnName: 'DarYearCollected' },
    DarLatitude: { dataKind: 'dkAtom', dataType: 'Float', columnName: 'DarLatitude' },
    AssRegistrationNumberRefLocal: { ...text('AssRegistrationNumberRefLocal0', 'dkTable'), itemCount: 3 },
    EntIdeScientificNameLocal_tab: text('EntIdeScientificNameLocal_tab', 'dkTable'),
    AdmDateInserted: { dataKind: 'dkAtom', dataType: 'Date', columnName: 'AdmDateInserted' },
    AdmTimeInserted: { dataKind: 'dkAtom', dataType: 'Time', columnName: 'AdmTimeInserted' },
    AdmDateModified: { dataKind: 'dkAtom', dataType: 'Integer', columnName: 'AdmDateModified' },
  },
};

/** Join lines into an export body, one line per entry, newline-terminated. */
export function exportText(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}

export interface AssemblerHarnessOptions {
  readonly schema?: Schema;
  readonly flatten?: FlattenMode;
  readonly unknownFieldPolicy?: UnknownFieldPolicy;
  readonly encodingStrategy?: EncodingStrategy;
  readonly finalizers?: readonly RecordFinalizer[];
}

/** Build a `RecordAssembler` wired to real services, collecting diagnostics into an array. */
export function createAssembler(options?: AssemblerHarnessOptions): {
  assembler: RecordAssembler;
  diagnostics: ParseDiagnostic[];
} {
  const schema = options?.schema ?? catalogueSchema;
  const diagnostics: ParseDiagnostic[] = [];
  const report = (d: ParseDiagnostic): void => {
    diagnostics.push(d);
  };

  const assembler = new RecordAssembler({
    decoder: new LineDecoder(options?.encodingStrategy ?? 'latin1-to-utf8'),
    resolver: new FieldKeyResolver(schema),
    coercer: new ValueCoercer(schema, {
      typeOverrides: DEFAULT_TYPE_OVERRIDES,
      unknownFieldPolicy: options?.unknownFieldPolicy ?? 'skip',
      nullifyNumericZero: false,
      report,
      logger: silentLogger,
    }),
    flatten: options?.flatten ?? 'single',
    finalizers: options?.finalizers ?? [],
    report,
    logger: silentLogger,
  });

  return { assembler, diagnostics };
}

/** Parser over the catalogue schema with a silent logger and LF line endings. */
export function createParser(config?: Partial<KeExportParserConfig>): KeExportParser {
  return new KeExportParser({
    schema: catalogueSchema,
    lineEnding: '\n',
    logger: silentLogger,
    ...config,
  });
}

export async function collectRecords(records: AsyncIterable<ExportRecord>): Promise<ExportRecord[]> {
  const out: ExportRecord[] = [];
  for await (const record of records) {
    out.push(record);
  }
  return out;
}
