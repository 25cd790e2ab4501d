import { describe, it, expect } from 'vitest';
import {
  buildModuleSchema,
  buildSchemas,
  parseSchemaDump,
  isSchema,
  isRawColumnDefinition,
} from '../../src/buildSchema.js';

describe('buildModuleSchema', () => {
  it('should key single-value columns by ItemName', () => {
    const schema = buildModuleSchema('ecatalogue', {
      SecCanDisplay_tab: {
        DataKind: 'dkTable',
        DataType: 'Text',
        ColumnName: 'SecCanDisplay_tab',
        ItemName: 'SecCanDisplay',
      },
    });

    expect(schema).toEqual({
      columns: { SecCanDisplay: { dataKind: 'dkTable', dataType: 'Text', columnName: 'SecCanDisplay_tab' } },
    });
  });

  it('should key multi-value columns by ItemBase and keep ItemCount', () => {
    const schema = buildModuleSchema('ecatalogue', {
      AssRegistrationNumberRefLocal0: {
        DataKind: 'dkTable',
        DataType: 'Text',
        ColumnName: 'AssRegistrationNumberRefLocal0',
        ItemBase: 'AssRegistrationNumberRefLocal',
        ItemCount: 3,
        ItemName: 'ignored',
      },
    });

    expect(schema.columns).toEqual({
      AssRegistrationNumberRefLocal: {
        dataKind: 'dkTable',
        dataType: 'Text',
        columnName: 'AssRegistrationNumberRefLocal0',
        itemCount: 3,
      },
    });
  });

  it('should fall back to the column key', () => {
    const schema = buildModuleSchema('eparties', {
      NamFullName: { DataKind: 'dkAtom', DataType: 'Text', ColumnName: 'NamFullName' },
    });

    expect(Object.keys(schema.columns)).toEqual(['NamFullName']);
  });

  it('should reject a malformed column', () => {
    expect(() => buildModuleSchema('eparties', { NamFullName: { DataKind: 'dkAtom' } })).toThrow(
      'Schema dump: column eparties.NamFullName is malformed',
    );
  });

  it('should reject a module without columns', () => {
    expect(() => buildModuleSchema('eparties', undefined)).toThrow(
      'Schema dump: module eparties has no columns object',
    );
  });
});

describe('buildSchemas', () => {
  it('should pair each module name with the definition that follows it', () => {
    const schemas = buildSchemas([
      'ecatalogue',
      { columns: { irn: { DataKind: 'dkAtom', DataType: 'Integer', ColumnName: 'irn' } } },
      'eparties',
      { columns: {} },
    ]);

    expect([...schemas.keys()]).toEqual(['ecatalogue', 'eparties']);
    expect(schemas.get('eparties')).toEqual({ columns: {} });
  });

  it('should reject a definition without a module name', () => {
    expect(() => buildSchemas([{ columns: {} }])).toThrow(
      'Schema dump: expected a module name before each module definition',
    );
  });

  it('should reject a module name without a definition', () => {
    expect(() => buildSchemas(['ecatalogue', 'eparties', { columns: {} }])).toThrow(
      'Schema dump: module ecatalogue has no definition',
    );
    expect(() => buildSchemas(['eparties'])).toThrow('Schema dump: module eparties has no definition');
  });

  it('should reject a definition that is not a mapping', () => {
    expect(() => buildSchemas(['ecatalogue', ['x']])).toThrow('Schema dump: module ecatalogue is not an object');
  });
});

describe('parseSchemaDump', () => {
  it('should read the alternating name and columns documents of a YAML stream', () => {
    const text = [
      '--- eparties',
      '---',
      'columns:',
      '  NamFullName_tab:',
      '    ColumnName: NamFullName_tab',
      '    DataKind: dkTable',
      '    DataType: Text',
      '    ItemName: NamFullName',
      '  NamRoles0:',
      '    ColumnName: NamRoles0',
      '    DataKind: dkTable',
      '    DataType: Text',
      '    ItemBase: NamRoles',
      '    ItemCount: 2',
      'table: eparties',
      '',
    ].join('\n');

    expect(Object.fromEntries(parseSchemaDump(text))).toEqual({
      eparties: {
        columns: {
          NamFullName: { dataKind: 'dkTable', dataType: 'Text', columnName: 'NamFullName_tab' },
          NamRoles: { dataKind: 'dkTable', dataType: 'Text', columnName: 'NamRoles0', itemCount: 2 },
        },
      },
    });
  });

  it('should return no modules for an empty stream', () => {
    expect(parseSchemaDump('').size).toBe(0);
  });

  it('should reject text that is not YAML', () => {
    expect(() => parseSchemaDump('--- eparties\n--- [unclosed\n')).toThrow(/^Schema dump: /);
  });
});

describe('type guards', () => {
  it('should recognise built schemas', () => {
    expect(isSchema({ columns: { irn: { dataKind: 'dkAtom', dataType: 'Integer', columnName: 'irn' } } })).toBe(true);
    expect(isSchema({ columns: { irn: { dataKind: 'dkAtom' } } })).toBe(false);
    expect(isSchema({ columns: 5 })).toBe(false);
  });

  it('should reject raw columns with a non-numeric ItemCount', () => {
    const column = { DataKind: 'dkTable', DataType: 'Text', ColumnName: 'x', ItemCount: '3' };
    expect(isRawColumnDefinition(column)).toBe(false);
  });
});
