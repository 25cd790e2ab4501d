import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { KeExportParser, SchemaNotFoundError, createLogger } from '@keexport/core';
import { FileSchemaProvider } from '../../src/FileSchemaProvider.js';

const TEST_DIR = join(tmpdir(), 'keexport-test-schema-file');
const SCHEMA_FILE = fileURLToPath(new URL('../fixtures/schema.yaml', import.meta.url));
const silentLogger = createLogger({ level: 'silent' });

let cacheCounter = 0;

function freshCacheDirectory(): string {
  cacheCounter++;
  return join(TEST_DIR, `cache-${String(cacheCounter)}`);
}

function createProvider(cacheDirectory: string, schemaFile = SCHEMA_FILE): FileSchemaProvider {
  return new FileSchemaProvider({ schemaFile, cacheDirectory, logger: silentLogger });
}

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('FileSchemaProvider', () => {
  describe('resolve()', () => {
    it('should build the schema of a module from the dump', async () => {
      const schema = await createProvider(freshCacheDirectory()).resolve('ecatalogue');

      expect(Object.keys(schema.columns)).toEqual([
        'irn',
        'CatDisplayName',
        'SecCanDisplay',
        'AssRegistrationNumberRefLocal',
        'DarYearCollected',
        'AdmDateInserted',
        'AdmTimeInserted',
      ]);
      expect(schema.columns['AssRegistrationNumberRefLocal']).toEqual({
        dataKind: 'dkTable',
        dataType: 'Text',
        columnName: 'AssRegistrationNumberRefLocal0',
        itemCount: 3,
      });
    });

    it('should write every module to the cache directory', async () => {
      const cacheDirectory = freshCacheDirectory();

      await createProvider(cacheDirectory).resolve('eparties');

      expect(existsSync(join(cacheDirectory, 'ecatalogue.json'))).toBe(true);
      const cached: unknown = JSON.parse(readFileSync(join(cacheDirectory, 'eparties.json'), 'utf-8'));
      expect(cached).toEqual({
        columns: {
          irn: { dataKind: 'dkAtom', dataType: 'Integer', columnName: 'irn' },
          NamFullName: { dataKind: 'dkAtom', dataType: 'Text', columnName: 'NamFullName' },
          NamPartyType: { dataKind: 'dkAtom', dataType: 'Text', columnName: 'NamPartyType' },
        },
      });
    });

    it('should read cached schemas without the dump', async () => {
      const cacheDirectory = freshCacheDirectory();
      const built = await createProvider(cacheDirectory).resolve('eparties');

      const fromCache = await createProvider(cacheDirectory, join(TEST_DIR, 'missing.yaml')).resolve('eparties');

      expect(fromCache).toEqual(built);
    });

    it('should keep resolved schemas in memory', async () => {
      const cacheDirectory = freshCacheDirectory();
      const provider = createProvider(cacheDirectory);
      const first = await provider.resolve('ecatalogue');

      rmSync(cacheDirectory, { recursive: true, force: true });

      expect(await provider.resolve('ecatalogue')).toBe(first);
    });

    it('should rebuild when a cached schema is malformed', async () => {
      const cacheDirectory = freshCacheDirectory();
      mkdirSync(cacheDirectory, { recursive: true });
      writeFileSync(join(cacheDirectory, 'eparties.json'), '{"columns": 5}');

      const schema = await createProvider(cacheDirectory).resolve('eparties');

      expect(Object.keys(schema.columns)).toEqual(['irn', 'NamFullName', 'NamPartyType']);
      expect(readFileSync(join(cacheDirectory, 'eparties.json'), 'utf-8')).toContain('NamPartyType');
    });

    it('should reject a module missing from the dump', async () => {
      const provider = createProvider(freshCacheDirectory());

      await expect(provider.resolve('enarratives')).rejects.toThrow(SchemaNotFoundError);
      await expect(provider.resolve('enarratives')).rejects.toMatchObject({
        code: 'SCHEMA_NOT_FOUND',
        module: 'enarratives',
        hint: `The schema dump ${SCHEMA_FILE} has no entry for this module`,
      });
    });

    it('should reject when neither cache nor dump exist', async () => {
      const provider = createProvider(freshCacheDirectory(), join(TEST_DIR, 'missing.yaml'));
      await expect(provider.resolve('ecatalogue')).rejects.toThrow('ENOENT');
    });
  });

  describe('clearCache()', () => {
    it('should delete the cache directory', async () => {
      const cacheDirectory = freshCacheDirectory();
      const provider = createProvider(cacheDirectory);
      await provider.resolve('ecatalogue');

      await provider.clearCache();

      expect(existsSync(cacheDirectory)).toBe(false);
    });

    it('should forget schemas held in memory', async () => {
      const cacheDirectory = freshCacheDirectory();
      const provider = createProvider(cacheDirectory);
      const first = await provider.resolve('ecatalogue');

      await provider.clearCache();
      const second = await provider.resolve('ecatalogue');

      expect(second).not.toBe(first);
      expect(second).toEqual(first);
    });
  });

  it('should feed a parser end to end', async () => {
    const schema = await createProvider(freshCacheDirectory()).resolve('ecatalogue');
    const parser = new KeExportParser({ schema, lineEnding: '\n', logger: silentLogger });
    const text = [
      'rownum=1',
      'irn:1=42',
      'CatDisplayName=Granite',
      'SecCanDisplay:1=Public',
      'AssRegistrationNumberRefLocal0=R-1',
      'DarYearCollected=1966 - 1966',
      '###',
      '',
    ].join('\n');

    expect([...parser.parse(text)]).toEqual([
      {
        irn: 42,
        CatDisplayName: 'Granite',
        SecCanDisplay: 'Public',
        AssRegistrationNumberRefLocal: 'R-1',
        DarYearCollected: 1966,
      },
    ]);
  });
});
