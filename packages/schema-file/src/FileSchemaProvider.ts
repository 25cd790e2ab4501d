import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { SchemaNotFoundError, defaultLogger, type Schema, type SchemaProvider } from '@keexport/core';
import { isSchema, parseSchemaDump } from './buildSchema.js';

export interface FileSchemaProviderOptions {
  /** YAML dump of the EMu schema file (`schema.yaml`). */
  readonly schemaFile: string;
  /** Directory holding one cached schema per module. Default: `'.keexport-schema'`. */
  readonly cacheDirectory?: string;
  readonly logger?: Logger;
}

/**
 * Schema provider backed by the YAML dump of the EMu schema.
 *
 * Built schemas are cached on disk as `{cacheDirectory}/{module}.json` and in
 * memory. A module missing from the cache triggers a rebuild of every module
 * in the dump; the rebuild is written out before the schema is returned so a
 * failed parse does not force another rebuild.
 *
 * Node.js only.
 */
export class FileSchemaProvider implements SchemaProvider {
  private readonly schemaFile: string;
  private readonly directory: string;
  private readonly logger: Logger;
  private readonly memory = new Map<string, Schema>();

  constructor(options: FileSchemaProviderOptions) {
    this.schemaFile = options.schemaFile;
    this.directory = options.cacheDirectory ?? '.keexport-schema';
    this.logger = (options.logger ?? defaultLogger).child({ module: 'schema' });
  }

  async resolve(module: string): Promise<Schema> {
    const cached = this.memory.get(module) ?? (await this.readCache(module));
    if (cached) {
      this.memory.set(module, cached);
      return cached;
    }

    const rebuilt = await this.rebuild();
    const schema = rebuilt.get(module);
    if (!schema) {
      throw new SchemaNotFoundError(module, `The schema dump ${this.schemaFile} has no entry for this module`);
    }
    return schema;
  }

  /** Rebuild every module from the schema dump and refresh the cache. Returns the built schemas. */
  async rebuild(): Promise<ReadonlyMap<string, Schema>> {
    this.logger.info({ schemaFile: this.schemaFile }, 'Rebuilding schema');

    // The dump is written in the export's single-byte encoding
    const content = await readFile(this.schemaFile, 'latin1');
    const schemas = parseSchemaDump(content);

    await mkdir(this.directory, { recursive: true });
    for (const [module, schema] of schemas) {
      this.logger.debug({ schemaModule: module }, 'Building schema');
      await writeFile(this.cacheFilePath(module), JSON.stringify(schema, null, 2), 'utf-8');
      this.memory.set(module, schema);
    }
    return schemas;
  }

  /** Delete the cache directory and forget schemas held in memory. */
  async clearCache(): Promise<void> {
    this.memory.clear();
    await rm(this.directory, { recursive: true, force: true });
  }

  private async readCache(module: string): Promise<Schema | null> {
    let content: string;
    try {
      content = await readFile(this.cacheFilePath(module), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isSchema(parsed)) {
      this.logger.warn({ schemaModule: module }, 'Ignoring malformed cached schema');
      return null;
    }
    return parsed;
  }

  private cacheFilePath(module: string): string {
    return join(this.directory, `${module}.json`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
