import type { Schema } from '../../domain/model/Schema.js';
import type { SchemaProvider } from '../../domain/ports/SchemaProvider.js';
import { SchemaNotFoundError } from '../../errors/schema-not-found-error.js';

/** Schema provider over schemas already held in memory, keyed by module name. */
export class InMemorySchemaProvider implements SchemaProvider {
  private readonly schemas = new Map<string, Schema>();

  constructor(schemas?: Readonly<Record<string, Schema>>) {
    for (const [module, schema] of Object.entries(schemas ?? {})) {
      this.schemas.set(module, schema);
    }
  }

  /** Register or replace the schema of `module`. */
  register(module: string, schema: Schema): this {
    this.schemas.set(module, schema);
    return this;
  }

  resolve(module: string): Promise<Schema> {
    const schema = this.schemas.get(module);
    if (!schema) {
      return Promise.reject(new SchemaNotFoundError(module));
    }
    return Promise.resolve(schema);
  }
}
