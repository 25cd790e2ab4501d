import { KeExportError } from './base.js';

/** Thrown by schema providers when a module has no schema. */
export class SchemaNotFoundError extends KeExportError {
  readonly module: string;

  constructor(module: string, hint?: string) {
    super('SCHEMA_NOT_FOUND', `No schema found for module ${module}`, { hint });
    this.name = 'SchemaNotFoundError';
    this.module = module;
  }
}
