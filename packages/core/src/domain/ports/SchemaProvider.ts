import type { Schema } from '../model/Schema.js';

/**
 * Port for resolving a module (table) name to its field-type schema.
 *
 * How schemas are built and cached is up to the implementation. The parser
 * only ever receives an already-resolved `Schema`.
 */
export interface SchemaProvider {
  /**
   * Resolve the schema of `module`.
   *
   * @throws SchemaNotFoundError when the module is unknown.
   */
  resolve(module: string): Promise<Schema>;
}
