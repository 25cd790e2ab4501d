export { FileSchemaProvider } from './FileSchemaProvider.js';
export type { FileSchemaProviderOptions } from './FileSchemaProvider.js';
export { parseSchemaDump, buildSchemas, buildModuleSchema, isSchema, isFieldDescriptor, isRawColumnDefinition } from './buildSchema.js';
export type { RawColumnDefinition } from './buildSchema.js';
