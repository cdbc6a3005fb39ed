// src/index.ts

// Model-side declarations
export {
   defineModel,
   defineCast,
   defineValueObject,
   hasOne,
   hasMany,
   belongsTo,
   belongsToMany,
   morphOne,
   morphMany,
   morphTo,
   morphToMany,
   morphedByMany,
   hasOneThrough,
   hasManyThrough,
} from "./schema/definitions.js";
export type * from "./schema/definitions.js";
export type * from "./schema/types.js";

// Configuration
export { defineConfig, loadConfig, resolveConfig, ConfigError } from "./utils/config.js";
export type { UserConfig, GeneratorConfig } from "./utils/config.js";

// Pipelines
export { ClassRegistry } from "./schema/registry.js";
export { Diagnostics, type Diagnostic } from "./schema/diagnostics.js";
export { SchemaBuilder } from "./schema/builder.js";
export { TypeExtractor } from "./schema/extractor.js";
export { ModelDiscovery } from "./schema/discovery.js";
export { TypeMapper } from "./generator/ts/type-mapper.js";
export { InterfaceGenerator } from "./generator/ts/generator.js";
export { TsPrinter } from "./generator/ts/printer.js";
export { generateTypes, createPipeline, type GenerateResult } from "./generator/ts/index.js";
