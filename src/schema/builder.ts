// schema/builder.ts
import type { ModelDiscovery } from "./discovery.js";
import { overrideField, type CustomProps, type TypeExtractor } from "./extractor.js";
import { hasField, type ModelSchema, type SchemaMap } from "./types.js";

/**
 * discover → extract → global overrides → per-model overrides.
 *
 * Each override pass only adds names still missing, so a field given both
 * globally and per model keeps the global type.
 */
export class SchemaBuilder {
   constructor(
      private readonly discovery: ModelDiscovery,
      private readonly extractor: TypeExtractor,
      private readonly customProps: CustomProps = {},
   ) {}

   async build(): Promise<SchemaMap> {
      const schema: SchemaMap = new Map();

      for (const model of await this.discovery.discover()) {
         const entry: ModelSchema = {
            name: model.name,
            qualifiedIdentifier: model.qualifiedIdentifier,
            fields: this.extractor.extractTypes(model.definition),
         };
         if (model.definition.nullable.length) entry.nullable = [...model.definition.nullable];
         schema.set(model.name, entry);
      }

      this.applyGlobalOverrides(schema);
      this.applyModelOverrides(schema);
      return schema;
   }

   private applyGlobalOverrides(schema: SchemaMap): void {
      for (const [key, value] of Object.entries(this.customProps)) {
         if (!key.includes("?") || typeof value !== "string") continue;
         const field = key.replaceAll("?", "");

         for (const model of schema.values()) {
            if (!hasField(model.fields, field)) model.fields.push(overrideField(field, value));
         }
      }
   }

   private applyModelOverrides(schema: SchemaMap): void {
      for (const [key, value] of Object.entries(this.customProps)) {
         if (key.includes("?") || typeof value === "string") continue;

         const model = schema.get(key);
         if (!model) continue;

         for (const [field, type] of Object.entries(value)) {
            if (!hasField(model.fields, field)) model.fields.push(overrideField(field, type));
         }
      }
   }
}
