// schema/extractor.ts
import { isCollectionRelation } from "@/generator/ts/column-maps";
import { qualifiedName, snakeCase, type ModelDefinition } from "./definitions.js";
import type { CastTypeResolver } from "./cast.js";
import type { RelationshipResolver } from "./relationship.js";
import { hasField, type FieldDescriptor, type ImportField, type ScalarField } from "./types.js";

/** `"?field": type` (every model) or `Model: { field: type }`. */
export type CustomProps = Readonly<Record<string, string | Readonly<Record<string, string>>>>;

export const IMPORT_PREFIXES = ["@/", "~/", "./", "../"];

export const COUNT_SUFFIX = "_count";

export function isImportReference(value: string): boolean {
   return IMPORT_PREFIXES.some((prefix) => value.startsWith(prefix));
}

/** Field injected from configuration rather than discovered. */
export function overrideField(name: string, value: string): ScalarField | ImportField {
   return isImportReference(value)
      ? { kind: "import", name, declaredType: value }
      : { kind: "scalar", name, declaredType: value, source: "override" };
}

export function modelOverrides(props: CustomProps, modelName: string): Readonly<Record<string, string>> {
   const entry = Object.hasOwn(props, modelName) ? props[modelName] : undefined;
   return typeof entry === "object" ? entry : {};
}

export interface ExtractorOptions {
   withCounts?: boolean;
   customProps?: CustomProps;
}

/**
 * Builds one model's field list. Order is the emitted member order:
 * key, fillable attributes, timestamps, relations (+ counts), leftover
 * overrides. The first step to claim a name keeps it.
 */
export class TypeExtractor {
   private readonly withCounts: boolean;
   private readonly customProps: CustomProps;

   constructor(
      private readonly casts: CastTypeResolver,
      private readonly relations: RelationshipResolver,
      options: ExtractorOptions = {},
   ) {
      this.withCounts = options.withCounts ?? true;
      this.customProps = options.customProps ?? {};
   }

   extractTypes(model: ModelDefinition): FieldDescriptor[] {
      const overrides = modelOverrides(this.customProps, model.name);
      const fields: FieldDescriptor[] = [];
      const push = (field: FieldDescriptor) => {
         if (!hasField(fields, field.name)) fields.push(field);
      };

      // 1. primary key
      push({ kind: "scalar", name: model.primaryKey, declaredType: "number", source: "column" });

      // 2. fillable attributes
      for (const column of model.fillable) {
         if (Object.hasOwn(overrides, column)) {
            push(overrideField(column, overrides[column] ?? ""));
            continue;
         }

         const cast = Object.hasOwn(model.casts, column) ? model.casts[column] : undefined;
         if (cast === undefined) {
            push({ kind: "scalar", name: column, declaredType: "string", source: "column" });
            continue;
         }

         const structured = this.casts.resolve(cast, column);
         if (structured) {
            push(structured);
            continue;
         }

         const tag = typeof cast === "string" ? cast : qualifiedName(cast);
         push({ kind: "scalar", name: column, declaredType: tag, source: "column" });
      }

      // 3. timestamps
      if (model.timestamps) {
         for (const column of [model.timestamps.createdAt, model.timestamps.updatedAt]) {
            if (Object.hasOwn(overrides, column)) continue;
            push({
               kind: "scalar",
               name: column,
               declaredType: "string",
               source: "column",
               nullable: false,
            });
         }
      }

      // 4. relations
      for (const relation of this.relations.resolve(model)) {
         const name = snakeCase(relation.name);
         push({
            kind: "relation",
            name,
            declaredType: relation.kind,
            relatedModel: relation.relatedModel,
            ...(relation.pivot ? { pivotInfo: relation.pivot } : {}),
         });

         if (this.withCounts && isCollectionRelation(relation.kind)) {
            push({ kind: "scalar", name: name + COUNT_SUFFIX, declaredType: "number", source: "column" });
         }
      }

      // 5. leftover overrides
      for (const [name, value] of Object.entries(overrides)) {
         push(overrideField(name, value));
      }

      return fields;
   }
}
