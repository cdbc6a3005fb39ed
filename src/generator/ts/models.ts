// generator/ts/models.ts
import { COUNT_SUFFIX } from "@/schema/extractor";
import type { FieldDescriptor, ModelSchema, SchemaMap, ValueObjectFieldDescriptor } from "@/schema/types";
import type { EmissionState } from "./emission-state.js";
import { parseImportReference } from "./imports.js";
import type { TsMember, TsPrinter } from "./printer.js";
import { interfaceName, type ReservedValueObject, type TypeMapper } from "./type-mapper.js";

export interface ModelInterfaceEmitterOptions {
   /** Field names rendered optional in every model. */
   nullableFields?: readonly string[];
   reserved?: ReservedValueObject;
}

/** One `I<Model>` interface per schema entry, members in field order. */
export class ModelInterfaceEmitter {
   private readonly nullableFields: readonly string[];

   constructor(
      private readonly state: EmissionState,
      private readonly mapper: TypeMapper,
      private readonly printer: TsPrinter,
      private readonly options: ModelInterfaceEmitterOptions = {},
   ) {
      this.nullableFields = options.nullableFields ?? [];
   }

   emitAll(schema: SchemaMap): string[] {
      const out: string[] = [];
      for (const model of schema.values()) {
         const chunk = this.emitOne(model);
         if (chunk !== undefined) out.push(chunk);
      }
      return out;
   }

   emitOne(model: ModelSchema): string | undefined {
      const name = interfaceName(model.name);
      if (!this.state.claim(name)) return undefined;

      const denyList = new Set([...this.nullableFields, ...(model.nullable ?? [])]);
      return this.printer.printInterface({
         name,
         members: model.fields.map((f) => this.member(f, denyList)),
      });
   }

   member(field: FieldDescriptor, denyList: ReadonlySet<string> = new Set(this.nullableFields)): TsMember {
      switch (field.kind) {
         case "value-object":
            return this.valueObjectMember(field);
         case "import":
            return {
               name: field.name,
               type: parseImportReference(field.declaredType).display,
               optional: this.isOptional(field, denyList),
            };
         case "relation":
            return {
               name: field.name,
               type: this.mapper.mapRelation(field.declaredType, field.relatedModel),
               optional: true,
            };
         case "scalar":
            return {
               name: field.name,
               type: field.source === "override" ? field.declaredType : this.mapper.mapColumn(field.declaredType),
               optional: this.isOptional(field, denyList),
            };
      }
   }

   /** Value-object members always admit null; `?` follows the nullable flag. */
   private valueObjectMember(field: ValueObjectFieldDescriptor): TsMember {
      const base = field.declaredType.replaceAll("[]", "");
      const reserved = this.options.reserved;
      const type =
         reserved?.name === base
            ? `${reserved.as}[]`
            : interfaceName(base) + (field.isArray ? "[]" : "");

      return { name: field.name, type: `${type} | null`, optional: field.nullable ?? false };
   }

   private isOptional(field: FieldDescriptor, denyList: ReadonlySet<string>): boolean {
      return field.kind === "relation" || field.name.endsWith(COUNT_SUFFIX) || denyList.has(field.name);
   }
}
