// generator/ts/value-objects.ts
import type { DataObjectAnalyzer } from "@/schema/data-object";
import { isValueObjectDefinition } from "@/schema/definitions";
import { Diagnostics } from "@/schema/diagnostics";
import type { ClassRegistry } from "@/schema/registry";
import type { SchemaMap, ValueObjectField, ValueObjectFieldDescriptor } from "@/schema/types";
import type { EmissionState } from "./emission-state.js";
import type { TsPrinter } from "./printer.js";
import { interfaceName, type ReservedValueObject } from "./type-mapper.js";

export interface ValueObjectEmitterOptions {
   reserved?: ReservedValueObject;
}

/**
 * One interface per distinct value object: first those carried by model
 * fields, in schema order, then the nested ones their properties reference,
 * breadth first.
 */
export class ValueObjectEmitter {
   constructor(
      private readonly state: EmissionState,
      private readonly printer: TsPrinter,
      private readonly registry: ClassRegistry,
      private readonly analyzer: DataObjectAnalyzer,
      private readonly diagnostics: Diagnostics = new Diagnostics(),
      private readonly options: ValueObjectEmitterOptions = {},
   ) {}

   emitAll(schema: SchemaMap): string[] {
      const out: string[] = [];

      for (const model of schema.values()) {
         for (const field of model.fields) {
            if (field.kind === "value-object" && field.properties?.length) {
               this.emitOne(field, field.properties, out);
            }
         }
      }

      for (let id = this.state.dequeue(); id !== undefined; id = this.state.dequeue()) {
         this.emitNested(id, out);
      }

      return out;
   }

   private emitOne(field: ValueObjectFieldDescriptor, properties: ValueObjectField[], out: string[]): void {
      const base = field.declaredType.replaceAll("[]", "");
      const name = interfaceName(base);

      if (this.options.reserved?.name === base) {
         this.state.claim(name);
         return;
      }
      if (!this.state.claim(name)) return;

      out.push(this.render(name, properties));
   }

   private emitNested(identifier: string, out: string[]): void {
      const name = interfaceName(identifier);
      if (!this.state.claim(name)) return;

      const def = this.registry.get(identifier);
      if (!isValueObjectDefinition(def)) {
         this.diagnostics.skip(
            "value-object",
            identifier,
            def ? "referenced class is not a value object" : "referenced value object is not registered",
         );
         return;
      }

      out.push(this.render(name, this.analyzer.extractFields(def)));
   }

   private render(name: string, properties: ValueObjectField[]): string {
      for (const property of properties) {
         for (const ref of property.references) this.state.enqueue(ref);
      }

      return this.printer.printInterface({
         name,
         members: properties.map((p) => ({
            name: p.name,
            type: p.mappedType,
            optional: p.nullable || p.hasDefault,
         })),
      });
   }
}
