// generator/ts/generator.ts
import type { DataObjectAnalyzer } from "@/schema/data-object";
import { Diagnostics } from "@/schema/diagnostics";
import type { ClassRegistry } from "@/schema/registry";
import type { SchemaMap } from "@/schema/types";
import { EmissionState } from "./emission-state.js";
import { AuxiliaryInterfaceEmitter, JSON_LD_RESERVED } from "./json-ld.js";
import { ModelInterfaceEmitter } from "./models.js";
import { formatTimestamp, TsPrinter } from "./printer.js";
import type { TypeMapper } from "./type-mapper.js";
import { ValueObjectEmitter } from "./value-objects.js";

export interface InterfaceGeneratorOptions {
   withJsonLd?: boolean;
   nullableFields?: readonly string[];
   regenerateCommand?: string;
   /** Source of the `@generated` timestamp. */
   clock?: () => Date;
   diagnostics?: Diagnostics;
   printer?: TsPrinter;
}

export const DEFAULT_REGENERATE_COMMAND = "model-ts gen";

/**
 * header → imports → value objects → models → JSON-LD node (optional).
 *
 * Every call starts from a fresh emission state, so the same schema gives
 * the same text apart from the timestamp.
 */
export class InterfaceGenerator {
   private readonly printer: TsPrinter;
   private readonly diagnostics: Diagnostics;
   private readonly clock: () => Date;

   constructor(
      private readonly registry: ClassRegistry,
      private readonly analyzer: DataObjectAnalyzer,
      private readonly mapper: TypeMapper,
      private readonly options: InterfaceGeneratorOptions = {},
   ) {
      this.printer = options.printer ?? new TsPrinter();
      this.diagnostics = options.diagnostics ?? new Diagnostics();
      this.clock = options.clock ?? (() => new Date());
   }

   generate(schema: SchemaMap): string {
      const state = new EmissionState();
      const withJsonLd = this.options.withJsonLd ?? false;
      const reserved = withJsonLd ? JSON_LD_RESERVED : undefined;

      const chunks = [
         this.printer.printHeader(
            this.options.regenerateCommand ?? DEFAULT_REGENERATE_COMMAND,
            formatTimestamp(this.clock()),
         ),
      ];

      state.imports.collect(schema);
      const imports = this.printer.printImports(state.imports.entries());
      if (imports) chunks.push(imports);

      const valueObjects = new ValueObjectEmitter(
         state,
         this.printer,
         this.registry,
         this.analyzer,
         this.diagnostics,
         { reserved },
      );
      chunks.push(...valueObjects.emitAll(schema));

      const models = new ModelInterfaceEmitter(state, this.mapper, this.printer, {
         nullableFields: this.options.nullableFields,
         reserved,
      });
      chunks.push(...models.emitAll(schema));

      if (withJsonLd) chunks.push(new AuxiliaryInterfaceEmitter(this.printer).emit());

      return chunks.join("\n\n") + "\n";
   }
}
