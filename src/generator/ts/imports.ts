// generator/ts/imports.ts
import path from "node:path";
import type { SchemaMap } from "@/schema/types";
import type { TsImport } from "./printer.js";

export interface ImportReference {
   path: string;
   /** Name used at the field, `[]` kept: "Foo[]". */
   display: string;
   /** Name imported from the module: "Foo". */
   imported: string;
}

/**
 * "@/types/x|Foo" → { path: "@/types/x", display: "Foo" }
 * "@/types/Money" → { path: "@/types/Money", display: "Money" }
 */
export function parseImportReference(reference: string): ImportReference {
   const sep = reference.indexOf("|");
   const modulePath = sep === -1 ? reference : reference.slice(0, sep);
   const display = sep === -1 ? path.posix.basename(reference) : reference.slice(sep + 1);
   return { path: modulePath, display, imported: display.replaceAll("[]", "") };
}

/** Module path → imported names, both in first-seen order. */
export class ImportCollector {
   private readonly table = new Map<string, string[]>();

   collect(schema: SchemaMap): void {
      for (const model of schema.values()) {
         for (const field of model.fields) {
            if (field.kind === "import") this.add(field.declaredType);
         }
      }
   }

   add(reference: string): void {
      const { path: from, imported } = parseImportReference(reference);
      const names = this.table.get(from) ?? [];
      if (!names.includes(imported)) names.push(imported);
      this.table.set(from, names);
   }

   entries(): TsImport[] {
      return [...this.table].map(([from, types]) => ({ from, types: [...types] }));
   }

   get size(): number {
      return this.table.size;
   }
}
