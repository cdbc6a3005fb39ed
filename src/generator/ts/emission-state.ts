// generator/ts/emission-state.ts
import { ImportCollector } from "./imports.js";
import { interfaceName } from "./type-mapper.js";

/**
 * Mutable state of one generation run: which interfaces exist already,
 * which value objects still wait for emission, and the import table.
 */
export class EmissionState {
   readonly imports = new ImportCollector();
   private readonly processed = new Set<string>();
   private readonly pending: string[] = [];

   isProcessed(name: string): boolean {
      return this.processed.has(name);
   }

   /** Returns false when the interface was already claimed. */
   claim(name: string): boolean {
      if (this.isProcessed(name)) return false;
      this.processed.add(name);
      return true;
   }

   /** Queue a value object by qualified identifier. */
   enqueue(identifier: string): void {
      if (this.isProcessed(interfaceName(identifier)) || this.pending.includes(identifier)) return;
      this.pending.push(identifier);
   }

   dequeue(): string | undefined {
      return this.pending.shift();
   }
}
