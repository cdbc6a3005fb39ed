// schema/registry.ts
import {
   DEFAULT_VALUE_OBJECT_NAMESPACE,
   isCastDefinition,
   isDefinition,
   isModelDefinition,
   isValueObjectDefinition,
   qualifiedName,
   type Definition,
   type ValueObjectDefinition,
} from "./definitions.js";

/**
 * Index of every definition reachable from the loaded model sources,
 * keyed by qualified identifier (`<namespace>.<Name>`).
 *
 * Registration follows references: a model registers the casts it uses,
 * a cast registers its return type when given as a definition.
 */
export class ClassRegistry {
   private readonly byId = new Map<string, Definition>();

   constructor(readonly valueObjectNamespace: string = DEFAULT_VALUE_OBJECT_NAMESPACE) {}

   register(def: Definition): void {
      const id = qualifiedName(def);
      if (this.byId.has(id)) return;
      this.byId.set(id, def);

      if (isModelDefinition(def)) {
         for (const cast of Object.values(def.casts)) {
            if (isCastDefinition(cast)) this.register(cast);
         }
      } else if (isCastDefinition(def)) {
         const returns = def.get?.returns;
         if (isDefinition(returns)) this.register(returns);
      }
   }

   /** Register every branded value in a loaded module namespace. */
   registerModule(exports: Record<string, unknown>): void {
      for (const value of Object.values(exports)) {
         if (isDefinition(value)) this.register(value);
      }
   }

   get(identifier: string): Definition | undefined {
      return this.byId.get(identifier);
   }

   has(identifier: string): boolean {
      return this.byId.has(identifier);
   }

   /**
    * Resolve a possibly-short class name:
    *   1. already qualified (contains ".")
    *   2. the context namespace
    *   3. the conventional value-object namespace
    */
   resolve(name: string, contextNamespace?: string): Definition | undefined {
      const clean = name.trim().replace(/^\./, "");
      if (clean.includes(".")) return this.byId.get(clean);

      if (contextNamespace) {
         const local = this.byId.get(`${contextNamespace}.${clean}`);
         if (local) return local;
      }

      return this.byId.get(`${this.valueObjectNamespace}.${clean}`);
   }

   resolveValueObject(name: string, contextNamespace?: string): ValueObjectDefinition | undefined {
      const def = this.resolve(name, contextNamespace);
      return isValueObjectDefinition(def) ? def : undefined;
   }

   values(): Definition[] {
      return [...this.byId.values()];
   }
}
