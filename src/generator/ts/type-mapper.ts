// generator/ts/type-mapper.ts
import { shortName, type RelationKind } from "@/schema/definitions";
import {
   COLLECTION_RELATIONS,
   ColumnTypeMap,
   NativeTypeMap,
   SINGLE_RELATIONS,
   UNKNOWN_TYPE,
} from "./column-maps.js";

export const INTERFACE_PREFIX = "I";

export interface ReservedValueObject {
   /** Value-object short name that never gets its own interface. */
   name: string;
   /** Interface emitted in its place. */
   as: string;
}

export interface TypeMapperOptions {
   /** Resolve a type name to a value object's qualified identifier. */
   resolveValueObject?: (name: string) => string | undefined;
   reserved?: ReservedValueObject;
}

export interface MappedType {
   type: string;
   /** Qualified identifiers of value objects met while mapping. */
   references: string[];
}

const OPEN = new Set(["<", "(", "{"]);
const CLOSE = new Set([">", ")", "}"]);

/**
 * Split on a separator that sits outside any `<...>`, `(...)` or `{...}`.
 *
 *   splitTopLevel("string|array<int, string>|null", "|")
 *     → ["string", "array<int, string>", "null"]
 */
export function splitTopLevel(type: string, separator: string): string[] {
   const parts: string[] = [];
   let current = "";
   let depth = 0;

   for (const ch of type) {
      if (OPEN.has(ch)) depth++;
      else if (CLOSE.has(ch)) depth--;

      if (ch === separator && depth === 0) {
         if (current.trim() !== "") parts.push(current.trim());
         current = "";
         continue;
      }
      current += ch;
   }

   if (current.trim() !== "") parts.push(current.trim());
   return parts;
}

function lookup(table: Readonly<Record<string, string>>, key: string): string | undefined {
   return Object.hasOwn(table, key) ? table[key] : undefined;
}

/** "(A|B)" → "A|B" when the outer parens wrap the whole text. */
function unwrapParens(type: string): string | undefined {
   if (!type.startsWith("(") || !type.endsWith(")")) return undefined;
   let depth = 0;
   for (let i = 0; i < type.length; i++) {
      if (type[i] === "(") depth++;
      else if (type[i] === ")") depth--;
      if (depth === 0 && i < type.length - 1) return undefined;
   }
   return type.slice(1, -1);
}

/**
 * Declared type descriptors (doc-comment / native / cast tags) → TypeScript.
 *
 * Total: anything it cannot read becomes `unknown`. Null branches are
 * dropped from unions; nullability travels on the optional marker.
 */
export class TypeMapper {
   constructor(private readonly options: TypeMapperOptions = {}) {}

   map(descriptor: string): string {
      return this.convert(descriptor, new Set());
   }

   mapWithReferences(descriptor: string): MappedType {
      const refs = new Set<string>();
      const type = this.convert(descriptor, refs);
      return { type, references: [...refs] };
   }

   /** Model cast tag → TS ("decimal:2" → "number"). */
   mapColumn(tag: string): string {
      const [base = "", ...rest] = tag.trim().split(":");
      const param = rest.join(":");
      if (base === "encrypted" && param) return this.mapColumn(param);
      return lookup(ColumnTypeMap, base) ?? UNKNOWN_TYPE;
   }

   mapRelation(kind: RelationKind, relatedModel?: string): string {
      if (!relatedModel) return UNKNOWN_TYPE;
      const name = interfaceName(relatedModel);
      if (COLLECTION_RELATIONS.has(kind)) return `${name}[]`;
      if (SINGLE_RELATIONS.has(kind)) return name;
      return UNKNOWN_TYPE;
   }

   // ---------------------------------------------------------------------------

   private convert(descriptor: string, refs: Set<string>): string {
      const type = descriptor.trim();
      if (!type) return UNKNOWN_TYPE;

      // ?string → string; null is carried out-of-band
      if (type.startsWith("?")) return this.convert(type.slice(1), refs);

      const branches = splitTopLevel(type, "|");
      if (branches.length > 1) {
         const mapped = new Set<string>();
         for (const branch of branches) {
            if (branch === "null") continue;
            mapped.add(this.convert(branch, refs));
         }
         return mapped.size ? [...mapped].join(" | ") : UNKNOWN_TYPE;
      }

      return this.convertSingle(type, refs);
   }

   private convertSingle(type: string, refs: Set<string>): string {
      const generic = /^array\s*<([\s\S]*)>$/.exec(type);
      if (generic) {
         const args = splitTopLevel(generic[1] ?? "", ",");
         const [first = "", second = ""] = args;

         if (args.length === 1) return this.arrayOf(first, refs);
         if (args.length === 2 && first === "string") return this.recordOf(second, refs);
         if (args.length === 2 && (first === "int" || first === "integer")) {
            return this.arrayOf(second, refs);
         }
         return "unknown[]";
      }

      if (type.endsWith("[]")) return this.arrayOf(type.slice(0, -2), refs);

      const inner = unwrapParens(type);
      if (inner !== undefined) return this.convert(inner, refs);

      return this.valueObjectRef(type, refs) ?? lookup(NativeTypeMap, type) ?? UNKNOWN_TYPE;
   }

   private recordOf(valueType: string, refs: Set<string>): string {
      const value = valueType.trim();
      if (value === "mixed") return "Record<string, unknown>";
      return `Record<string, ${this.convert(value, refs)}>`;
   }

   private arrayOf(itemType: string, refs: Set<string>): string {
      const item = this.convert(itemType, refs);
      return splitTopLevel(item, "|").length > 1 ? `(${item})[]` : `${item}[]`;
   }

   private valueObjectRef(type: string, refs: Set<string>): string | undefined {
      if (!/^[A-Za-z_][\w.]*$/.test(type)) return undefined;

      const { reserved, resolveValueObject } = this.options;
      if (reserved && shortName(type) === reserved.name) return reserved.as;

      const id = resolveValueObject?.(type);
      if (!id) return undefined;

      refs.add(id);
      return interfaceName(type);
   }
}

/** "DataObjects.AddressData" → "IAddressData" */
export function interfaceName(identifier: string): string {
   return INTERFACE_PREFIX + shortName(identifier);
}
