// schema/cast.ts
import { NativeTypeMap } from "@/generator/ts/column-maps";
import {
   isCastDefinition,
   isDefinition,
   isValueObjectDefinition,
   qualifiedName,
   type CastDefinition,
   type CastTarget,
   type Definition,
   type ValueObjectDefinition,
} from "./definitions.js";
import type { DataObjectAnalyzer } from "./data-object.js";
import { describeError, Diagnostics, resolved, type Resolution, skipped } from "./diagnostics.js";
import type { ClassRegistry } from "./registry.js";
import type { ValueObjectFieldDescriptor } from "./types.js";

/** `@return array<int, TagData>` or `@return TagData[]` → "TagData" */
const ARRAY_RETURN_RE = /@return\s+(?:array<(?:[^,>]+,\s*)?([^>]+)>|([A-Za-z_][\w.]*)\[\])/;

const CLASS_NAME_RE = /^[A-Za-z_][\w.]*$/;

export function arrayItemFromDoc(doc: string | undefined): string | undefined {
   if (!doc) return undefined;
   const match = ARRAY_RETURN_RE.exec(doc);
   const item = match?.[1] ?? match?.[2];
   return item?.trim() || undefined;
}

/**
 * Turns a model attribute's cast into a value-object field when the cast's
 * `get` accessor returns a value object (or an array of them).
 *
 * `undefined` means "not a structured cast"; the caller falls back to the
 * plain column mapping. Casts that look custom but cannot be resolved are
 * reported to diagnostics before falling back.
 */
export class CastTypeResolver {
   constructor(
      private readonly analyzer: DataObjectAnalyzer,
      private readonly registry: ClassRegistry,
      private readonly diagnostics: Diagnostics = new Diagnostics(),
   ) {}

   resolve(target: CastTarget, field: string): ValueObjectFieldDescriptor | undefined {
      const cast = this.castClass(target);
      if (!cast) return undefined;

      const subject = `${qualifiedName(cast)}::${field}`;
      const result = this.fromAccessor(cast, field);
      if (result === undefined) return undefined;
      return this.diagnostics.take("cast", subject, result);
   }

   private castClass(target: CastTarget): CastDefinition | undefined {
      if (isCastDefinition(target)) return target;

      const name = target.trim();
      if (!name.includes(".") || !CLASS_NAME_RE.test(name)) return undefined;

      const def = this.registry.resolve(name);
      if (isCastDefinition(def)) return def;

      this.diagnostics.skip(
         "cast",
         name,
         def ? "registered class is not a cast" : "cast class is not registered",
      );
      return undefined;
   }

   /** `undefined` when the accessor returns a scalar. */
   private fromAccessor(
      cast: CastDefinition,
      field: string,
   ): Resolution<ValueObjectFieldDescriptor> | undefined {
      const returns = cast.get?.returns;
      if (returns === undefined) return skipped("get accessor declares no return type");

      let target: string | Definition;
      try {
         target = typeof returns === "function" ? returns() : returns;
      } catch (err) {
         return skipped(`return type thunk threw: ${describeError(err)}`);
      }

      if (isDefinition(target)) {
         if (!isValueObjectDefinition(target)) {
            return skipped(`return type ${qualifiedName(target)} is not a value object`);
         }
         return resolved(this.describe(target, field, cast.get?.nullable ?? false, false));
      }

      const optional = target.trim().startsWith("?");
      const typeName = target.trim().replace(/^\?/, "");
      const nullable = cast.get?.nullable ?? optional;

      if (typeName === "array") {
         const item = arrayItemFromDoc(cast.get?.doc);
         if (!item) return skipped("array return type has no @return array<key, Type> annotation");

         const vo = this.registry.resolveValueObject(item, cast.namespace);
         if (!vo) return skipped(`array item type ${item} is not a registered value object`);
         return resolved(this.describe(vo, field, nullable, true));
      }

      if (Object.hasOwn(NativeTypeMap, typeName) || !CLASS_NAME_RE.test(typeName)) {
         return undefined;
      }

      const def = this.registry.resolve(typeName, cast.namespace);
      if (!def) return skipped(`return type ${typeName} is not registered`);
      if (!isValueObjectDefinition(def)) {
         return skipped(`return type ${qualifiedName(def)} is not a value object`);
      }
      return resolved(this.describe(def, field, nullable, false));
   }

   private describe(
      vo: ValueObjectDefinition,
      field: string,
      nullable: boolean,
      isArray: boolean,
   ): ValueObjectFieldDescriptor {
      return {
         kind: "value-object",
         name: field,
         declaredType: isArray ? `${vo.name}[]` : vo.name,
         valueObjectType: qualifiedName(vo),
         properties: this.analyzer.extractFields(vo),
         nullable,
         ...(isArray ? { isArray: true } : {}),
      };
   }
}
