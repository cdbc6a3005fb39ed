// schema/data-object.ts
import type { TypeMapper } from "@/generator/ts/type-mapper";
import { splitTopLevel } from "@/generator/ts/type-mapper";
import { UNKNOWN_TYPE } from "@/generator/ts/column-maps";
import {
   isValueObjectDefinition,
   type ParameterDefinition,
   type ValueObjectDefinition,
} from "./definitions.js";
import type { ValueObjectField } from "./types.js";

/** Whole `@param ...` line, up to the end of the line. */
const PARAM_LINE_RE = /@param[ \t]+([^\r\n]+)/g;

/**
 * Split `"<type> $<name> [description]"` into type and name.
 *
 * The type ends at the first whitespace outside brackets, so
 * `array<int, string> $tags` keeps its inner space. Spaces around `|`
 * stay part of the type. JSDoc style `{Type} name` is accepted too.
 */
export function splitParamAnnotation(text: string): { type: string; name: string } | undefined {
   const src = text.trim();
   let type = "";
   let rest = "";

   if (src.startsWith("{")) {
      let depth = 0;
      let end = -1;
      for (let i = 0; i < src.length; i++) {
         if (src[i] === "{") depth++;
         else if (src[i] === "}" && --depth === 0) {
            end = i;
            break;
         }
      }
      if (end === -1) return undefined;
      type = src.slice(1, end).trim();
      rest = src.slice(end + 1);
   } else {
      let depth = 0;
      let i = 0;
      for (; i < src.length; i++) {
         const ch = src.charAt(i);
         if (ch === "<" || ch === "(" || ch === "{") depth++;
         else if (ch === ">" || ch === ")" || ch === "}") depth--;
         else if (/\s/.test(ch) && depth === 0) {
            const next = src.slice(i).trimStart();
            if (type.trimEnd().endsWith("|") || next.startsWith("|")) {
               type += ch;
               continue;
            }
            break;
         }
         type += ch;
      }
      type = type.replace(/\s+/g, " ").trim();
      rest = src.slice(i);
   }

   const name = /^\s*\$?([A-Za-z_]\w*)/.exec(rest)?.[1];
   if (!type || !name) return undefined;
   return { type, name };
}

/**
 * Collect `@param` types from a constructor doc comment.
 *
 * First every full `@param` line is matched, then each line is split into
 * type and name; lines that do not split cleanly are ignored.
 */
export function parseParamAnnotations(doc: string | undefined): Map<string, string> {
   const types = new Map<string, string>();
   if (!doc) return types;

   for (const match of doc.matchAll(PARAM_LINE_RE)) {
      const parsed = splitParamAnnotation(match[1] ?? "");
      if (parsed) types.set(parsed.name, parsed.type);
   }

   return types;
}

/** Whether a native parameter type accepts null. Untyped parameters do. */
export function allowsNull(type: string | undefined): boolean {
   if (type === undefined) return true;
   const t = type.trim();
   if (t.startsWith("?") || t === "mixed" || t === "null") return true;
   return splitTopLevel(t, "|").includes("null");
}

export class DataObjectAnalyzer {
   constructor(private readonly mapper: TypeMapper) {}

   isValueObject(value: unknown): value is ValueObjectDefinition {
      return isValueObjectDefinition(value);
   }

   /**
    * One field per constructor parameter, in declaration order. A doc
    * annotation wins over the native type.
    */
   extractFields(def: ValueObjectDefinition): ValueObjectField[] {
      const docTypes = parseParamAnnotations(def.doc);
      return def.params.map((param) => this.toField(param, docTypes.get(param.name)));
   }

   private toField(param: ParameterDefinition, docType: string | undefined): ValueObjectField {
      const declared = docType ?? param.type;
      const mapped = declared
         ? this.mapper.mapWithReferences(declared)
         : { type: UNKNOWN_TYPE, references: [] };

      return {
         name: param.name,
         mappedType: mapped.type,
         nullable: param.nullable ?? allowsNull(param.type),
         hasDefault: Object.hasOwn(param, "default"),
         references: mapped.references,
      };
   }
}
