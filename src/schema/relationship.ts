// schema/relationship.ts
import {
   isModelDefinition,
   qualifiedName,
   type ModelDefinition,
   type ModelRef,
   type PivotOptions,
   type RelationDeclaration,
   type RelationKind,
} from "./definitions.js";
import { describeError, Diagnostics, resolved, type Resolution, skipped } from "./diagnostics.js";
import type { PivotInfo, RelationInfo } from "./types.js";

const PIVOT_RELATIONS: ReadonlySet<RelationKind> = new Set<RelationKind>([
   "BelongsToMany",
   "MorphToMany",
   "MorphedByMany",
]);

export const DEFAULT_PIVOT_ACCESSOR = "pivot";
export const DEFAULT_PIVOT_CLASS = "Pivot";

function deref(ref: ModelRef): Resolution<ModelDefinition> {
   let target: unknown;
   try {
      target = typeof ref === "function" ? ref() : ref;
   } catch (err) {
      return skipped(`related model thunk threw: ${describeError(err)}`);
   }
   return isModelDefinition(target)
      ? resolved(target)
      : skipped("related target is not a model definition");
}

/**
 * Reads a model's declared relations table, in declaration order.
 *
 * A relation whose target cannot be resolved is skipped (and reported)
 * so the remaining relations of the model still come through.
 */
export class RelationshipResolver {
   constructor(private readonly diagnostics: Diagnostics = new Diagnostics()) {}

   resolve(model: ModelDefinition): RelationInfo[] {
      const relations: RelationInfo[] = [];

      for (const [name, declaration] of Object.entries(model.relations)) {
         const subject = `${qualifiedName(model)}::${name}`;
         const info = this.diagnostics.take("relationship", subject, this.describe(name, declaration));
         if (info) relations.push(info);
      }

      return relations;
   }

   private describe(name: string, declaration: RelationDeclaration): Resolution<RelationInfo> {
      const { kind, related } = declaration;
      if (kind === "MorphTo") return resolved({ name, kind });
      if (!related) return skipped(`${kind} relation declares no related model`);

      const target = deref(related);
      if (!target.ok) return target;

      const info: RelationInfo = { name, kind, relatedModel: qualifiedName(target.value) };
      if (PIVOT_RELATIONS.has(kind)) {
         const pivot = this.pivot(declaration.pivot ?? {});
         if (!pivot.ok) return pivot;
         info.pivot = pivot.value;
      }
      return resolved(info);
   }

   /** Pivot columns: explicit ones first, then the custom pivot model's fillable. */
   private pivot(options: PivotOptions): Resolution<PivotInfo> {
      const accessor = options.accessor ?? DEFAULT_PIVOT_ACCESSOR;
      const columns = new Set(options.columns ?? []);

      if (!options.using) return resolved({ accessor, class: DEFAULT_PIVOT_CLASS, columns: [...columns] });

      const using = deref(options.using);
      if (!using.ok) return skipped(`pivot model: ${using.reason}`);
      for (const column of using.value.fillable) columns.add(column);

      return resolved({ accessor, class: qualifiedName(using.value), columns: [...columns] });
   }
}
