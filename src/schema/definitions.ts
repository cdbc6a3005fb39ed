// schema/definitions.ts

/**
 * Brand carried by every definition the generator understands.
 *
 * `Symbol.for` keeps the brand stable across module instances, so a model
 * file loaded from disk and the generator agree on it even when they
 * resolve this package through different paths.
 */
export const DEFINITION_KIND = Symbol.for("model-ts.definition");

export const DEFAULT_MODEL_NAMESPACE = "Models";
export const DEFAULT_CAST_NAMESPACE = "Casts";
export const DEFAULT_VALUE_OBJECT_NAMESPACE = "DataObjects";

/* ----------------------------- Relations ------------------------------ */

export type RelationKind =
   | "HasOne"
   | "HasMany"
   | "BelongsTo"
   | "BelongsToMany"
   | "MorphOne"
   | "MorphMany"
   | "MorphTo"
   | "MorphToMany"
   | "MorphedByMany"
   | "HasOneThrough"
   | "HasManyThrough";

/** A related model, or a thunk returning one (for cyclic imports). */
export type ModelRef = ModelDefinition | (() => ModelDefinition);

export interface PivotOptions {
   /** Attribute the pivot record is exposed under. Default: "pivot". */
   accessor?: string;
   /** Custom pivot model; its fillable list contributes pivot columns. */
   using?: ModelRef;
   /** Extra pivot columns (withPivot). */
   columns?: string[];
}

export interface RelationDeclaration {
   kind: RelationKind;
   /** Absent only for MorphTo, whose target varies per row. */
   related?: ModelRef;
   pivot?: PivotOptions;
}

const relation =
   (kind: RelationKind) =>
   (related: ModelRef): RelationDeclaration => ({ kind, related });

const manyToMany =
   (kind: RelationKind) =>
   (related: ModelRef, options: { pivot?: PivotOptions } = {}): RelationDeclaration => ({
      kind,
      related,
      pivot: options.pivot ?? {},
   });

export const hasOne = relation("HasOne");
export const hasMany = relation("HasMany");
export const belongsTo = relation("BelongsTo");
export const morphOne = relation("MorphOne");
export const morphMany = relation("MorphMany");
export const hasOneThrough = relation("HasOneThrough");
export const hasManyThrough = relation("HasManyThrough");
export const belongsToMany = manyToMany("BelongsToMany");
export const morphToMany = manyToMany("MorphToMany");
export const morphedByMany = manyToMany("MorphedByMany");

export function morphTo(): RelationDeclaration {
   return { kind: "MorphTo" };
}

/* ------------------------------- Models ------------------------------- */

export type CastTarget = string | CastDefinition;

export interface TimestampColumns {
   createdAt: string;
   updatedAt: string;
}

export interface ModelOptions {
   name: string;
   namespace?: string;
   primaryKey?: string;
   fillable?: string[];
   casts?: Record<string, CastTarget>;
   timestamps?: boolean | Partial<TimestampColumns>;
   /** Attributes known to hold null; rendered optional. */
   nullable?: string[];
   relations?: Record<string, RelationDeclaration>;
}

export interface ModelDefinition {
   readonly [DEFINITION_KIND]: "model";
   name: string;
   namespace: string;
   primaryKey: string;
   fillable: string[];
   casts: Record<string, CastTarget>;
   timestamps: TimestampColumns | false;
   nullable: string[];
   relations: Record<string, RelationDeclaration>;
}

export function defineModel(options: ModelOptions): ModelDefinition {
   const timestamps =
      options.timestamps === false
         ? false
         : {
              createdAt: "created_at",
              updatedAt: "updated_at",
              ...(typeof options.timestamps === "object" ? options.timestamps : {}),
           };

   return {
      [DEFINITION_KIND]: "model",
      name: options.name,
      namespace: options.namespace ?? DEFAULT_MODEL_NAMESPACE,
      primaryKey: options.primaryKey ?? "id",
      fillable: [...(options.fillable ?? [])],
      casts: { ...(options.casts ?? {}) },
      timestamps,
      nullable: [...(options.nullable ?? [])],
      relations: { ...(options.relations ?? {}) },
   };
}

/* ------------------------------- Casts -------------------------------- */

/** Return type of a cast's `get` accessor. */
export type ReturnTarget = string | Definition | (() => Definition);

export interface CastAccessor {
   returns?: ReturnTarget;
   /** Whether the return type admits null (`?Foo`). */
   nullable?: boolean;
   /** Raw doc comment of the accessor, e.g. `@return array<int, TagData>`. */
   doc?: string;
}

export interface CastOptions {
   name: string;
   namespace?: string;
   get?: CastAccessor;
}

export interface CastDefinition {
   readonly [DEFINITION_KIND]: "cast";
   name: string;
   namespace: string;
   get?: CastAccessor;
}

export function defineCast(options: CastOptions): CastDefinition {
   return {
      [DEFINITION_KIND]: "cast",
      name: options.name,
      namespace: options.namespace ?? DEFAULT_CAST_NAMESPACE,
      get: options.get,
   };
}

/* --------------------------- Value objects ---------------------------- */

export interface ParameterDefinition {
   name: string;
   /** Native declared type: "string", "?int", "string|int", "AddressData"... */
   type?: string;
   /** Overrides nullability inferred from `type`. */
   nullable?: boolean;
   /** Presence of this key marks the parameter as defaulted. */
   default?: unknown;
}

export interface ValueObjectOptions {
   name: string;
   namespace?: string;
   params?: ParameterDefinition[];
   /** Constructor doc comment with `@param <type> $<name>` lines. */
   doc?: string;
}

export interface ValueObjectDefinition {
   readonly [DEFINITION_KIND]: "value-object";
   name: string;
   namespace: string;
   params: ParameterDefinition[];
   doc?: string;
}

export function defineValueObject(options: ValueObjectOptions): ValueObjectDefinition {
   return {
      [DEFINITION_KIND]: "value-object",
      name: options.name,
      namespace: options.namespace ?? DEFAULT_VALUE_OBJECT_NAMESPACE,
      params: [...(options.params ?? [])],
      doc: options.doc,
   };
}

/* ------------------------------- Guards ------------------------------- */

export type Definition = ModelDefinition | CastDefinition | ValueObjectDefinition;

function kindOf(value: unknown): unknown {
   if (typeof value !== "object" || value === null || !(DEFINITION_KIND in value)) {
      return undefined;
   }
   return value[DEFINITION_KIND];
}

export function isDefinition(value: unknown): value is Definition {
   const kind = kindOf(value);
   return kind === "model" || kind === "cast" || kind === "value-object";
}

export function isModelDefinition(value: unknown): value is ModelDefinition {
   return kindOf(value) === "model";
}

export function isCastDefinition(value: unknown): value is CastDefinition {
   return kindOf(value) === "cast";
}

export function isValueObjectDefinition(value: unknown): value is ValueObjectDefinition {
   return kindOf(value) === "value-object";
}

export function qualifiedName(def: Definition): string {
   return def.namespace ? `${def.namespace}.${def.name}` : def.name;
}

/** "DataObjects.AddressData" → "AddressData" */
export function shortName(identifier: string): string {
   const idx = identifier.lastIndexOf(".");
   return idx === -1 ? identifier : identifier.slice(idx + 1);
}

/** "blogPosts" → "blog_posts", "UserProfile" → "user_profile" */
export function snakeCase(name: string): string {
   if (!name) return name;
   const lcfirst = name.charAt(0).toLowerCase() + name.slice(1);
   return lcfirst.replace(/[A-Z]/g, (c) => "_" + c).toLowerCase();
}
