// generator/ts/column-maps.ts
import type { RelationKind } from "@/schema/definitions";

/** Returned for anything no table knows. */
export const UNKNOWN_TYPE = "unknown";

/** Native / doc-comment scalar names → TS. */
export const NativeTypeMap: Readonly<Record<string, string>> = {
   int: "number",
   integer: "number",
   float: "number",
   double: "number",
   string: "string",
   bool: "boolean",
   boolean: "boolean",
   array: "unknown[]",
   mixed: "unknown",
   object: "Record<string, unknown>",
};

/** Model cast tags → TS. Parameters after ":" are stripped before lookup. */
export const ColumnTypeMap: Readonly<Record<string, string>> = {
   string: "string",
   text: "string",
   char: "string",
   uuid: "string",
   ulid: "string",
   hashed: "string",
   encrypted: "string",

   integer: "number",
   int: "number",
   bigInteger: "number",
   number: "number",
   decimal: "number",
   float: "number",
   double: "number",
   real: "number",

   boolean: "boolean",
   bool: "boolean",

   date: "string",
   datetime: "string",
   timestamp: "string",
   immutable_date: "string",
   immutable_datetime: "string",

   array: "Record<string, unknown>",
   json: "Record<string, unknown>",
   object: "Record<string, unknown>",
   collection: "Record<string, unknown>",
};

export const SINGLE_RELATIONS: ReadonlySet<RelationKind> = new Set<RelationKind>([
   "HasOne",
   "BelongsTo",
   "MorphOne",
   "HasOneThrough",
]);

/** Relations holding a collection; these get `<field>_count` companions. */
export const COLLECTION_RELATIONS: ReadonlySet<RelationKind> = new Set<RelationKind>([
   "HasMany",
   "BelongsToMany",
   "MorphMany",
   "MorphToMany",
   "MorphedByMany",
   "HasManyThrough",
]);

export function isCollectionRelation(kind: RelationKind): boolean {
   return COLLECTION_RELATIONS.has(kind);
}
