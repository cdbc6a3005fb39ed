// schema/types.ts
import type { RelationKind } from "./definitions.js";

export interface PivotInfo {
   accessor: string;
   class: string;
   columns: string[];
}

/** One property of a value-object interface. */
export interface ValueObjectField {
   name: string;
   /** Already converted to TypeScript. */
   mappedType: string;
   nullable: boolean;
   hasDefault: boolean;
   /** Qualified identifiers of value objects the declared type references. */
   references: string[];
}

interface BaseField {
   name: string;
   nullable?: boolean;
}

/**
 * Plain column. `source` tells the printer whether `declaredType` is a
 * cast tag to look up ("column") or a literal TS type from configuration
 * ("override").
 */
export interface ScalarField extends BaseField {
   kind: "scalar";
   declaredType: string;
   source: "column" | "override";
}

export interface RelationField extends BaseField {
   kind: "relation";
   declaredType: RelationKind;
   /** Qualified identifier; absent for MorphTo. */
   relatedModel?: string;
   pivotInfo?: PivotInfo;
}

export interface ValueObjectFieldDescriptor extends BaseField {
   kind: "value-object";
   /** Short name, with a `[]` suffix for collections. */
   declaredType: string;
   /** Qualified identifier of the value object. */
   valueObjectType: string;
   properties?: ValueObjectField[];
   isArray?: boolean;
}

/** `"<path>|<TypeName>"` or `"<path>"`. */
export interface ImportField extends BaseField {
   kind: "import";
   declaredType: string;
}

export type FieldDescriptor =
   | ScalarField
   | RelationField
   | ValueObjectFieldDescriptor
   | ImportField;

export interface ModelSchema {
   name: string;
   qualifiedIdentifier: string;
   fields: FieldDescriptor[];
   /** Per-model optionality deny-list additions. */
   nullable?: string[];
}

/** Model name → schema, in discovery order. */
export type SchemaMap = Map<string, ModelSchema>;

export interface RelationInfo {
   name: string;
   kind: RelationKind;
   relatedModel?: string;
   pivot?: PivotInfo;
}

export function hasField(fields: readonly FieldDescriptor[], name: string): boolean {
   return fields.some((f) => f.name === name);
}

export function schemaToJson(schema: SchemaMap): Record<string, ModelSchema> {
   return Object.fromEntries(schema);
}
