import { describe, it, expect } from "vitest";
import { AddressData, MetadataData, TagData, User } from "@/__fixtures__/blog";
import { DataObjectAnalyzer } from "@/schema/data-object";
import { defineValueObject, qualifiedName, type Definition } from "@/schema/definitions";
import { Diagnostics } from "@/schema/diagnostics";
import { ClassRegistry } from "@/schema/registry";
import type { FieldDescriptor, SchemaMap } from "@/schema/types";
import { EmissionState } from "./emission-state.js";
import { JSON_LD_RESERVED } from "./json-ld.js";
import { TsPrinter } from "./printer.js";
import { TypeMapper } from "./type-mapper.js";
import { ValueObjectEmitter } from "./value-objects.js";

function setup(...defs: Definition[]) {
   const registry = new ClassRegistry();
   defs.forEach((d) => registry.register(d));
   const mapper = new TypeMapper({
      resolveValueObject: (name) => {
         const vo = registry.resolveValueObject(name);
         return vo ? qualifiedName(vo) : undefined;
      },
   });
   const analyzer = new DataObjectAnalyzer(mapper);
   const state = new EmissionState();
   const diagnostics = new Diagnostics();
   return { registry, analyzer, state, diagnostics };
}

function schemaOf(...models: [string, FieldDescriptor[]][]): SchemaMap {
   return new Map(models.map(([name, fields]) => [name, { name, qualifiedIdentifier: `Models.${name}`, fields }]));
}

describe("ValueObjectEmitter", () => {
   it("should emit field value objects first, then nested ones, each once", () => {
      const { registry, analyzer, state, diagnostics } = setup(AddressData, TagData, MetadataData);
      const emitter = new ValueObjectEmitter(state, new TsPrinter(), registry, analyzer, diagnostics);
      const address = analyzer.extractFields(AddressData);

      const schema = schemaOf(
         [
            "User",
            [
               {
                  kind: "value-object",
                  name: "metadata",
                  declaredType: "MetadataData",
                  valueObjectType: "DataObjects.MetadataData",
                  properties: analyzer.extractFields(MetadataData),
               },
               {
                  kind: "value-object",
                  name: "address",
                  declaredType: "AddressData",
                  valueObjectType: "DataObjects.AddressData",
                  properties: address,
               },
               {
                  kind: "value-object",
                  name: "marker",
                  declaredType: "MarkerData",
                  valueObjectType: "DataObjects.MarkerData",
               },
            ],
         ],
         [
            "Team",
            [
               {
                  kind: "value-object",
                  name: "billing",
                  declaredType: "AddressData",
                  valueObjectType: "DataObjects.AddressData",
                  properties: address,
               },
            ],
         ],
      );

      expect(emitter.emitAll(schema)).toEqual([
         [
            "export interface IMetadataData {",
            "    extra: Record<string, unknown>;",
            "    address?: IAddressData;",
            "    tags?: ITagData[];",
            "}",
         ].join("\n"),
         [
            "export interface IAddressData {",
            "    street: string;",
            "    city: string;",
            "    state?: string;",
            "    zipCode?: string;",
            "}",
         ].join("\n"),
         ["export interface ITagData {", "    label: string;", "    color?: string;", "}"].join("\n"),
      ]);
      expect(diagnostics.size).toBe(0);
   });

   it("should stop on self-referencing value objects", () => {
      const NodeData = defineValueObject({
         name: "NodeData",
         params: [
            { name: "label", type: "string" },
            { name: "children", type: "array", default: [] },
         ],
         doc: "/** @param array<int, NodeData> $children */",
      });
      const { registry, analyzer, state, diagnostics } = setup(NodeData);
      const emitter = new ValueObjectEmitter(state, new TsPrinter(), registry, analyzer, diagnostics);

      const out = emitter.emitAll(
         schemaOf([
            "Menu",
            [
               {
                  kind: "value-object",
                  name: "root",
                  declaredType: "NodeData",
                  valueObjectType: "DataObjects.NodeData",
                  properties: analyzer.extractFields(NodeData),
               },
            ],
         ]),
      );

      expect(out).toEqual(["export interface INodeData {\n    label: string;\n    children?: INodeData[];\n}"]);
   });

   it("should report nested references it cannot emit", () => {
      const { registry, analyzer, state, diagnostics } = setup(User);
      const emitter = new ValueObjectEmitter(state, new TsPrinter(), registry, analyzer, diagnostics);

      const out = emitter.emitAll(
         schemaOf([
            "Order",
            [
               {
                  kind: "value-object",
                  name: "shipping",
                  declaredType: "ShippingData",
                  valueObjectType: "DataObjects.ShippingData",
                  properties: [
                     { name: "carrier", mappedType: "ICarrier", nullable: false, hasDefault: false, references: ["DataObjects.Carrier"] },
                     { name: "owner", mappedType: "IUser", nullable: true, hasDefault: false, references: ["Models.User"] },
                  ],
               },
            ],
         ]),
      );

      expect(out).toEqual(["export interface IShippingData {\n    carrier: ICarrier;\n    owner?: IUser;\n}"]);
      expect(diagnostics.format()).toEqual([
         "[value-object] DataObjects.Carrier: referenced value object is not registered",
         "[value-object] Models.User: referenced class is not a value object",
      ]);
   });

   it("should reserve the JSON-LD value object without emitting it", () => {
      const { registry, analyzer, state, diagnostics } = setup();
      const emitter = new ValueObjectEmitter(state, new TsPrinter(), registry, analyzer, diagnostics, {
         reserved: JSON_LD_RESERVED,
      });

      const out = emitter.emitAll(
         schemaOf([
            "Page",
            [
               {
                  kind: "value-object",
                  name: "schema",
                  declaredType: "JsonLdData",
                  valueObjectType: "DataObjects.JsonLdData",
                  properties: [
                     { name: "payload", mappedType: "unknown[]", nullable: false, hasDefault: false, references: [] },
                  ],
               },
            ],
         ]),
      );

      expect(out).toEqual([]);
      expect(state.isProcessed("IJsonLdData")).toBe(true);
   });
});
