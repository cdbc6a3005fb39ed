import { describe, it, expect } from "vitest";
import { TypeMapper } from "@/generator/ts/type-mapper";
import { Role, RoleUser } from "@/__fixtures__/blog";
import { SchemaBuilder } from "./builder.js";
import { CastTypeResolver } from "./cast.js";
import { DataObjectAnalyzer } from "./data-object.js";
import { defineModel, type ModelDefinition } from "./definitions.js";
import { ModelDiscovery } from "./discovery.js";
import { TypeExtractor, type CustomProps } from "./extractor.js";
import { ClassRegistry } from "./registry.js";
import { RelationshipResolver } from "./relationship.js";

const Draft = defineModel({ name: "Draft", fillable: ["title"], nullable: ["title"], timestamps: false });

function builder(models: ModelDefinition[], customProps: CustomProps, extractorProps: CustomProps = {}): SchemaBuilder {
   const registry = new ClassRegistry();
   const discovery = new ModelDiscovery(registry, {
      modelsPath: "no-such-models-dir",
      additionalModels: models,
   });
   const casts = new CastTypeResolver(new DataObjectAnalyzer(new TypeMapper()), registry);
   const extractor = new TypeExtractor(casts, new RelationshipResolver(), { customProps: extractorProps });
   return new SchemaBuilder(discovery, extractor, customProps);
}

describe("SchemaBuilder", () => {
   it("should key schemas by model name in discovery order", async () => {
      const schema = await builder([Role, RoleUser, Draft], {}).build();
      expect([...schema.keys()]).toEqual(["Role", "RoleUser", "Draft"]);
      expect(schema.get("RoleUser")?.qualifiedIdentifier).toBe("Models.RoleUser");
   });

   it("should carry a model's nullable list only when it has one", async () => {
      const schema = await builder([Role, Draft], {}).build();
      expect(schema.get("Draft")?.nullable).toEqual(["title"]);
      expect(schema.get("Role")).not.toHaveProperty("nullable");
   });

   it("should add global overrides to every model missing the field", async () => {
      const schema = await builder([Role, RoleUser], { "?status": "Status", "?id": "string" }).build();

      for (const name of ["Role", "RoleUser"]) {
         const fields = schema.get(name)?.fields ?? [];
         expect(fields.at(-1)).toEqual({
            kind: "scalar",
            name: "status",
            declaredType: "Status",
            source: "override",
         });
         expect(fields[0]).toEqual({ kind: "scalar", name: "id", declaredType: "number", source: "column" });
      }
   });

   it("should apply per-model overrides after global ones", async () => {
      const schema = await builder([Role, RoleUser], {
         "?status": "Status",
         Role: { status: "RoleStatus", color: "@/types/ui|Color" },
         Missing: { ignored: "string" },
      }).build();

      expect(schema.get("Role")?.fields.map((f) => [f.name, f.declaredType])).toEqual([
         ["id", "number"],
         ["name", "string"],
         ["description", "string"],
         ["created_at", "string"],
         ["updated_at", "string"],
         ["status", "Status"],
         ["color", "@/types/ui|Color"],
      ]);
      expect(schema.get("Role")?.fields.at(-1)?.kind).toBe("import");
      expect(schema.has("Missing")).toBe(false);
   });

   it("should keep fields the extractor already took from per-model overrides", async () => {
      const props = { "?status": "Status", Role: { status: "RoleStatus" } };
      const schema = await builder([Role], props, props).build();
      const status = schema.get("Role")?.fields.filter((f) => f.name === "status");
      expect(status?.map((f) => f.declaredType)).toEqual(["RoleStatus"]);
   });
});
