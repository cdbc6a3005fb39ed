import { describe, it, expect } from "vitest";
import type { SchemaMap } from "@/schema/types";
import { EmissionState } from "./emission-state.js";
import { ImportCollector, parseImportReference } from "./imports.js";

describe("parseImportReference", () => {
   it("should split path and type name", () => {
      expect(parseImportReference("@/types/x|Foo")).toEqual({
         path: "@/types/x",
         display: "Foo",
         imported: "Foo",
      });
   });

   it("should take the type name from the path when none is given", () => {
      expect(parseImportReference("@/types/Money")).toEqual({
         path: "@/types/Money",
         display: "Money",
         imported: "Money",
      });
   });

   it("should import the element type of array references", () => {
      expect(parseImportReference("./tags|Tag[]")).toEqual({ path: "./tags", display: "Tag[]", imported: "Tag" });
   });
});

describe("ImportCollector", () => {
   it("should group names by module in first-seen order", () => {
      const schema: SchemaMap = new Map([
         [
            "User",
            {
               name: "User",
               qualifiedIdentifier: "Models.User",
               fields: [
                  { kind: "import", name: "avatar", declaredType: "@/types/media|Media" },
                  { kind: "scalar", name: "status", declaredType: "Status", source: "override" },
                  { kind: "import", name: "balance", declaredType: "@/types/Money" },
               ],
            },
         ],
         [
            "Post",
            {
               name: "Post",
               qualifiedIdentifier: "Models.Post",
               fields: [
                  { kind: "import", name: "cover", declaredType: "@/types/media|Media" },
                  { kind: "import", name: "gallery", declaredType: "@/types/media|Image[]" },
               ],
            },
         ],
      ]);

      const collector = new ImportCollector();
      collector.collect(schema);

      expect(collector.size).toBe(2);
      expect(collector.entries()).toEqual([
         { from: "@/types/media", types: ["Media", "Image"] },
         { from: "@/types/Money", types: ["Money"] },
      ]);
   });
});

describe("EmissionState", () => {
   it("should claim each interface name once", () => {
      const state = new EmissionState();
      expect(state.claim("IUser")).toBe(true);
      expect(state.claim("IUser")).toBe(false);
      expect(state.isProcessed("IUser")).toBe(true);
      expect(state.isProcessed("ITag")).toBe(false);
   });

   it("should queue value objects not yet emitted or pending", () => {
      const state = new EmissionState();
      state.claim("IAddressData");
      state.enqueue("DataObjects.AddressData");
      state.enqueue("DataObjects.TagData");
      state.enqueue("DataObjects.TagData");
      state.enqueue("Billing.InvoiceData");

      expect(state.dequeue()).toBe("DataObjects.TagData");
      expect(state.dequeue()).toBe("Billing.InvoiceData");
      expect(state.dequeue()).toBeUndefined();
   });
});
