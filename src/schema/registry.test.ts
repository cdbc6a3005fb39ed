import { describe, it, expect } from "vitest";
import { AddressData, JsonLdCast, Role, User } from "@/__fixtures__/blog";
import { defineValueObject, qualifiedName } from "./definitions.js";
import { ClassRegistry } from "./registry.js";

describe("ClassRegistry", () => {
   it("should register the casts a model uses and the value objects they return", () => {
      const registry = new ClassRegistry();
      registry.register(User);
      expect(registry.values().map(qualifiedName)).toEqual([
         "Models.User",
         "Casts.AddressCast",
         "DataObjects.AddressData",
         "Casts.MetadataCast",
         "Casts.TagsCast",
      ]);
   });

   it("should not call return type thunks while registering", () => {
      const registry = new ClassRegistry();
      registry.register(JsonLdCast);
      expect(registry.has("Casts.JsonLdCast")).toBe(true);
      expect(registry.has("DataObjects.JsonLdData")).toBe(false);
   });

   it("should register only branded exports of a module", () => {
      const registry = new ClassRegistry();
      registry.registerModule({ Role, label: "Role", count: 3, nothing: null });
      expect(registry.values()).toEqual([Role]);
   });

   it("should resolve qualified names, then the context namespace, then value objects", () => {
      const BillingAddress = defineValueObject({ name: "AddressData", namespace: "Billing" });
      const registry = new ClassRegistry();
      [AddressData, BillingAddress].forEach((d) => registry.register(d));

      expect(registry.resolve("Billing.AddressData")).toBe(BillingAddress);
      expect(registry.resolve(".DataObjects.AddressData")).toBe(AddressData);
      expect(registry.resolve("AddressData", "Billing")).toBe(BillingAddress);
      expect(registry.resolve("AddressData", "Shipping")).toBe(AddressData);
      expect(registry.resolve("AddressData")).toBe(AddressData);
      expect(registry.resolve("Missing")).toBeUndefined();
   });

   it("should resolve value objects only", () => {
      const registry = new ClassRegistry();
      registry.register(User);
      expect(registry.resolveValueObject("AddressData")).toBe(AddressData);
      expect(registry.resolveValueObject("AddressCast", "Casts")).toBeUndefined();
      expect(registry.resolveValueObject("Models.User")).toBeUndefined();
   });

   it("should use the configured value-object namespace", () => {
      const Money = defineValueObject({ name: "Money", namespace: "App.Data" });
      const registry = new ClassRegistry("App.Data");
      registry.register(Money);
      expect(registry.resolveValueObject("Money")).toBe(Money);
   });
});
