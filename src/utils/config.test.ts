import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Post } from "@/__fixtures__/blog";
import { CONFIG_ENV, ConfigError, defineConfig, findConfigFile, loadConfig, resolveConfig } from "./config.js";

function configError(input: unknown): ConfigError {
   try {
      resolveConfig(input);
   } catch (err) {
      if (err instanceof ConfigError) return err;
      throw err;
   }
   throw new Error("expected resolveConfig to fail");
}

describe("resolveConfig", () => {
   it("should fill in every default", () => {
      expect(resolveConfig({})).toEqual({
         outputPath: "resources/js/types/interfaces.ts",
         modelsPath: "app/Models",
         additionalModels: [],
         classPaths: [],
         exclude: [],
         withCounts: true,
         withJsonLd: false,
         saveSchema: false,
         customProps: {},
         nullableFields: ["description"],
         valueObjectNamespace: "DataObjects",
         prettier: false,
         regenerateCommand: "model-ts gen",
         watchInterval: 2000,
      });
   });

   it("should keep inline model definitions as given", () => {
      const config = resolveConfig({ additionalModels: ["extra/models.js#Invoice", Post] });
      expect(config.additionalModels[1]).toBe(Post);
   });

   it("should list every invalid entry", () => {
      const error = configError({
         withCounts: "yes",
         customProps: { "?status": { User: "Status" }, User: "Status" },
         unknownKey: 1,
      });

      expect(error.message.split("\n")[0]).toBe("Invalid model-ts configuration");
      expect(error.issues).toHaveLength(4);
      expect(error.issues[0]).toMatch(/^withCounts: /);
      expect(error.issues.slice(1)).toEqual([
         "customProps.?status: global overrides map a field to a type string",
         'customProps.User: per-model overrides need an object; did you mean "?User"?',
         "(root): Unrecognized key(s) in object: 'unknownKey'",
      ]);
   });

   it("should reject additional models that are neither paths nor definitions", () => {
      const error = configError({ additionalModels: [Post, 42] });
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^additionalModels\.1: /);
   });
});

describe("defineConfig", () => {
   it("should return its argument", () => {
      const config = { outputPath: "types.ts" };
      expect(defineConfig(config)).toBe(config);
   });
});

describe("config files", () => {
   let cwd: string;
   let envBefore: string | undefined;

   beforeEach(() => {
      cwd = fs.mkdtempSync(path.join(os.tmpdir(), "model-ts-config-"));
      envBefore = process.env[CONFIG_ENV];
      delete process.env[CONFIG_ENV];
   });

   afterEach(() => {
      if (envBefore === undefined) delete process.env[CONFIG_ENV];
      else process.env[CONFIG_ENV] = envBefore;
      fs.rmSync(cwd, { recursive: true, force: true });
   });

   it("should find the default config file", () => {
      expect(findConfigFile(undefined, cwd)).toBeUndefined();
      fs.writeFileSync(path.join(cwd, "model-ts.config.cjs"), "module.exports = {};\n");
      expect(findConfigFile(undefined, cwd)).toBe(path.join(cwd, "model-ts.config.cjs"));
   });

   it("should prefer an explicit path, then the environment", () => {
      fs.writeFileSync(path.join(cwd, "model-ts.config.cjs"), "module.exports = {};\n");
      fs.writeFileSync(path.join(cwd, "env.config.cjs"), "module.exports = {};\n");
      fs.writeFileSync(path.join(cwd, "cli.config.cjs"), "module.exports = {};\n");
      process.env[CONFIG_ENV] = "env.config.cjs";

      expect(findConfigFile(undefined, cwd)).toBe(path.join(cwd, "env.config.cjs"));
      expect(findConfigFile("cli.config.cjs", cwd)).toBe(path.join(cwd, "cli.config.cjs"));
   });

   it("should fail on a missing explicit file", () => {
      expect(() => findConfigFile("nope.config.js", cwd)).toThrow(
         `Config file not found: ${path.join(cwd, "nope.config.js")}`,
      );
   });

   it("should load and validate a config module", async () => {
      fs.writeFileSync(
         path.join(cwd, "model-ts.config.cjs"),
         'module.exports = { outputPath: "types/models.ts", withCounts: false };\n',
      );

      const loaded = await loadConfig(undefined, { cwd });
      expect(loaded.file).toBe(path.join(cwd, "model-ts.config.cjs"));
      expect(loaded.config.outputPath).toBe("types/models.ts");
      expect(loaded.config.withCounts).toBe(false);
      expect(loaded.config.modelsPath).toBe("app/Models");
   });

   it("should run on defaults without a config file", async () => {
      const loaded = await loadConfig(undefined, { cwd });
      expect(loaded.file).toBeUndefined();
      expect(loaded.config).toEqual(resolveConfig({}));
   });
});
