import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { writeJson, writeOutput } from "./writer.js";

describe("writer", () => {
   let dir: string;

   beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "model-ts-writer-"));
   });

   afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
   });

   it("should create missing directories and replace the file", async () => {
      const file = path.join(dir, "resources/js/types/interfaces.ts");
      expect(await writeOutput(file, "export interface IOld {}\n")).toBe("export interface IOld {}\n");
      expect(await writeOutput(file, "export interface INew {}\n")).toBe("export interface INew {}\n");
      expect(fs.readFileSync(file, "utf-8")).toBe("export interface INew {}\n");
   });

   it("should write JSON with four-space indentation", () => {
      const file = path.join(dir, ".model-ts/schema.json");
      writeJson(file, { User: { name: "User", fields: [] } });
      expect(fs.readFileSync(file, "utf-8")).toBe(
         '{\n    "User": {\n        "name": "User",\n        "fields": []\n    }\n}\n',
      );
   });
});
