// tsup.config.ts
import { defineConfig } from "tsup";

export default defineConfig({
   entry: {
      // main library
      index: "src/index.ts",

      // CLI (matches the bin path in package.json)
      "cli/cli": "src/cli/cli.ts",
   },

   outDir: "dist",

   format: ["esm"],
   platform: "node",
   target: "node20",

   sourcemap: true,
   clean: true,
   splitting: false, // 1 file per entry – nicer for CLIs
   treeshake: true,
   minify: false,

   dts: { entry: { index: "src/index.ts" } },
});
