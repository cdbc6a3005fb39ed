#!/usr/bin/env node
import { Command } from "commander";
import { existsSync } from "fs";
import fs from "fs/promises";
import path from "path";
import { CONFIG_FILES } from "../utils/config.js";
import { runGeneration, watchAndGenerate } from "./generate.js";

const cli = new Command();

cli
   .name("model-ts")
   .description("Generate TypeScript interfaces from model definitions")
   .version("0.1.0");

const INIT_FILE = "model-ts.config.mjs";

const CONFIG_TEMPLATE = `
// ${INIT_FILE}
export default {
   outputPath: "resources/js/types/interfaces.ts",
   modelsPath: "app/Models",
   // additionalModels: ["./src/billing/invoice.js#Invoice"],
   // classPaths: ["app/Casts", "app/DataObjects"],
   withCounts: true,
   withJsonLd: false,
   saveSchema: false,
   customProps: {
      // "?permissions": "string[]",
      // User: { avatar: "@/types/media|Media" },
   },
};
`;

//
// init
//
cli
   .command("init")
   .description(`Create ${INIT_FILE} in the current directory`)
   .action(async () => {
      const cwd = process.cwd();
      const existing = CONFIG_FILES.find((name) => existsSync(path.join(cwd, name)));
      if (existing) {
         console.log(`🟡 Skip: ${existing} already exists`);
         return;
      }

      const cfgPath = path.join(cwd, INIT_FILE);
      await fs.writeFile(cfgPath, CONFIG_TEMPLATE.trimStart(), "utf-8");
      console.log(`➡️  Created ${path.basename(cfgPath)}`);
      console.log("🎉 Initialization complete!");
   });

//
// gen
//
cli
   .command("gen")
   .description("Generate the interfaces file, optionally regenerating on change")
   .option("--config <path>", "Path to model-ts config file")
   .option("-w, --watch", "Regenerate whenever model sources change")
   .action(async (opts: { config?: string; watch?: boolean }) => {
      try {
         if (opts.watch) await watchAndGenerate({ config: opts.config });
         else await runGeneration({ config: opts.config });
      } catch (e) {
         console.error("❌ Gen failed:", e instanceof Error ? e.message : e);
         process.exit(1);
      }
   });

await cli.parseAsync(process.argv);
