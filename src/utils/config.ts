// utils/config.ts
import fs from "fs";
import path from "path";
import { z } from "zod";
import { isModelDefinition, type ModelDefinition } from "@/schema/definitions";
import { defaultExport, loadModule } from "./loader.js";

export const CONFIG_FILES = ["model-ts.config.js", "model-ts.config.mjs", "model-ts.config.cjs"];
export const CONFIG_ENV = "MODEL_TS_CONFIG";
export const DEFAULT_SCHEMA_PATH = ".model-ts/schema.json";
export const DEFAULT_WATCH_INTERVAL = 2000;

export class ConfigError extends Error {
   constructor(
      message: string,
      readonly issues: string[] = [],
   ) {
      super(issues.length ? `${message}\n  - ${issues.join("\n  - ")}` : message);
      this.name = "ConfigError";
   }
}

/**
 * `"?field": type` adds a field to every model; `Model: { field: type }`
 * to one model. Values starting with `@/`, `~/`, `./` or `../` are imports
 * (`"<path>|<Name>"` or `"<path>"`), anything else is a literal TS type.
 */
const customPropsSchema = z
   .record(z.string(), z.union([z.string(), z.record(z.string(), z.string())]))
   .superRefine((props, ctx) => {
      for (const [key, value] of Object.entries(props)) {
         const global = key.startsWith("?");
         if (global && typeof value !== "string") {
            ctx.addIssue({
               code: z.ZodIssueCode.custom,
               path: [key],
               message: "global overrides map a field to a type string",
            });
         } else if (!global && typeof value === "string") {
            ctx.addIssue({
               code: z.ZodIssueCode.custom,
               path: [key],
               message: `per-model overrides need an object; did you mean "?${key}"?`,
            });
         }
      }
   });

const additionalModelSchema = z.union([
   z.string().min(1),
   z.custom<ModelDefinition>(isModelDefinition, "expected a module path or a defineModel() result"),
]);

export const configSchema = z
   .object({
      outputPath: z.string().min(1).default("resources/js/types/interfaces.ts"),
      modelsPath: z.string().min(1).default("app/Models"),
      additionalModels: z.array(additionalModelSchema).default([]),
      classPaths: z.array(z.string().min(1)).default([]),
      exclude: z.array(z.string()).default([]),
      withCounts: z.boolean().default(true),
      withJsonLd: z.boolean().default(false),
      saveSchema: z.union([z.boolean(), z.string().min(1)]).default(false),
      customProps: customPropsSchema.default({}),
      nullableFields: z.array(z.string()).default(["description"]),
      valueObjectNamespace: z.string().min(1).default("DataObjects"),
      prettier: z.boolean().default(false),
      regenerateCommand: z.string().default("model-ts gen"),
      watchInterval: z.number().int().positive().default(DEFAULT_WATCH_INTERVAL),
   })
   .strict();

/** What a config file exports. */
export type UserConfig = z.input<typeof configSchema>;
/** Config with every default filled in. */
export type GeneratorConfig = z.output<typeof configSchema>;

/** Identity helper giving config files type-checking. */
export function defineConfig(config: UserConfig): UserConfig {
   return config;
}

export function resolveConfig(input: unknown = {}): GeneratorConfig {
   const parsed = configSchema.safeParse(input);
   if (!parsed.success) {
      throw new ConfigError(
         "Invalid model-ts configuration",
         parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
      );
   }
   return parsed.data;
}

/** `--config` wins, then the env var, then the first default file found. */
export function findConfigFile(explicit?: string, cwd: string = process.cwd()): string | undefined {
   const chosen = explicit ?? process.env[CONFIG_ENV];
   if (chosen) {
      const abs = path.resolve(cwd, chosen);
      if (!fs.existsSync(abs)) throw new ConfigError(`Config file not found: ${abs}`);
      return abs;
   }
   return CONFIG_FILES.map((f) => path.join(cwd, f)).find((f) => fs.existsSync(f));
}

export interface LoadedConfig {
   config: GeneratorConfig;
   /** Absent when running on defaults. */
   file?: string;
}

export async function loadConfig(
   explicit?: string,
   options: { cwd?: string; fresh?: boolean } = {},
): Promise<LoadedConfig> {
   const file = findConfigFile(explicit, options.cwd);
   if (!file) return { config: resolveConfig({}) };

   const mod = await loadModule(file, { fresh: options.fresh });
   return { config: resolveConfig(defaultExport(mod)), file };
}
