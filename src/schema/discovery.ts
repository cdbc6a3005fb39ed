// schema/discovery.ts
import fs from "fs";
import path from "path";
import { minimatch } from "minimatch";
import { loadModule, type ModuleExports } from "@/utils/loader";
import { isModelDefinition, qualifiedName, type ModelDefinition } from "./definitions.js";
import { describeError, Diagnostics } from "./diagnostics.js";
import type { ClassRegistry } from "./registry.js";

export const MODULE_EXTENSIONS = [".js", ".mjs", ".cjs"];

export type ModuleLoader = (file: string) => Promise<ModuleExports>;

export interface DiscoveredModel {
   name: string;
   qualifiedIdentifier: string;
   definition: ModelDefinition;
   /** Module the model was loaded from; absent for inline definitions. */
   source?: string;
}

export interface DiscoveryOptions {
   modelsPath: string;
   /** Module paths (`path` or `path#Export`) or inline definitions. */
   additionalModels?: ReadonlyArray<string | ModelDefinition>;
   /** Modules or directories contributing casts / value objects. */
   classPaths?: readonly string[];
   /** minimatch globs tested against file names in `modelsPath`. */
   exclude?: readonly string[];
   cwd?: string;
   loader?: ModuleLoader;
}

function isModuleFile(file: string): boolean {
   return MODULE_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

/** Module files directly inside `dir`, alphabetical. Missing dir → []. */
export function listModules(dir: string): string[] {
   if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) return [];
   return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((e) => e.isFile() && isModuleFile(e.name))
      .map((e) => path.join(dir, e.name))
      .sort();
}

/** "./models/extra.js#Invoice" → ["./models/extra.js", "Invoice"] */
export function parseModuleSpecifier(spec: string): { file: string; exportName?: string } {
   const hash = spec.lastIndexOf("#");
   if (hash <= 0) return { file: spec };
   return { file: spec.slice(0, hash), exportName: spec.slice(hash + 1) || undefined };
}

/**
 * Enumerates models: every module in the models directory, then the
 * additional sources. All branded exports met on the way are registered
 * so casts and value objects can be resolved by name later.
 */
export class ModelDiscovery {
   private readonly cwd: string;
   private readonly load: ModuleLoader;

   constructor(
      private readonly registry: ClassRegistry,
      private readonly options: DiscoveryOptions,
      private readonly diagnostics: Diagnostics = new Diagnostics(),
   ) {
      this.cwd = options.cwd ?? process.cwd();
      this.load = options.loader ?? ((file) => loadModule(file));
   }

   async discover(): Promise<DiscoveredModel[]> {
      const found = new Map<string, DiscoveredModel>();

      const add = (definition: ModelDefinition, source?: string) => {
         const existing = found.get(definition.name);
         if (existing?.definition === definition) return;
         if (existing) {
            this.diagnostics.skip(
               "discovery",
               qualifiedName(definition),
               `duplicate model name ${definition.name} (already loaded from ${existing.source ?? "configuration"})`,
            );
            return;
         }
         this.registry.register(definition);
         found.set(definition.name, {
            name: definition.name,
            qualifiedIdentifier: qualifiedName(definition),
            definition,
            source,
         });
      };

      for (const file of this.classFiles()) {
         const exports = await this.tryLoad(file);
         if (exports) this.registry.registerModule(exports);
      }

      for (const file of this.modelFiles()) {
         const exports = await this.tryLoad(file);
         if (!exports) continue;
         this.registry.registerModule(exports);
         for (const model of Object.values(exports).filter(isModelDefinition)) add(model, file);
      }

      for (const entry of this.options.additionalModels ?? []) {
         if (typeof entry !== "string") {
            add(entry);
            continue;
         }

         const { file, exportName } = parseModuleSpecifier(entry);
         const abs = this.resolvePath(file);
         const exports = await this.tryLoad(abs);
         if (!exports) continue;
         this.registry.registerModule(exports);

         if (exportName === undefined) {
            for (const model of Object.values(exports).filter(isModelDefinition)) add(model, abs);
            continue;
         }

         const named = exports[exportName];
         if (isModelDefinition(named)) add(named, abs);
         else this.diagnostics.skip("discovery", entry, `export ${exportName} is not a model definition`);
      }

      return [...found.values()];
   }

   /** Files whose content decides the output; watched for changes. */
   sourceFiles(): string[] {
      const additional = (this.options.additionalModels ?? [])
         .filter((e): e is string => typeof e === "string")
         .map((e) => this.resolvePath(parseModuleSpecifier(e).file));
      return [...this.modelFiles(), ...additional, ...this.classFiles()];
   }

   private modelFiles(): string[] {
      const exclude = this.options.exclude ?? [];
      const dir = this.resolvePath(this.options.modelsPath);
      return listModules(dir).filter((file) => {
         const base = path.basename(file);
         return !exclude.some((glob) => minimatch(base, glob));
      });
   }

   private classFiles(): string[] {
      return (this.options.classPaths ?? []).flatMap((entry) => {
         const abs = this.resolvePath(entry);
         return fs.existsSync(abs) && fs.statSync(abs).isDirectory() ? listModules(abs) : [abs];
      });
   }

   private resolvePath(p: string): string {
      return path.resolve(this.cwd, p);
   }

   private async tryLoad(file: string): Promise<ModuleExports | undefined> {
      try {
         return await this.load(file);
      } catch (err) {
         this.diagnostics.skip("discovery", file, `failed to load module: ${describeError(err)}`);
         return undefined;
      }
   }
}
