// utils/loader.ts
import fs from "fs";
import { readFile } from "fs/promises";
import { createRequire } from "module";
import { extname, dirname, resolve } from "path";
import { pathToFileURL } from "url";

export type ModuleExports = Record<string, unknown>;

export interface LoadOptions {
   /** Bypass module caches so edited files are read again (watch mode). */
   fresh?: boolean;
}

function nearestPkgType(fromPath: string): "module" | "commonjs" {
   let dir = dirname(fromPath);
   for (;;) {
      const pj = resolve(dir, "package.json");
      if (fs.existsSync(pj)) {
         try {
            const pkg: unknown = JSON.parse(fs.readFileSync(pj, "utf8"));
            const isModule =
               typeof pkg === "object" && pkg !== null && "type" in pkg && pkg.type === "module";
            return isModule ? "module" : "commonjs";
         } catch {
            return "commonjs"; // unreadable package.json
         }
      }
      const up = dirname(dir);
      if (up === dir) break;
      dir = up;
   }
   return "commonjs";
}

/** module.exports / ESM namespace → plain export record. */
function toExports(mod: unknown): ModuleExports {
   if (typeof mod !== "object" || mod === null) return { default: mod };
   return Object.fromEntries(Object.entries(mod));
}

const req = createRequire(import.meta.url);
const cache = new Map<string, Promise<ModuleExports>>();

function requireFresh(absPath: string, fresh: boolean): unknown {
   if (fresh) delete req.cache[req.resolve(absPath)];
   return req(absPath);
}

async function importFresh(url: string, fresh: boolean): Promise<unknown> {
   return import(fresh ? `${url}?t=${Date.now()}` : url);
}

async function loadModuleUniversal(absPath: string, fresh: boolean): Promise<ModuleExports> {
   const ext = extname(absPath).toLowerCase();
   const asUrl = pathToFileURL(absPath).href;

   // Explicit extensions
   if (ext === ".cjs") return toExports(requireFresh(absPath, fresh));
   if (ext === ".mjs") return toExports(await importFresh(asUrl, fresh));

   // .js — ambiguous; read file to decide
   const code = await readFile(absPath, "utf8");
   const looksCJS = /\bmodule\.exports\b|\bexports\s*=/.test(code);
   const projType = nearestPkgType(absPath);

   if (projType === "commonjs" && looksCJS) {
      return toExports(requireFresh(absPath, fresh));
   }

   if (projType === "module" && looksCJS) {
      // ESM project but CJS code → wrap on the fly via data URL
      const wrapped =
         `const module = { exports: {} }; const exports = module.exports;\n` +
         code +
         `\nexport default module.exports;`;
      const dataUrl =
         "data:text/javascript;base64," + Buffer.from(wrapped, "utf8").toString("base64");
      const mod = toExports(await import(dataUrl));
      return toExports(mod.default);
   }

   // Otherwise: treat as ESM
   return toExports(await importFresh(asUrl, fresh));
}

/**
 * Load a `.js` / `.mjs` / `.cjs` module, relative to the working directory,
 * whatever module system the surrounding project uses.
 */
export async function loadModule(modulePath: string, options: LoadOptions = {}): Promise<ModuleExports> {
   const absPath = resolve(process.cwd(), modulePath);
   const fresh = options.fresh ?? false;

   if (!fresh) {
      const hit = cache.get(absPath);
      if (hit) return hit;
   }

   const p = loadModuleUniversal(absPath, fresh);
   cache.set(absPath, p);
   // a failed load must not stay cached
   p.catch(() => cache.delete(absPath));
   return p;
}

/** The module's default export, or its whole namespace when it has none. */
export function defaultExport(exports: ModuleExports): unknown {
   return exports.default ?? exports;
}
