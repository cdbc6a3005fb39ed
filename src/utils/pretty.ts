// utils/pretty.ts
import * as prettier from "prettier";

let cachedConfig: prettier.Config | null | undefined;

/** Load user's Prettier config once (respects .prettierrc / package.json / overrides). */
async function loadConfig(filePath?: string): Promise<prettier.Config | null> {
   if (cachedConfig !== undefined) return cachedConfig;
   try {
      cachedConfig = await prettier.resolveConfig(filePath || process.cwd());
   } catch {
      cachedConfig = null; // fall back to defaults
   }
   return cachedConfig;
}

/** Format generated TypeScript; returns the input unchanged when prettier fails. */
export async function prettyTs(content: string, opts: { filepathHint?: string } = {}): Promise<string> {
   try {
      const base = (await loadConfig(opts.filepathHint)) ?? {};
      return await prettier.format(content, {
         ...base,
         parser: "typescript",
         filepath: opts.filepathHint,
      });
   } catch {
      return content;
   }
}
