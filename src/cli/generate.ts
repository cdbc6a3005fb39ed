// cli/generate.ts
import { setTimeout as sleep } from "node:timers/promises";
import path from "path";
import { generateTypes, type GenerateResult } from "../generator/ts/index.js";
import type { Diagnostics } from "../schema/diagnostics.js";
import { loadConfig } from "../utils/config.js";
import { genCommand, runInChild, WatchLoop, WatchSources, type GenCommand } from "./watch.js";

export interface RunOptions {
   /** Explicit config file (`--config`). */
   config?: string;
   cwd?: string;
}

export function reportDiagnostics(diagnostics: Diagnostics): void {
   for (const line of diagnostics.format()) console.warn(`⚠️  ${line}`);
}

/** Load config, generate, print the outcome. Errors propagate. */
export async function runGeneration(opts: RunOptions = {}): Promise<GenerateResult> {
   const cwd = opts.cwd ?? process.cwd();
   const { config, file } = await loadConfig(opts.config, { cwd });
   if (file) console.log(`Loading config from - ${path.relative(cwd, file) || file}`);

   const result = await generateTypes(config, { cwd });

   reportDiagnostics(result.diagnostics);
   console.log(`✅ TypeScript types generated → ${path.relative(cwd, result.outputPath)}`);
   if (result.schemaPath) console.log(`➡️  Schema saved → ${path.relative(cwd, result.schemaPath)}`);
   return result;
}

export interface WatchOptions extends RunOptions {
   /** How each regeneration is started. Default: this binary's `gen`. */
   command?: GenCommand;
}

export function createWatchLoop(opts: WatchOptions, sources: WatchSources): WatchLoop {
   const cwd = opts.cwd ?? process.cwd();
   const command = opts.command ?? genCommand(opts.config);
   return new WatchLoop({
      sources: () => sources.list(),
      run: () => runInChild(command, cwd),
      onError: (e) => console.error("❌ Gen failed:", e instanceof Error ? e.message : e),
   });
}

/**
 * Generate, then poll the model sources and regenerate whenever their
 * fingerprint changes. Each run is a fresh `model-ts gen` process. Runs until
 * the process is killed; a failing run is reported and the loop keeps going.
 */
export async function watchAndGenerate(opts: WatchOptions = {}): Promise<never> {
   const sources = new WatchSources(opts.config, opts.cwd ?? process.cwd());
   const loop = createWatchLoop(opts, sources);

   await loop.start();
   console.log("👀 Watching for changes in model sources...");

   for (;;) {
      await sleep(sources.interval);
      await loop.poll();
   }
}
