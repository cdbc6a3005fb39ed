// cli/watch.ts
import { spawn } from "child_process";
import { watchedFiles } from "../generator/ts/index.js";
import { DEFAULT_WATCH_INTERVAL, findConfigFile, loadConfig, type LoadedConfig } from "../utils/config.js";
import { fingerprint } from "../utils/fingerprint.js";

export interface GenCommand {
   command: string;
   args: string[];
   env?: NodeJS.ProcessEnv;
}

/** `model-ts gen` through the same node binary and entry script as this process. */
export function genCommand(config?: string): GenCommand {
   return {
      command: process.execPath,
      args: [...process.execArgv, process.argv[1], "gen", ...(config ? ["--config", config] : [])],
   };
}

/**
 * Run one generation in its own process, so every module it imports is read
 * from disk again.
 */
export function runInChild(cmd: GenCommand, cwd: string): Promise<void> {
   return new Promise((resolve, reject) => {
      const child = spawn(cmd.command, cmd.args, {
         cwd,
         env: cmd.env ?? process.env,
         stdio: "inherit",
      });
      child.on("error", reject);
      child.on("exit", (code) => {
         if (code === 0) resolve();
         else reject(new Error(`model-ts gen exited with code ${code}`));
      });
   });
}

export interface WatchHooks {
   /** Files whose contents decide whether to regenerate. */
   sources: () => Promise<string[]>;
   run: () => Promise<void>;
   onError: (err: unknown) => void;
   fingerprint?: (files: readonly string[]) => string;
}

export class WatchLoop {
   private last?: string;

   constructor(private readonly hooks: WatchHooks) {}

   async start(): Promise<void> {
      this.last = await this.snapshot();
      await this.attempt();
   }

   /** Regenerate when the sources changed since the last look. */
   async poll(): Promise<boolean> {
      const next = await this.snapshot();
      if (next === undefined || next === this.last) return false;
      this.last = next;
      await this.attempt();
      return true;
   }

   private async snapshot(): Promise<string | undefined> {
      const hash = this.hooks.fingerprint ?? fingerprint;
      try {
         return hash(await this.hooks.sources());
      } catch (e) {
         this.hooks.onError(e);
         return undefined;
      }
   }

   private async attempt(): Promise<void> {
      try {
         await this.hooks.run();
      } catch (e) {
         this.hooks.onError(e);
      }
   }
}

/** Watched files, re-reading the config whenever its file changes. */
export class WatchSources {
   private cached?: { key: string; loaded: LoadedConfig };

   constructor(
      private readonly config: string | undefined,
      private readonly cwd: string,
   ) {}

   get interval(): number {
      return this.cached?.loaded.config.watchInterval ?? DEFAULT_WATCH_INTERVAL;
   }

   async list(): Promise<string[]> {
      const file = findConfigFile(this.config, this.cwd);
      const key = file ? `${fingerprint([file])}:${file}` : "";
      if (!this.cached || this.cached.key !== key) {
         const loaded = await loadConfig(this.config, { cwd: this.cwd, fresh: this.cached !== undefined });
         this.cached = { key, loaded };
      }
      return [...watchedFiles(this.cached.loaded.config, this.cwd), ...(file ? [file] : [])];
   }
}
