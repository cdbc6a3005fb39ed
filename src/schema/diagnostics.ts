// schema/diagnostics.ts

export type DiagnosticScope =
   | "discovery"
   | "relationship"
   | "cast"
   | "value-object"
   | "schema";

export interface Diagnostic {
   scope: DiagnosticScope;
   /** What was skipped, e.g. "Models.User::posts". */
   subject: string;
   reason: string;
}

/** Outcome of a step that may skip instead of failing the run. */
export type Resolution<T> =
   | { ok: true; value: T }
   | { ok: false; reason: string };

export const resolved = <T>(value: T): Resolution<T> => ({ ok: true, value });
export const skipped = <T = never>(reason: string): Resolution<T> => ({ ok: false, reason });

export function describeError(err: unknown): string {
   return err instanceof Error ? err.message : String(err);
}

/**
 * Run-scoped collector for skipped work. Extraction keeps going after a
 * skip; the CLI prints what was collected once the run completes.
 */
export class Diagnostics {
   private readonly entries: Diagnostic[] = [];

   skip(scope: DiagnosticScope, subject: string, reason: string): void {
      this.entries.push({ scope, subject, reason });
   }

   /** Unwrap a resolution, recording the skip when it failed. */
   take<T>(scope: DiagnosticScope, subject: string, result: Resolution<T>): T | undefined {
      if (result.ok) return result.value;
      this.skip(scope, subject, result.reason);
      return undefined;
   }

   all(): readonly Diagnostic[] {
      return this.entries;
   }

   get size(): number {
      return this.entries.length;
   }

   format(): string[] {
      return this.entries.map((d) => `[${d.scope}] ${d.subject}: ${d.reason}`);
   }
}
