// writer/writer.ts
import { existsSync, mkdirSync, writeFileSync } from "fs";
import path from "path";
import { prettyTs } from "../utils/pretty.js";

export interface WriteOptions {
   /** Format with prettier (typescript parser) before writing. */
   prettier?: boolean;
}

function ensureDir(filePath: string): void {
   const dir = path.dirname(filePath);
   if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}

/**
 * Replace `filePath` with `content` in one write. Returns the text written.
 * I/O errors propagate.
 */
export async function writeOutput(filePath: string, content: string, options: WriteOptions = {}): Promise<string> {
   const text = options.prettier ? await prettyTs(content, { filepathHint: filePath }) : content;
   ensureDir(filePath);
   writeFileSync(filePath, text, "utf-8");
   return text;
}

export function writeJson(filePath: string, data: unknown): void {
   ensureDir(filePath);
   writeFileSync(filePath, JSON.stringify(data, null, 4) + "\n", "utf-8");
}
