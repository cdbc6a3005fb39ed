// utils/fingerprint.ts
import { createHash } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";

const md5 = (data: string | Buffer) => createHash("md5").update(data).digest("hex");

/**
 * md5 over the md5 and path of every file, in the order given. Missing
 * files hash as empty.
 */
export function fingerprint(files: readonly string[]): string {
   const combined = files
      .map((file) => (existsSync(file) ? md5(readFileSync(file)) : md5("")) + ":" + file)
      .join("\n");
   return md5(combined);
}
