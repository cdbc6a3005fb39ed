// generator/ts/printer.ts

export interface TsMember {
   /** Identifier, quoted key (`'@id'`) or index signature (`[key: string]`). */
   name: string;
   type: string;
   optional?: boolean;
}

export interface TsInterface {
   name: string;
   members: TsMember[];
}

export interface TsImport {
   from: string;
   types: string[];
}

export interface TsPrinterOptions {
   /** Member indentation. Default: four spaces. */
   indent?: string;
}

export const DEFAULT_INDENT = "    ";

/**
 * Text rendering for the generated interfaces file.
 *
 *   header
 *
 *   import { A, B } from '<path>';
 *
 *   export interface IAddressData { ... }
 *
 *   export interface IUser { ... }
 *
 * The generator joins the chunks with one blank line.
 */
export class TsPrinter {
   private readonly indent: string;

   constructor(options: TsPrinterOptions = {}) {
      this.indent = options.indent ?? DEFAULT_INDENT;
   }

   printHeader(regenerateCommand: string, generatedAt: string): string {
      return [
         "/**",
         " * Generated TypeScript interfaces",
         " *",
         " * This file is auto-generated. Do not edit directly.",
         ` * Run \`${regenerateCommand}\` to regenerate it.`,
         " *",
         ` * @generated ${generatedAt}`,
         "*/",
      ].join("\n");
   }

   /** One line per module, in the order given. Empty input → "". */
   printImports(imports: readonly TsImport[]): string {
      return imports
         .filter((i) => i.types.length)
         .map((i) => `import { ${i.types.join(", ")} } from '${i.from}';`)
         .join("\n");
   }

   printMember(member: TsMember): string {
      return `${member.name}${member.optional ? "?" : ""}: ${member.type};`;
   }

   printInterface(decl: TsInterface): string {
      const body = decl.members.map((m) => this.printMember(m)).join("\n");
      return body
         ? `export interface ${decl.name} {\n${indentBlock(body, this.indent)}\n}`
         : `export interface ${decl.name} {}`;
   }
}

export function indentBlock(text: string, indent: string = DEFAULT_INDENT): string {
   return text
      .split("\n")
      .map((line) => (line.trim() ? indent + line : line))
      .join("\n");
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
   const pad = (n: number) => String(n).padStart(2, "0");
   return (
      `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
      `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
   );
}
