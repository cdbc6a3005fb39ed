// generator/ts/json-ld.ts
import type { ReservedValueObject } from "./type-mapper.js";
import type { TsInterface, TsPrinter } from "./printer.js";

export const JSON_LD_INTERFACE = "JsonLdRawNode";

/** Value object never emitted itself; fields using it get `JsonLdRawNode`. */
export const JSON_LD_RESERVED: ReservedValueObject = {
   name: "JsonLdData",
   as: JSON_LD_INTERFACE,
};

const JSON_LD_NODE: TsInterface = {
   name: JSON_LD_INTERFACE,
   members: [
      { name: "'@type'", type: "string | string[]", optional: true },
      { name: "'@id'", type: "string", optional: true },
      {
         name: "'@context'",
         type: "string | Record<string, unknown> | Array<string | Record<string, unknown>>",
         optional: true,
      },
      { name: "'@graph'", type: `${JSON_LD_INTERFACE}[]`, optional: true },
      { name: "[key: string]", type: "unknown" },
   ],
};

/** Fixed raw JSON-LD node interface, appended last when enabled. */
export class AuxiliaryInterfaceEmitter {
   constructor(private readonly printer: TsPrinter) {}

   emit(): string {
      return this.printer.printInterface(JSON_LD_NODE);
   }
}
