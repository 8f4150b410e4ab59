import { readFileSync } from "node:fs";
import { asRecord, parseHex } from "./utils.js";

export const TABLE_NAMES = [
  "returnCodes",
  "scopes",
  "shareModes",
  "protocols",
  "dispositions",
  "attributes",
  "readerStates",
  "cardStates",
  "featureTags",
  "controlCodes",
  "tlvProperties",
] as const;

export type TableName = (typeof TABLE_NAMES)[number];
export type CodeTable = ReadonlyMap<number, string>;

export const UNKNOWN = "UNKNOWN";
export const SCARD_S_SUCCESS = 0x00000000;
export const CM_IOCTL_GET_FEATURE_REQUEST = 0x42000d48;

const CONSTANTS_URL = new URL("../data/pcsc-constants.json", import.meta.url);

function toCodeTable(name: string, value: unknown): CodeTable {
  const table = new Map<number, string>();
  for (const [key, symbol] of Object.entries(asRecord(value))) {
    const code = parseHex(key);
    if (code === null || typeof symbol !== "string") {
      throw new Error(`invalid entry ${key} in constants table ${name}`);
    }
    table.set(code, symbol);
  }
  return table;
}

function loadTables(): Readonly<Record<TableName, CodeTable>> {
  const document = asRecord(JSON.parse(readFileSync(CONSTANTS_URL, "utf8")));
  const tables: Partial<Record<TableName, CodeTable>> = {};
  for (const name of TABLE_NAMES) {
    if (!(name in document)) {
      throw new Error(`constants table ${name} is missing from ${CONSTANTS_URL.pathname}`);
    }
    tables[name] = toCodeTable(name, document[name]);
  }
  return {
    returnCodes: tables.returnCodes ?? new Map(),
    scopes: tables.scopes ?? new Map(),
    shareModes: tables.shareModes ?? new Map(),
    protocols: tables.protocols ?? new Map(),
    dispositions: tables.dispositions ?? new Map(),
    attributes: tables.attributes ?? new Map(),
    readerStates: tables.readerStates ?? new Map(),
    cardStates: tables.cardStates ?? new Map(),
    featureTags: tables.featureTags ?? new Map(),
    controlCodes: tables.controlCodes ?? new Map(),
    tlvProperties: tables.tlvProperties ?? new Map(),
  };
}

export const PCSC_TABLES = loadTables();

export function isTableName(value: string): value is TableName {
  return TABLE_NAMES.some((name) => name === value);
}

export function lookup(table: CodeTable, code: number): string {
  return table.get(code) ?? UNKNOWN;
}

/**
 * Names of the bits set in `value`, comma-joined. A zero value uses the
 * table's zero entry when it has one.
 */
export function flagNames(table: CodeTable, value: number): string {
  if (value === 0) {
    return lookup(table, 0);
  }
  const names: string[] = [];
  for (const [bit, name] of table) {
    if (bit !== 0 && (value & bit) === bit) {
      names.push(name);
    }
  }
  return names.length > 0 ? names.join(", ") : UNKNOWN;
}

export function codeForName(table: CodeTable, symbol: string): number | null {
  for (const [code, name] of table) {
    if (name === symbol) return code;
  }
  return null;
}
