import type { CallSuccess, JsonValue } from "../work/work.types";

export type CellValue = string | number | boolean | null;

export type ResultRow = Record<string, CellValue>;

export type NormalizedTable = {
  columns: string[];
  rows: ResultRow[];
};

type JsonObject = { [key: string]: JsonValue };

const isJsonObject = (value: JsonValue): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// defineProperty keeps keys such as "__proto__" as plain own columns.
const setCell = (row: ResultRow, key: string, value: CellValue): void => {
  Object.defineProperty(row, key, { value, writable: true, enumerable: true, configurable: true });
};

const flatten = (value: JsonObject, prefix: string, into: ResultRow): ResultRow => {
  for (const [key, child] of Object.entries(value)) {
    const path = prefix === "" ? key : `${prefix}.${key}`;
    if (isJsonObject(child)) {
      flatten(child, path, into);
    } else if (Array.isArray(child)) {
      setCell(into, path, JSON.stringify(child));
    } else {
      setCell(into, path, child);
    }
  }
  return into;
};

const responseRecords = (payload: JsonValue): JsonObject[] => {
  if (Array.isArray(payload)) return payload.filter(isJsonObject);
  if (isJsonObject(payload)) return [payload];
  return [];
};

/**
 * One row per (account, response record). Response keys win over `username`
 * when the API echoes one back.
 */
export const normalizeResults = (results: readonly CallSuccess[]): NormalizedTable => {
  const columns = new Set<string>(["username"]);
  const rows: ResultRow[] = [];

  for (const result of results) {
    for (const record of responseRecords(result.payload)) {
      const row = flatten(record, "", { username: result.item });
      for (const key of Object.keys(row)) columns.add(key);
      rows.push(row);
    }
  }

  return { columns: Array.from(columns), rows };
};
