/**
 * Helpers behind the inspect CLI: parse column types and hex payloads, and
 * render a decoded row as one JSON line.
 */

import fastJsonStringify from "fast-json-stringify";
import { ColumnType, columnTypeName, isColumnTypeName } from "./protocol/constants.ts";
import type { Row } from "./protocol/row.ts";

const NUMERIC_TYPE = /^(0x[0-9a-f]+|\d+)$/i;

/**
 * Parse a comma-separated column type list. Entries are type names
 * (case-insensitive, e.g. `var_string`) or ids (`253`, `0xfd`).
 */
export function parseColumnTypes(list: string): number[] {
  const types: number[] = [];
  for (const raw of list.split(",")) {
    const token = raw.trim();
    if (!token) continue;

    if (NUMERIC_TYPE.test(token)) {
      const id = Number(token);
      if (id > 0xff) throw new Error(`Column type id out of range: '${token}'`);
      types.push(id);
      continue;
    }

    const name = token.toUpperCase();
    if (!isColumnTypeName(name)) throw new Error(`Unknown column type '${token}'`);
    types.push(ColumnType[name]);
  }
  return types;
}

/** Parse hex digits; whitespace and ':' separators are ignored. */
export function parseHex(text: string): Uint8Array {
  const hex = text.replace(/[\s:]/g, "");
  if (hex.length % 2 !== 0 || /[^0-9a-f]/i.test(hex)) {
    throw new Error(`Invalid hex payload: '${text}'`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function toHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) out += b.toString(16).padStart(2, "0");
  return out;
}

export interface ColumnReport {
  index: number;
  type: string;
  null: boolean;
  start?: number;
  end?: number;
  hex?: string;
}

export interface RowReport {
  columns: ColumnReport[];
  byteLength: number;
}

export function describeRow(row: Row, columns: readonly number[]): RowReport {
  const report: ColumnReport[] = [];
  for (let i = 0; i < row.length; i++) {
    const type = columnTypeName(columns[i]) ?? `0x${columns[i].toString(16)}`;
    const range = row.range(i);
    const bytes = row.get(i);
    if (range === null || bytes === null) {
      report.push({ index: i, type, null: true });
    } else {
      report.push({ index: i, type, null: false, start: range[0], end: range[1], hex: toHex(bytes) });
    }
  }
  return { columns: report, byteLength: row.byteLength };
}

const stringifyReport = fastJsonStringify({
  type: "object",
  properties: {
    columns: {
      type: "array",
      items: {
        type: "object",
        properties: {
          index: { type: "integer" },
          type: { type: "string" },
          null: { type: "boolean" },
          start: { type: "integer" },
          end: { type: "integer" },
          hex: { type: "string" },
        },
        required: ["index", "type", "null"],
      },
    },
    byteLength: { type: "integer" },
  },
  required: ["columns", "byteLength"],
});

export function formatReport(report: RowReport): string {
  return stringifyReport(report);
}
