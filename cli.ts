#!/usr/bin/env node
/**
 * Row inspect CLI - decodes one row payload and prints it as NDJSON.
 *
 * Usage:
 *   npm run inspect -- binary LONG,VAR_STRING 0000040000000472757374
 *   npm run inspect -- text var_string,var_string 03666f6ffb
 *
 * Environment:
 *   MYSQL_ROW_DEBUG  - "1" to trace decoding to stdout
 *   MYSQL_ROW_STRICT - "1" to reject trailing bytes after the last column
 */

import { RowDecoder, type RowFormat } from "./protocol/decode.ts";
import { describeRow, formatReport, parseColumnTypes, parseHex } from "./inspect.ts";

const options = {
  debug: process.env.MYSQL_ROW_DEBUG === "1",
  rejectTrailingBytes: process.env.MYSQL_ROW_STRICT === "1",
};

function parseFormat(value: string | undefined): RowFormat {
  if (value === "text" || value === "binary") return value;
  throw new Error(`Expected row format 'text' or 'binary', got '${value ?? ""}'`);
}

function main() {
  const [formatArg, typesArg, ...hexArgs] = process.argv.slice(2);
  if (!typesArg || hexArgs.length === 0) {
    throw new Error("Usage: inspect <text|binary> <types> <hex-payload>");
  }

  const columns = parseColumnTypes(typesArg);
  const decoder = new RowDecoder({ ...options, format: parseFormat(formatArg), columns });
  const row = decoder.decode(parseHex(hexArgs.join("")));
  console.log(formatReport(describeRow(row, columns)));
}

try {
  main();
} catch (err) {
  console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
