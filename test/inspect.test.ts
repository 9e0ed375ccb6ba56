import { describe, it } from "node:test";
import assert from "node:assert";
import {
  describeRow,
  formatReport,
  parseColumnTypes,
  parseHex,
  toHex,
} from "../inspect.ts";
import { decodeBinaryRow, decodeTextRow } from "../protocol/decode.ts";
import { ColumnType } from "../protocol/constants.ts";
import { assertBytes, MIXED_COLUMNS, MIXED_ROW } from "./test_utils.ts";

describe("parseColumnTypes", () => {
  it("accepts names and numeric ids", () => {
    assert.deepStrictEqual(parseColumnTypes("LONG, var_string,0xfc, 7"), [
      ColumnType.LONG,
      ColumnType.VAR_STRING,
      ColumnType.BLOB,
      ColumnType.TIMESTAMP,
    ]);
  });

  it("skips empty entries", () => {
    assert.deepStrictEqual(parseColumnTypes("LONG,,TINY,"), [3, 1]);
  });

  it("rejects unknown names and ids above 0xff", () => {
    assert.throws(() => parseColumnTypes("LONG,NOPE"), /Unknown column type 'NOPE'/);
    assert.throws(() => parseColumnTypes("256"), /Column type id out of range: '256'/);
  });
});

describe("parseHex", () => {
  it("ignores whitespace and colons", () => {
    assertBytes(parseHex("00 0a:FF\n10"), [0x00, 0x0a, 0xff, 0x10]);
  });

  it("rejects odd lengths and non-hex digits", () => {
    assert.throws(() => parseHex("abc"), /Invalid hex payload/);
    assert.throws(() => parseHex("zz"), /Invalid hex payload/);
  });

  it("round-trips through toHex", () => {
    assert.strictEqual(toHex(parseHex("00ff7a")), "00ff7a");
  });
});

describe("row reports", () => {
  it("describes present and NULL columns", () => {
    const row = decodeTextRow(Uint8Array.of(3, 0x66, 0x6f, 0x6f, 0xfb), [ColumnType.VAR_STRING, 0x42]);
    assert.deepStrictEqual(describeRow(row, [ColumnType.VAR_STRING, 0x42]), {
      columns: [
        { index: 0, type: "VAR_STRING", null: false, start: 0, end: 4, hex: "03666f6f" },
        { index: 1, type: "0x42", null: true },
      ],
      byteLength: 5,
    });
  });

  it("serializes a report as one JSON line", () => {
    const row = decodeBinaryRow(MIXED_ROW, MIXED_COLUMNS);
    const report = describeRow(row, MIXED_COLUMNS);
    const line = formatReport(report);

    assert.ok(!line.includes("\n"));
    assert.deepStrictEqual(JSON.parse(line), report);
    assert.deepStrictEqual(report.columns[1], {
      index: 1,
      type: "VAR_STRING",
      null: false,
      start: 4,
      end: 9,
      hex: "0472757374",
    });
    assert.deepStrictEqual(report.columns[4], { index: 4, type: "TIMESTAMP", null: true });
  });
});
