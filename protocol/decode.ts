import { BinaryRow } from "./constants.ts";
import { ProtocolViolationError, RowDecodeError } from "./errors.ts";
import { fieldSize } from "./field_size.ts";
import { BufferReader, ensureAvailable, lenencHeader } from "./io.ts";
import { NullBitmap } from "./null_bitmap.ts";
import { Row, type FieldRange } from "./row.ts";

/** "text" for plain query results, "binary" for prepared-statement results */
export type RowFormat = "text" | "binary";

export interface RowDecodeOptions {
  /** Fail when bytes remain after the last column (default: false) */
  rejectTrailingBytes?: boolean;
  debug?: boolean;
  /** Sink for debug output (default: console.log) */
  logger?: (...args: unknown[]) => void;
}

function log(options: RowDecodeOptions, ...args: unknown[]) {
  if (options.debug) {
    (options.logger ?? console.log)("[RowDecoder]", ...args);
  }
}

function atColumn(err: unknown, column: number): unknown {
  if (err instanceof RowDecodeError) err.locate({ column });
  return err;
}

function checkTrailing(buffer: Uint8Array, offset: number, options: RowDecodeOptions) {
  if (options.rejectTrailingBytes && offset !== buffer.length) {
    throw new ProtocolViolationError(
      `${buffer.length - offset} trailing bytes after last column at offset ${offset}`,
    );
  }
}

/**
 * Decode a text protocol row: every column is a length-encoded string.
 *
 * A 0xFB prefix is SQL NULL; its marker byte is consumed and the column reads
 * back as null. Ranges of present columns include the length prefix.
 */
export function decodeTextRow(
  payload: Uint8Array,
  columns: readonly number[],
  options: RowDecodeOptions = {},
): Row {
  const buffer = new Uint8Array(payload);
  const values: (FieldRange | null)[] = [];
  let offset = 0;

  for (let i = 0; i < columns.length; i++) {
    try {
      const { prefixSize, length } = lenencHeader(buffer, offset);
      if (length === null) {
        values.push(null);
        offset += prefixSize;
        continue;
      }
      const size = prefixSize + length;
      ensureAvailable(buffer, offset, size, "column value");
      values.push([offset, offset + size]);
      offset += size;
    } catch (err) {
      throw atColumn(err, i);
    }
  }

  checkTrailing(buffer, offset, options);
  log(options, `text row: ${columns.length} columns, ${buffer.length} bytes`);
  return new Row(buffer, values);
}

/**
 * Decode a binary protocol row:
 *
 *   0x00 header | null bitmap ((n + 9) / 8 bytes) | values
 *
 * The row buffer holds only the values, so ranges start at 0. NULL columns
 * take no bytes.
 */
export function decodeBinaryRow(
  payload: Uint8Array,
  columns: readonly number[],
  options: RowDecodeOptions = {},
): Row {
  const reader = new BufferReader(payload);

  const header = reader.readU8();
  if (header !== BinaryRow.HEADER) {
    throw new ProtocolViolationError(
      `Expected binary row header 0x00, got 0x${header.toString(16).padStart(2, "0")}`,
    );
  }

  const nulls = NullBitmap.read(reader, columns.length);
  const buffer = reader.takeRest();
  const values: (FieldRange | null)[] = [];
  let offset = 0;
  let nullCount = 0;

  for (let i = 0; i < columns.length; i++) {
    if (nulls.isNull(i)) {
      values.push(null);
      nullCount++;
      continue;
    }
    try {
      const size = fieldSize(columns[i], buffer, offset);
      ensureAvailable(buffer, offset, size, "column value");
      values.push([offset, offset + size]);
      offset += size;
    } catch (err) {
      throw atColumn(err, i);
    }
  }

  checkTrailing(buffer, offset, options);
  log(
    options,
    `binary row: ${columns.length} columns (${nullCount} null), ${buffer.length} bytes`,
  );
  return new Row(buffer, values);
}

export function decodeRow(
  payload: Uint8Array,
  columns: readonly number[],
  format: RowFormat,
  options: RowDecodeOptions = {},
): Row {
  switch (format) {
    case "text":
      return decodeTextRow(payload, columns, options);
    case "binary":
      return decodeBinaryRow(payload, columns, options);
    default: {
      const unknown: never = format;
      throw new TypeError(`Unknown row format: ${String(unknown)}`);
    }
  }
}

export interface RowDecoderOptions extends RowDecodeOptions {
  format: RowFormat;
  /** Column wire-types of the result set, in column order */
  columns: readonly number[];
}

/**
 * Decoder bound to one result set. Errors it raises carry the zero-based
 * index of the row being decoded.
 *
 * @example
 * const decoder = new RowDecoder({ format: "binary", columns: [ColumnType.LONG] });
 * for (const payload of payloads) {
 *   const row = decoder.decode(payload);
 * }
 */
export class RowDecoder {
  private readonly options: RowDecoderOptions;
  private readonly columns: readonly number[];
  private rows = 0;

  constructor(options: RowDecoderOptions) {
    this.options = {
      rejectTrailingBytes: false,
      debug: false,
      logger: console.log,
      ...options,
    };
    this.columns = [...options.columns];
    log(this.options, `${this.options.format} result set with ${this.columns.length} columns`);
  }

  get format(): RowFormat {
    return this.options.format;
  }

  get columnCount(): number {
    return this.columns.length;
  }

  /** Rows attempted so far, failed ones included */
  get rowCount(): number {
    return this.rows;
  }

  decode(payload: Uint8Array): Row {
    const row = this.rows++;
    try {
      return decodeRow(payload, this.columns, this.options.format, this.options);
    } catch (err) {
      if (err instanceof RowDecodeError) {
        err.locate({ row });
        log(this.options, `row ${row} failed: ${err.message}`);
      }
      throw err;
    }
  }
}
