import { columnTypeName } from "./constants.ts";

export type RowDecodeErrorKind = "ProtocolViolation" | "Truncated" | "UnsupportedType";

/**
 * Base class for every failure raised while decoding a row.
 *
 * `row` and `column` are filled in by the decoder as the error propagates, so
 * the message names where in the result set decoding stopped.
 */
export class RowDecodeError extends Error {
  readonly kind: RowDecodeErrorKind;
  readonly detail: string;
  row?: number;
  column?: number;

  constructor(kind: RowDecodeErrorKind, message: string) {
    super(message);
    this.name = "RowDecodeError";
    this.kind = kind;
    this.detail = message;
  }

  /** Record the row/column location (first writer wins) and refresh the message. */
  locate(location: { row?: number; column?: number }): this {
    if (this.row === undefined && location.row !== undefined) this.row = location.row;
    if (this.column === undefined && location.column !== undefined) this.column = location.column;

    const parts: string[] = [];
    if (this.row !== undefined) parts.push(`row ${this.row}`);
    if (this.column !== undefined) parts.push(`column ${this.column}`);
    this.message = parts.length > 0 ? `${this.detail} (${parts.join(", ")})` : this.detail;
    return this;
  }
}

export class ProtocolViolationError extends RowDecodeError {
  constructor(message: string) {
    super("ProtocolViolation", message);
    this.name = "ProtocolViolationError";
  }
}

export class BufferUnderflowError extends RowDecodeError {
  constructor(message: string) {
    super("Truncated", message);
    this.name = "BufferUnderflowError";
  }
}

export class UnsupportedColumnTypeError extends RowDecodeError {
  readonly columnType: number;

  constructor(columnType: number) {
    const name = columnTypeName(columnType);
    const hex = `0x${columnType.toString(16).padStart(2, "0")}`;
    super(
      "UnsupportedType",
      name ? `Unsupported column type ${name} (${hex})` : `Unknown column type ${hex}`,
    );
    this.name = "UnsupportedColumnTypeError";
    this.columnType = columnType;
  }
}
