import { ColumnType, FixedWidth } from "./constants.ts";
import { UnsupportedColumnTypeError } from "./errors.ts";
import { ensureAvailable, lenencSize } from "./io.ts";

/**
 * Byte length of a binary protocol value of wire-type `type` at `offset`.
 *
 * Only the bytes needed to learn the size are read (and bounds-checked); the
 * caller checks the value itself fits.
 */
export function fieldSize(type: number, buffer: Uint8Array, offset: number): number {
  switch (type) {
    case ColumnType.TINY:
      return FixedWidth.TINY;
    case ColumnType.SHORT:
      return FixedWidth.SHORT;
    case ColumnType.LONG:
      return FixedWidth.LONG;
    case ColumnType.LONGLONG:
      return FixedWidth.LONGLONG;
    case ColumnType.DATE:
      return FixedWidth.DATE;

    // Length byte, then 0..N bytes (fractional seconds included)
    case ColumnType.TIME:
    case ColumnType.TIMESTAMP:
    case ColumnType.DATETIME:
      ensureAvailable(buffer, offset, 1, "temporal length");
      return 1 + buffer[offset];

    case ColumnType.TINY_BLOB:
    case ColumnType.MEDIUM_BLOB:
    case ColumnType.LONG_BLOB:
    case ColumnType.BLOB:
    case ColumnType.STRING:
    case ColumnType.VAR_STRING:
      return lenencSize(buffer, offset);

    default:
      throw new UnsupportedColumnTypeError(type);
  }
}
