import { BinaryRow } from "./constants.ts";
import type { BufferReader } from "./io.ts";

/**
 * NULL bitmap of a binary protocol row.
 *
 * Result-set rows reserve the first two bits, so column i lives at bit i + 2:
 *
 *   byte 0: [c5 c4 c3 c2 c1 c0 -- --]
 *   byte 1: [c13 ...            c6  ]
 */
export class NullBitmap {
  private readonly bits: Uint8Array;
  readonly columnCount: number;

  private constructor(bits: Uint8Array, columnCount: number) {
    this.bits = bits;
    this.columnCount = columnCount;
  }

  /** Bitmap size in bytes for `columnCount` columns: (n + 7 + 2) / 8 */
  static byteLength(columnCount: number): number {
    return (columnCount + 7 + BinaryRow.NULL_BITMAP_OFFSET) >> 3;
  }

  /** Consume the bitmap from `reader`, which must sit just past the row header. */
  static read(reader: BufferReader, columnCount: number): NullBitmap {
    const bits = reader.readBytes(NullBitmap.byteLength(columnCount), "null bitmap");
    return new NullBitmap(bits, columnCount);
  }

  isNull(column: number): boolean {
    if (!Number.isInteger(column) || column < 0 || column >= this.columnCount) {
      throw new RangeError(`Column ${column} out of range [0, ${this.columnCount})`);
    }
    const bit = column + BinaryRow.NULL_BITMAP_OFFSET;
    return (this.bits[bit >> 3] & (1 << (bit & 7))) !== 0;
  }
}
