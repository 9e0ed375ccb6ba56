/** Half-open byte range [start, end) into a row buffer. */
export type FieldRange = readonly [start: number, end: number];

/**
 * One decoded result-set row.
 *
 * Owns a single byte buffer; columns are index ranges into it, or null for
 * SQL NULL. get() hands out subarray views, so the bytes are not copied (and
 * should not be written through).
 */
export class Row implements Iterable<Uint8Array | null> {
  private readonly buffer: Uint8Array;
  private readonly values: readonly (FieldRange | null)[];

  constructor(buffer: Uint8Array, values: readonly (FieldRange | null)[]) {
    this.buffer = buffer;
    this.values = values;
  }

  /** Number of columns */
  get length(): number {
    return this.values.length;
  }

  /** Size of the owned buffer */
  get byteLength(): number {
    return this.buffer.length;
  }

  range(index: number): FieldRange | null {
    return this.values[this.checkIndex(index)];
  }

  isNull(index: number): boolean {
    return this.range(index) === null;
  }

  get(index: number): Uint8Array | null {
    const range = this.range(index);
    if (range === null) return null;
    return this.buffer.subarray(range[0], range[1]);
  }

  *[Symbol.iterator](): Iterator<Uint8Array | null> {
    for (let i = 0; i < this.values.length; i++) yield this.get(i);
  }

  private checkIndex(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.values.length) {
      throw new RangeError(`Column index ${index} out of range [0, ${this.values.length})`);
    }
    return index;
  }
}
