/**
 * Bounds-checked byte access and length-encoded integers.
 *
 * Nothing here reads past the end of a buffer: availability is checked first
 * and a shortfall raises BufferUnderflowError.
 */

import { LenEnc } from "./constants.ts";
import { BufferUnderflowError, ProtocolViolationError } from "./errors.ts";

const TWO_POW_32 = 0x1_0000_0000;
/** Largest high word of a u64 that still fits Number.MAX_SAFE_INTEGER */
const MAX_SAFE_HIGH_WORD = 0x1f_ffff;

export function ensureAvailable(
  buffer: Uint8Array,
  offset: number,
  bytes: number,
  what = "value",
): void {
  if (offset + bytes > buffer.length) {
    throw new BufferUnderflowError(
      `Need ${bytes} bytes for ${what} at offset ${offset}, only ${Math.max(0, buffer.length - offset)} available`,
    );
  }
}

export function readU16LE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 2, "u16");
  return buffer[offset] | (buffer[offset + 1] << 8);
}

export function readU24LE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 3, "u24");
  return buffer[offset] | (buffer[offset + 1] << 8) | (buffer[offset + 2] << 16);
}

function readU32LE(buffer: Uint8Array, offset: number): number {
  // >>> 0 keeps the top bit from turning the result negative
  return (
    (buffer[offset] |
      (buffer[offset + 1] << 8) |
      (buffer[offset + 2] << 16) |
      (buffer[offset + 3] << 24)) >>>
    0
  );
}

/**
 * Read a u64 LE as a number. Lengths past 2^53 can never be satisfied by an
 * in-memory buffer, so they are reported as truncation.
 */
export function readU64LE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 8, "u64");
  const low = readU32LE(buffer, offset);
  const high = readU32LE(buffer, offset + 4);
  if (high > MAX_SAFE_HIGH_WORD) {
    throw new BufferUnderflowError(
      `Length at offset ${offset} exceeds ${Number.MAX_SAFE_INTEGER} bytes`,
    );
  }
  return high * TWO_POW_32 + low;
}

export interface LenEncHeader {
  /** Bytes taken by the prefix byte plus any length that follows it */
  prefixSize: number;
  /** Payload length; null for the 0xFB NULL marker */
  length: number | null;
}

/**
 * Decode the prefix of a length-encoded field without touching its payload.
 *
 *   < 0xFB  literal length           (1 byte)
 *   0xFB    NULL marker              (1 byte)
 *   0xFC    u16 LE length follows    (3 bytes)
 *   0xFD    u24 LE length follows    (4 bytes)
 *   0xFE    u64 LE length follows    (9 bytes)
 */
export function lenencHeader(buffer: Uint8Array, offset: number): LenEncHeader {
  ensureAvailable(buffer, offset, 1, "length prefix");
  const first = buffer[offset];

  if (first <= LenEnc.MAX_LITERAL) return { prefixSize: 1, length: first };

  switch (first) {
    case LenEnc.NULL:
      return { prefixSize: 1, length: null };
    case LenEnc.U16:
      return { prefixSize: 3, length: readU16LE(buffer, offset + 1) };
    case LenEnc.U24:
      return { prefixSize: 4, length: readU24LE(buffer, offset + 1) };
    case LenEnc.U64:
      return { prefixSize: 9, length: readU64LE(buffer, offset + 1) };
    default:
      throw new ProtocolViolationError(
        `Invalid length-encoded integer prefix 0x${first.toString(16)} at offset ${offset}`,
      );
  }
}

/** Total bytes (prefix + payload) of the length-encoded field at `offset`. */
export function lenencSize(buffer: Uint8Array, offset: number): number {
  const { prefixSize, length } = lenencHeader(buffer, offset);
  return prefixSize + (length ?? 0);
}

/**
 * Strip the length prefix from a length-encoded field, e.g. one returned by
 * Row.get() for a string column. Returns null for the NULL marker.
 */
export function lenencPayload(field: Uint8Array): Uint8Array | null {
  const { prefixSize, length } = lenencHeader(field, 0);
  if (length === null) return null;
  ensureAvailable(field, prefixSize, length, "length-encoded payload");
  return field.subarray(prefixSize, prefixSize + length);
}

/**
 * Forward-only cursor over a row payload.
 */
export class BufferReader {
  readonly buffer: Uint8Array;
  offset: number;

  constructor(buffer: Uint8Array, offset = 0) {
    this.buffer = buffer;
    this.offset = offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  ensureAvailable(bytes: number, what?: string): void {
    ensureAvailable(this.buffer, this.offset, bytes, what);
  }

  readU8(): number {
    this.ensureAvailable(1, "u8");
    return this.buffer[this.offset++];
  }

  // Zero-copy view
  readBytes(length: number, what?: string): Uint8Array {
    this.ensureAvailable(length, what);
    const res = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return res;
  }

  /** Owned copy of everything not yet consumed; leaves the cursor at the end. */
  takeRest(): Uint8Array {
    const res = new Uint8Array(this.buffer.subarray(this.offset));
    this.offset = this.buffer.length;
    return res;
  }
}
