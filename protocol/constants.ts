/**
 * Constants for the MySQL client/server row protocol.
 */

/** Column wire-type ids (`enum_field_types`). */
export const ColumnType = {
  DECIMAL: 0x00,
  TINY: 0x01,
  SHORT: 0x02,
  LONG: 0x03,
  FLOAT: 0x04,
  DOUBLE: 0x05,
  NULL: 0x06,
  TIMESTAMP: 0x07,
  LONGLONG: 0x08,
  INT24: 0x09,
  DATE: 0x0a,
  TIME: 0x0b,
  DATETIME: 0x0c,
  YEAR: 0x0d,
  NEWDATE: 0x0e,
  VARCHAR: 0x0f,
  BIT: 0x10,
  JSON: 0xf5,
  NEWDECIMAL: 0xf6,
  ENUM: 0xf7,
  SET: 0xf8,
  TINY_BLOB: 0xf9,
  MEDIUM_BLOB: 0xfa,
  LONG_BLOB: 0xfb,
  BLOB: 0xfc,
  VAR_STRING: 0xfd,
  STRING: 0xfe,
  GEOMETRY: 0xff,
} as const;

export type ColumnTypeName = keyof typeof ColumnType;
export type ColumnTypeId = (typeof ColumnType)[ColumnTypeName];

export function isColumnTypeName(name: string): name is ColumnTypeName {
  return Object.hasOwn(ColumnType, name);
}

const NAMES_BY_ID = new Map<number, ColumnTypeName>();
for (const name of Object.keys(ColumnType)) {
  if (isColumnTypeName(name)) NAMES_BY_ID.set(ColumnType[name], name);
}

export function columnTypeName(id: number): ColumnTypeName | undefined {
  return NAMES_BY_ID.get(id);
}

/**
 * Length-encoded integer prefixes.
 *
 * First byte < 0xFB is the length itself; the others select the width of the
 * little-endian length that follows.
 */
export const LenEnc = {
  /** Largest single-byte literal length */
  MAX_LITERAL: 0xfa,
  /** NULL marker in text rows */
  NULL: 0xfb,
  U16: 0xfc,
  U24: 0xfd,
  U64: 0xfe,
  /** Never a length prefix (ERR packet header) */
  INVALID: 0xff,
} as const;

export const BinaryRow = {
  /** First byte of every binary protocol row */
  HEADER: 0x00,
  /** Leading null-bitmap bits reserved in result-set rows */
  NULL_BITMAP_OFFSET: 2,
} as const;

/** Byte widths of the fixed-size binary values */
export const FixedWidth = {
  TINY: 1,
  SHORT: 2,
  LONG: 4,
  LONGLONG: 8,
  DATE: 5,
} as const;
