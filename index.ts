export {
  ColumnType,
  LenEnc,
  BinaryRow,
  FixedWidth,
  columnTypeName,
  isColumnTypeName,
  type ColumnTypeId,
  type ColumnTypeName,
} from "./protocol/constants.ts";
export {
  RowDecodeError,
  ProtocolViolationError,
  BufferUnderflowError,
  UnsupportedColumnTypeError,
  type RowDecodeErrorKind,
} from "./protocol/errors.ts";
export {
  BufferReader,
  lenencHeader,
  lenencSize,
  lenencPayload,
  type LenEncHeader,
} from "./protocol/io.ts";
export { NullBitmap } from "./protocol/null_bitmap.ts";
export { fieldSize } from "./protocol/field_size.ts";
export { Row, type FieldRange } from "./protocol/row.ts";
export {
  decodeRow,
  decodeTextRow,
  decodeBinaryRow,
  RowDecoder,
  type RowFormat,
  type RowDecodeOptions,
  type RowDecoderOptions,
} from "./protocol/decode.ts";
