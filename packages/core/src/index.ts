/**
 * @tivars/core
 *
 * TI-83/84 Plus variable file encoding/decoding
 *
 * Pipeline:
 * - file:  signature, comment, data length, entries, checksum
 * - entry: length, tag, name, version, flags, payload, trailing length
 * - value: real, complex, lists, matrix, string, program, group/app, raw
 */

// Constants
export {
  CHECKSUM_SIZE,
  COMMENT_SIZE,
  COMPLEX_SIZE,
  DEFAULT_FORMAT,
  ENTRY_FLAGS,
  ENTRY_OFFSETS,
  ENTRY_OVERHEAD,
  ENTRY_SIZES,
  FILE_OFFSETS,
  type FormatId,
  GROUP_OR_APP_TAGS,
  type GroupOrAppTag,
  HEADER_SIZE,
  MANTISSA_DIGITS,
  MAX_DATA_LENGTH,
  MAX_PAYLOAD_LENGTH,
  REAL_SIZE,
  SIGNATURE_SIZE,
  SIGNATURES,
  TYPE_TAG,
} from "./constants.ts";

// Typed accessors
export {
  asComplex,
  asComplexList,
  asMatrix,
  asOpaqueBytes,
  asProgramBytes,
  asReal,
  asRealList,
  asStringBytes,
  isArchived,
  withArchived,
} from "./accessors.ts";

// Checksum
export { computeChecksum, verifyChecksum } from "./checksum.ts";

// Comment helpers
export {
  commentLength,
  createComment,
  isCommentZeroTerminated,
  normalizeComment,
  readComment,
  toPaddedComment,
  toZeroTerminatedComment,
} from "./comment.ts";

// Entry encoding/decoding
export { decodeEntry, encodeEntry, entrySize } from "./entry.ts";

// File encoding/decoding
export {
  decodeFile,
  detectFormat,
  encodeFile,
  type ValidationResult,
  validateFile,
} from "./file.ts";

// Names
export { decodeName, encodeName, NAME_PREFIX } from "./name.ts";

// Options
export {
  type DecodeOptions,
  type DecodeOptionsInput,
  DecodeOptionsSchema,
  type ReadMode,
  ReadModeSchema,
  resolveDecodeOptions,
} from "./options.ts";

// Real numbers
export { createReal, decodeReal, encodeReal, realFromNumber, realToNumber } from "./real.ts";

// String text
export { stringFromText, stringToText } from "./text.ts";

// Types
export type {
  CalculatorFile,
  CalculatorFileInput,
  CalculatorValue,
  CodecError,
  CodecErrorCode,
  ComplexListValue,
  ComplexNumber,
  ComplexValue,
  DecodedEntry,
  DecodeStage,
  GroupOrAppValue,
  MatrixValue,
  ProgramValue,
  RawOpaqueValue,
  RealListValue,
  RealNumber,
  RealValue,
  Result,
  StringValue,
  ValueKind,
  VariableEntry,
  VariableEntryInput,
} from "./types.ts";

// Utilities
export { bytesEqual, concatBytes } from "./utils.ts";

// Validation checks
export { checkChecksum, checkDataLength, checkEntryBounds } from "./validation.ts";

// Value encoding/decoding
export {
  decodeValue,
  encodeValue,
  isGroupOrAppTag,
  isInterpretedTag,
  valueTag,
} from "./value.ts";

// Well-known data
export { EMPTY_FILE_BYTES } from "./well-known.ts";
