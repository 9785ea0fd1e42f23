/**
 * TI Variable File Types
 *
 * Value variants (closed set, keyed by `kind`):
 * - real, complex, real-list, complex-list, matrix, string
 * - program: raw token bytes (tag 0x05, or 0x06 when protected)
 * - group-or-app: opaque AppVar / group / flash app bytes
 * - raw-opaque: any other tag, preserved byte for byte
 */

import type { FormatId, GroupOrAppTag } from "./constants.ts";

/**
 * Discriminated union for all codec returns.
 * Forces callers to handle errors explicitly.
 */
export type Result<T, E = CodecError> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Machine-readable error kinds
 */
export type CodecErrorCode =
  | "unknown_format"
  | "truncated_file"
  | "truncated_entry"
  | "trailing_length_mismatch"
  | "length_mismatch"
  | "malformed_digit"
  | "invalid_flags"
  | "invalid_name"
  | "checksum_mismatch"
  | "type_mismatch"
  | "field_overflow";

/**
 * Container decode states
 *
 * start → header-read → comment-read → entries-reading → entries-done
 *       → checksum-read → valid | invalid
 */
export type DecodeStage =
  | "start"
  | "header-read"
  | "comment-read"
  | "entries-reading"
  | "entries-done"
  | "checksum-read"
  | "valid"
  | "invalid";

/**
 * Codec error shape
 */
export type CodecError = {
  /** Machine-readable error kind */
  code: CodecErrorCode;
  /** Human-readable description */
  message: string;
  /** Absolute byte offset where the problem was found, when known */
  offset?: number;
  /** Container decode stage in which decoding stopped */
  stage?: DecodeStage;
};

/**
 * Real number
 *
 * value = (negative ? -1 : 1) × d1.d2d3…d14 × 10^exponent
 */
export type RealNumber = {
  negative: boolean;
  /** Decimal exponent (-128..127) */
  exponent: number;
  /** 1-14 digits, no trailing zeros ("0" for zero) */
  mantissa: string;
};

export type ComplexNumber = {
  real: RealNumber;
  imaginary: RealNumber;
};

export type RealValue = { kind: "real"; value: RealNumber };

export type ComplexValue = { kind: "complex"; value: ComplexNumber };

export type RealListValue = { kind: "real-list"; elements: RealNumber[] };

export type ComplexListValue = { kind: "complex-list"; elements: ComplexNumber[] };

export type MatrixValue = {
  kind: "matrix";
  /** Row-major; every row has the same length */
  rows: RealNumber[][];
};

export type StringValue = {
  kind: "string";
  /** Calculator-encoded bytes, one per glyph */
  bytes: Uint8Array;
};

export type ProgramValue = {
  kind: "program";
  /** Tokenized program body, not interpreted here */
  tokens: Uint8Array;
  protected: boolean;
};

export type GroupOrAppValue = {
  kind: "group-or-app";
  tag: GroupOrAppTag;
  bytes: Uint8Array;
};

export type RawOpaqueValue = {
  kind: "raw-opaque";
  tag: number;
  bytes: Uint8Array;
};

export type CalculatorValue =
  | RealValue
  | ComplexValue
  | RealListValue
  | ComplexListValue
  | MatrixValue
  | StringValue
  | ProgramValue
  | GroupOrAppValue
  | RawOpaqueValue;

export type ValueKind = CalculatorValue["kind"];

/**
 * Entry input for encoding. The type tag follows from `value`.
 */
export type VariableEntryInput = {
  /** Display name, e.g. "PRGM", "L₁", "[A]", "Str1" */
  name: string;
  /** Version byte (default 0) */
  version?: number;
  /** Flags byte, see ENTRY_FLAGS (default 0) */
  flags?: number;
  value: CalculatorValue;
};

/**
 * Decoded variable entry
 */
export type VariableEntry = {
  name: string;
  version: number;
  flags: number;
  value: CalculatorValue;
};

/**
 * Decoded entry plus the bytes it spanned
 */
export type DecodedEntry = {
  entry: VariableEntry;
  /** Payload length L as stored in both length fields */
  length: number;
  /** Type tag as stored */
  tag: number;
  bytesConsumed: number;
};

/**
 * File input for encoding. Data length and checksum are always recomputed.
 */
export type CalculatorFileInput = {
  /** Signature to write (default "ti83plus") */
  format?: FormatId;
  /** Comment text (UTF-8) or raw bytes, at most 42 bytes */
  comment?: string | Uint8Array;
  entries: VariableEntryInput[];
};

/**
 * Decoded calculator file
 */
export type CalculatorFile = {
  format: FormatId;
  /** Comment field as stored (42 bytes) */
  comment: Uint8Array;
  /** Byte size of the entry region */
  dataLength: number;
  entries: VariableEntry[];
  /** Checksum as stored (or recomputed under checksum: "fix") */
  checksum: number;
};
