/**
 * Value Encoding/Decoding
 *
 * Payload layouts by tag:
 * - real:          one 9-byte real record
 * - complex:       two real records (real part, imaginary part)
 * - real list:     u16 LE count + count × 9 bytes
 * - complex list:  u16 LE count + count × 18 bytes
 * - matrix:        rows (u8) + columns (u8) + row-major real records
 * - string:        raw calculator-encoded bytes
 * - program:       u16 LE token length + token bytes
 * - group/app:     opaque bytes
 * - anything else: raw-opaque, preserved as is
 *
 * Decoding never returns a partial value.
 */

import { formatByte } from "@tivars/encoding";
import {
  COMPLEX_SIZE,
  GROUP_OR_APP_TAGS,
  type GroupOrAppTag,
  LIST_COUNT_SIZE,
  MATRIX_HEADER_SIZE,
  MAX_MATRIX_DIMENSION,
  MAX_PAYLOAD_LENGTH,
  REAL_SIZE,
  TOKEN_LENGTH_SIZE,
  TYPE_TAG,
} from "./constants.ts";
import { decodeReal, encodeReal } from "./real.ts";
import type { CalculatorValue, ComplexNumber, RealNumber, Result } from "./types.ts";
import { concatBytes, encodeUint16, fail, ok, readUint16 } from "./utils.ts";

/**
 * Whether a tag is one of the group/app tags
 */
export function isGroupOrAppTag(tag: number): tag is GroupOrAppTag {
  return GROUP_OR_APP_TAGS.some((t) => t === tag);
}

/**
 * Whether the value codec interprets payloads with this tag.
 * Every other tag decodes to raw-opaque.
 */
export function isInterpretedTag(tag: number): boolean {
  switch (tag) {
    case TYPE_TAG.REAL:
    case TYPE_TAG.COMPLEX:
    case TYPE_TAG.REAL_LIST:
    case TYPE_TAG.COMPLEX_LIST:
    case TYPE_TAG.MATRIX:
    case TYPE_TAG.STRING:
    case TYPE_TAG.PROGRAM:
    case TYPE_TAG.PROTECTED_PROGRAM:
      return true;
    default:
      return isGroupOrAppTag(tag);
  }
}

/**
 * Type tag a value is stored under
 */
export function valueTag(value: CalculatorValue): number {
  switch (value.kind) {
    case "real":
      return TYPE_TAG.REAL;
    case "complex":
      return TYPE_TAG.COMPLEX;
    case "real-list":
      return TYPE_TAG.REAL_LIST;
    case "complex-list":
      return TYPE_TAG.COMPLEX_LIST;
    case "matrix":
      return TYPE_TAG.MATRIX;
    case "string":
      return TYPE_TAG.STRING;
    case "program":
      return value.protected ? TYPE_TAG.PROTECTED_PROGRAM : TYPE_TAG.PROGRAM;
    case "group-or-app":
    case "raw-opaque":
      return value.tag;
  }
}

// ============================================================================
// Decoding
// ============================================================================

function decodeComplex(payload: Uint8Array, offset: number): Result<ComplexNumber> {
  const real = decodeReal(payload, offset, TYPE_TAG.COMPLEX);
  if (!real.ok) return real;
  const imaginary = decodeReal(payload, offset + REAL_SIZE, TYPE_TAG.COMPLEX);
  if (!imaginary.ok) return imaginary;
  return ok({ real: real.value, imaginary: imaginary.value });
}

/**
 * Read a u16 count/length prefix and check the rest of the payload is
 * exactly `prefix × unitSize` bytes
 */
function checkPrefixedLength(
  payload: Uint8Array,
  unitSize: number,
  what: string
): Result<number> {
  if (payload.length < 2) {
    return fail(
      "length_mismatch",
      `${what} payload is ${payload.length} bytes, too short for its 2-byte prefix`,
      { offset: 0 }
    );
  }
  const count = readUint16(payload, 0);
  const expected = count * unitSize;
  const actual = payload.length - 2;
  if (expected !== actual) {
    return fail(
      "length_mismatch",
      `${what} declares ${count} × ${unitSize} = ${expected} bytes, payload holds ${actual}`,
      { offset: 0 }
    );
  }
  return ok(count);
}

function decodeUnshifted(tag: number, payload: Uint8Array): Result<CalculatorValue> {
  switch (tag) {
    case TYPE_TAG.REAL: {
      if (payload.length !== REAL_SIZE) {
        return fail(
          "length_mismatch",
          `Real payload is ${payload.length} bytes (expected ${REAL_SIZE})`,
          { offset: 0 }
        );
      }
      const real = decodeReal(payload, 0);
      if (!real.ok) return real;
      return ok({ kind: "real", value: real.value });
    }

    case TYPE_TAG.COMPLEX: {
      if (payload.length !== COMPLEX_SIZE) {
        return fail(
          "length_mismatch",
          `Complex payload is ${payload.length} bytes (expected ${COMPLEX_SIZE})`,
          { offset: 0 }
        );
      }
      const complex = decodeComplex(payload, 0);
      if (!complex.ok) return complex;
      return ok({ kind: "complex", value: complex.value });
    }

    case TYPE_TAG.REAL_LIST: {
      const count = checkPrefixedLength(payload, REAL_SIZE, "Real list");
      if (!count.ok) return count;
      const elements: RealNumber[] = [];
      for (let i = 0; i < count.value; i++) {
        const real = decodeReal(payload, LIST_COUNT_SIZE + i * REAL_SIZE);
        if (!real.ok) return real;
        elements.push(real.value);
      }
      return ok({ kind: "real-list", elements });
    }

    case TYPE_TAG.COMPLEX_LIST: {
      const count = checkPrefixedLength(payload, COMPLEX_SIZE, "Complex list");
      if (!count.ok) return count;
      const elements: ComplexNumber[] = [];
      for (let i = 0; i < count.value; i++) {
        const complex = decodeComplex(payload, LIST_COUNT_SIZE + i * COMPLEX_SIZE);
        if (!complex.ok) return complex;
        elements.push(complex.value);
      }
      return ok({ kind: "complex-list", elements });
    }

    case TYPE_TAG.MATRIX: {
      if (payload.length < MATRIX_HEADER_SIZE) {
        return fail(
          "length_mismatch",
          `Matrix payload is ${payload.length} bytes, too short for its dimensions`,
          { offset: 0 }
        );
      }
      const rowCount = payload[0] ?? 0;
      const columnCount = payload[1] ?? 0;
      const expected = rowCount * columnCount * REAL_SIZE;
      if (expected !== payload.length - MATRIX_HEADER_SIZE) {
        return fail(
          "length_mismatch",
          `Matrix ${rowCount}×${columnCount} needs ${expected} bytes, payload holds ${payload.length - MATRIX_HEADER_SIZE}`,
          { offset: 0 }
        );
      }
      const rows: RealNumber[][] = [];
      for (let r = 0; r < rowCount; r++) {
        const row: RealNumber[] = [];
        for (let c = 0; c < columnCount; c++) {
          const real = decodeReal(payload, MATRIX_HEADER_SIZE + (r * columnCount + c) * REAL_SIZE);
          if (!real.ok) return real;
          row.push(real.value);
        }
        rows.push(row);
      }
      return ok({ kind: "matrix", rows });
    }

    case TYPE_TAG.STRING:
      return ok({ kind: "string", bytes: payload.slice() });

    case TYPE_TAG.PROGRAM:
    case TYPE_TAG.PROTECTED_PROGRAM: {
      const length = checkPrefixedLength(payload, 1, "Program");
      if (!length.ok) return length;
      return ok({
        kind: "program",
        tokens: payload.slice(TOKEN_LENGTH_SIZE),
        protected: tag === TYPE_TAG.PROTECTED_PROGRAM,
      });
    }

    default:
      if (isGroupOrAppTag(tag)) {
        return ok({ kind: "group-or-app", tag, bytes: payload.slice() });
      }
      return ok({ kind: "raw-opaque", tag, bytes: payload.slice() });
  }
}

/**
 * Decode a payload according to its type tag
 *
 * @param tag - Entry type tag
 * @param payload - Exactly the payload bytes
 * @param baseOffset - Absolute offset of the payload, added to error offsets
 */
export function decodeValue(
  tag: number,
  payload: Uint8Array,
  baseOffset = 0
): Result<CalculatorValue> {
  const result = decodeUnshifted(tag, payload);
  if (result.ok || result.error.offset === undefined || baseOffset === 0) {
    return result;
  }
  return { ok: false, error: { ...result.error, offset: result.error.offset + baseOffset } };
}

// ============================================================================
// Encoding
// ============================================================================

function encodeComplex(value: ComplexNumber): Result<Uint8Array> {
  const real = encodeReal(value.real, TYPE_TAG.COMPLEX);
  if (!real.ok) return real;
  const imaginary = encodeReal(value.imaginary, TYPE_TAG.COMPLEX);
  if (!imaginary.ok) return imaginary;
  return ok(concatBytes(real.value, imaginary.value));
}

function encodeList<T>(
  elements: T[],
  encodeElement: (element: T) => Result<Uint8Array>
): Result<Uint8Array> {
  if (elements.length > 0xffff) {
    return fail("field_overflow", `List has ${elements.length} elements (max 65535)`);
  }
  const parts: Uint8Array[] = [encodeUint16(elements.length)];
  for (const element of elements) {
    const encoded = encodeElement(element);
    if (!encoded.ok) return encoded;
    parts.push(encoded.value);
  }
  return ok(concatBytes(...parts));
}

function encodeMatrix(rows: RealNumber[][]): Result<Uint8Array> {
  const columnCount = rows[0]?.length ?? 0;
  if (rows.length > MAX_MATRIX_DIMENSION || columnCount > MAX_MATRIX_DIMENSION) {
    return fail(
      "field_overflow",
      `Matrix ${rows.length}×${columnCount} exceeds ${MAX_MATRIX_DIMENSION}×${MAX_MATRIX_DIMENSION}`
    );
  }
  const parts: Uint8Array[] = [new Uint8Array([rows.length, columnCount])];
  for (const [r, row] of rows.entries()) {
    if (row.length !== columnCount) {
      return fail(
        "length_mismatch",
        `Matrix row ${r} has ${row.length} columns (expected ${columnCount})`
      );
    }
    for (const real of row) {
      const encoded = encodeReal(real);
      if (!encoded.ok) return encoded;
      parts.push(encoded.value);
    }
  }
  return ok(concatBytes(...parts));
}

function encodeTokens(tokens: Uint8Array): Result<Uint8Array> {
  if (tokens.length > MAX_PAYLOAD_LENGTH - TOKEN_LENGTH_SIZE) {
    return fail(
      "field_overflow",
      `Program is ${tokens.length} bytes (max ${MAX_PAYLOAD_LENGTH - TOKEN_LENGTH_SIZE})`
    );
  }
  return ok(concatBytes(encodeUint16(tokens.length), tokens));
}

/**
 * Encode a value to its payload bytes
 */
export function encodeValue(value: CalculatorValue): Result<Uint8Array> {
  switch (value.kind) {
    case "real":
      return encodeReal(value.value);
    case "complex":
      return encodeComplex(value.value);
    case "real-list":
      return encodeList(value.elements, (real) => encodeReal(real));
    case "complex-list":
      return encodeList(value.elements, encodeComplex);
    case "matrix":
      return encodeMatrix(value.rows);
    case "string":
      return ok(value.bytes.slice());
    case "program":
      return encodeTokens(value.tokens);
    case "group-or-app":
      if (!isGroupOrAppTag(value.tag)) {
        return fail("type_mismatch", `Tag ${formatByte(value.tag)} is not a group/app tag`);
      }
      return ok(value.bytes.slice());
    case "raw-opaque":
      if (!Number.isInteger(value.tag) || value.tag < 0 || value.tag > 0xff) {
        return fail("field_overflow", `Tag ${value.tag} does not fit in one byte`);
      }
      if (isInterpretedTag(value.tag)) {
        return fail(
          "type_mismatch",
          `Tag ${formatByte(value.tag)} has a typed variant; raw-opaque is for unknown tags`
        );
      }
      return ok(value.bytes.slice());
  }
}
