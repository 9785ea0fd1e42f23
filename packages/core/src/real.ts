/**
 * Real Number Encoding/Decoding
 *
 * Record layout (9 bytes):
 * - 0:    flags - bit 7 sign, bits 0-4 type (0x00 real, 0x0C complex part)
 * - 1:    exponent + 0x80
 * - 2-8:  14 BCD digits, high nibble first
 *
 * value = ±d1.d2…d14 × 10^exponent
 */

import { formatByte } from "@tivars/encoding";
import {
  EXPONENT_BIAS,
  MANTISSA_DIGITS,
  REAL_FLAGS,
  REAL_SIZE,
  TYPE_TAG,
} from "./constants.ts";
import type { RealNumber, Result } from "./types.ts";
import { fail, ok } from "./utils.ts";

const MIN_EXPONENT = -EXPONENT_BIAS;
const MAX_EXPONENT = 0xff - EXPONENT_BIAS;

/**
 * Strip trailing zeros, keeping at least one digit
 */
function normalizeMantissa(digits: string): string {
  const trimmed = digits.replace(/0+$/, "");
  return trimmed === "" ? "0" : trimmed;
}

/**
 * Decode a 9-byte real record at `offset`.
 *
 * The flags byte must be the sign bit plus `typeBits`; any other bit has no
 * place in the decoded value and is `invalid_flags`.
 *
 * @param typeBits - TYPE_TAG.REAL, or TYPE_TAG.COMPLEX for complex parts
 */
export function decodeReal(
  buffer: Uint8Array,
  offset: number,
  typeBits: number = TYPE_TAG.REAL
): Result<RealNumber> {
  if (offset + REAL_SIZE > buffer.length) {
    return fail(
      "length_mismatch",
      `Real record at ${offset} needs ${REAL_SIZE} bytes, ${buffer.length - offset} available`,
      { offset }
    );
  }

  const flags = buffer[offset] ?? 0;
  if ((flags & ~REAL_FLAGS.SIGN) !== typeBits) {
    return fail(
      "invalid_flags",
      `Real flags ${formatByte(flags)} at ${offset} should be ${formatByte(typeBits)} plus the sign bit`,
      { offset }
    );
  }
  const exponent = (buffer[offset + 1] ?? 0) - EXPONENT_BIAS;

  let digits = "";
  for (let i = 2; i < REAL_SIZE; i++) {
    const byte = buffer[offset + i] ?? 0;
    const high = byte >> 4;
    const low = byte & 0x0f;
    if (high > 9 || low > 9) {
      return fail(
        "malformed_digit",
        `Mantissa byte ${formatByte(byte)} at ${offset + i} is not packed decimal`,
        { offset: offset + i }
      );
    }
    digits += `${high}${low}`;
  }

  return ok({
    negative: (flags & REAL_FLAGS.SIGN) !== 0,
    exponent,
    mantissa: normalizeMantissa(digits),
  });
}

/**
 * Encode a real record
 *
 * @param real - Real number (normalized mantissa of 1-14 digits, see createReal)
 * @param typeBits - TYPE_TAG.REAL, or TYPE_TAG.COMPLEX for complex parts
 */
export function encodeReal(
  real: RealNumber,
  typeBits: number = TYPE_TAG.REAL
): Result<Uint8Array> {
  if (!Number.isInteger(real.exponent) || real.exponent < MIN_EXPONENT || real.exponent > MAX_EXPONENT) {
    return fail(
      "field_overflow",
      `Exponent ${real.exponent} out of range (${MIN_EXPONENT}..${MAX_EXPONENT})`
    );
  }
  if (!/^[0-9]+$/.test(real.mantissa) || real.mantissa.length > MANTISSA_DIGITS) {
    return fail(
      "field_overflow",
      `Mantissa "${real.mantissa}" must be 1-${MANTISSA_DIGITS} decimal digits`
    );
  }
  if (normalizeMantissa(real.mantissa) !== real.mantissa) {
    return fail(
      "field_overflow",
      `Mantissa "${real.mantissa}" has trailing zeros (use createReal to normalize)`
    );
  }

  const record = new Uint8Array(REAL_SIZE);
  record[0] = (real.negative ? REAL_FLAGS.SIGN : 0) | (typeBits & REAL_FLAGS.TYPE_MASK);
  record[1] = real.exponent + EXPONENT_BIAS;

  const digits = real.mantissa.padEnd(MANTISSA_DIGITS, "0");
  for (let i = 0; i < MANTISSA_DIGITS / 2; i++) {
    const high = Number(digits[i * 2]);
    const low = Number(digits[i * 2 + 1]);
    record[2 + i] = (high << 4) | low;
  }

  return ok(record);
}

/**
 * Build a normalized real number from sign, exponent and digit string
 *
 * @example createReal(true, 2, "314") → -3.14 × 10^2
 */
export function createReal(negative: boolean, exponent: number, digits: string): Result<RealNumber> {
  if (!/^[0-9]+$/.test(digits)) {
    return fail("field_overflow", `Mantissa "${digits}" is not a digit string`);
  }
  const mantissa = normalizeMantissa(digits);
  if (mantissa.length > MANTISSA_DIGITS) {
    return fail(
      "field_overflow",
      `Mantissa has ${mantissa.length} significant digits (max ${MANTISSA_DIGITS})`
    );
  }
  if (!Number.isInteger(exponent) || exponent < MIN_EXPONENT || exponent > MAX_EXPONENT) {
    return fail("field_overflow", `Exponent ${exponent} out of range (${MIN_EXPONENT}..${MAX_EXPONENT})`);
  }
  return ok({ negative, exponent, mantissa });
}

/**
 * Convert a real number to a JS number (may lose digits beyond double precision)
 */
export function realToNumber(real: RealNumber): number {
  const [first, ...rest] = real.mantissa;
  const fraction = rest.length > 0 ? `.${rest.join("")}` : "";
  const value = Number(`${first ?? "0"}${fraction}e${real.exponent}`);
  return real.negative ? -value : value;
}

/**
 * Convert a JS number to a real number, rounded to 14 significant digits
 */
export function realFromNumber(value: number): Result<RealNumber> {
  if (!Number.isFinite(value)) {
    return fail("field_overflow", `Cannot store ${value} as a real number`);
  }
  if (value === 0) {
    return ok({ negative: false, exponent: 0, mantissa: "0" });
  }

  // "3.1400000000000e+0"
  const [coefficient = "", power = "0"] = Math.abs(value)
    .toExponential(MANTISSA_DIGITS - 1)
    .split("e");
  return createReal(value < 0, Number.parseInt(power, 10), coefficient.replace(".", ""));
}
