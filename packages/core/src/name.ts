/**
 * Variable Name Encoding/Decoding
 *
 * The 8-byte name field is zero-padded. How its bytes read depends on the
 * entry's type tag:
 * - real/complex:   one letter A-Z or θ
 * - lists:          0x5D + index (L₁-L₆) or 0x5D + up to 5 name characters
 * - matrix:         0x5C + index ([A]-[J])
 * - string:         0xAA + index (Str1-Str9, Str0)
 * - equation:       0x5E + token (Y1, X1T, r1, u, …)
 * - picture / GDB:  0x60 / 0x61 + index (Pic1… / GDB1…)
 * - programs:       up to 8 of A-Z, 0-9, θ, not starting with a digit
 * - everything else: as programs, lowercase letters allowed too
 */

import { formatByte, formatBytes } from "@tivars/encoding";
import { ENTRY_SIZES, TYPE_TAG } from "./constants.ts";
import type { Result } from "./types.ts";
import { fail, ok } from "./utils.ts";

const THETA_BYTE = 0x5b;
const THETA = "θ";

const MAX_USER_LIST_LENGTH = 5;

/** Tokens that start a system variable name */
export const NAME_PREFIX = {
  MATRIX: 0x5c,
  LIST: 0x5d,
  EQUATION: 0x5e,
  PICTURE: 0x60,
  GDB: 0x61,
  STRING: 0xaa,
} as const;

type IndexedFamily = {
  prefix: number;
  /** label by second byte */
  labels: Map<number, string>;
};

/** Labels for second bytes 0x00-0x09, numbered 1-9 then 0 */
function numberedLabels(stem: string): Map<number, string> {
  const labels = new Map<number, string>();
  for (let i = 0; i < 10; i++) {
    labels.set(i, `${stem}${(i + 1) % 10}`);
  }
  return labels;
}

function matrixLabels(): Map<number, string> {
  const labels = new Map<number, string>();
  for (let i = 0; i < 10; i++) {
    labels.set(i, `[${String.fromCharCode(0x41 + i)}]`);
  }
  return labels;
}

function equationLabels(): Map<number, string> {
  const labels = new Map<number, string>();
  for (let i = 0; i < 10; i++) {
    labels.set(0x10 + i, `Y${(i + 1) % 10}`);
  }
  for (let i = 0; i < 6; i++) {
    labels.set(0x20 + i * 2, `X${i + 1}T`);
    labels.set(0x21 + i * 2, `Y${i + 1}T`);
    labels.set(0x40 + i, `r${i + 1}`);
  }
  labels.set(0x80, "u");
  labels.set(0x81, "v");
  labels.set(0x82, "w");
  return labels;
}

const SUBSCRIPT_DIGITS = "₀₁₂₃₄₅₆₇₈₉";

function builtinListLabels(): Map<number, string> {
  const labels = new Map<number, string>();
  for (let i = 0; i < 6; i++) {
    labels.set(i, `L${SUBSCRIPT_DIGITS[i + 1] ?? ""}`);
  }
  return labels;
}

const FAMILIES = {
  matrix: { prefix: NAME_PREFIX.MATRIX, labels: matrixLabels() },
  string: { prefix: NAME_PREFIX.STRING, labels: numberedLabels("Str") },
  picture: { prefix: NAME_PREFIX.PICTURE, labels: numberedLabels("Pic") },
  gdb: { prefix: NAME_PREFIX.GDB, labels: numberedLabels("GDB") },
  equation: { prefix: NAME_PREFIX.EQUATION, labels: equationLabels() },
} satisfies Record<string, IndexedFamily>;

const BUILTIN_LISTS = builtinListLabels();

type CharacterSet = "upper" | "mixed";

type NameRule =
  | { kind: "letter" }
  | { kind: "list" }
  | { kind: "indexed"; family: IndexedFamily }
  | { kind: "plain"; charset: CharacterSet };

function ruleForTag(tag: number): NameRule {
  switch (tag) {
    case TYPE_TAG.REAL:
    case TYPE_TAG.COMPLEX:
      return { kind: "letter" };
    case TYPE_TAG.REAL_LIST:
    case TYPE_TAG.COMPLEX_LIST:
      return { kind: "list" };
    case TYPE_TAG.MATRIX:
      return { kind: "indexed", family: FAMILIES.matrix };
    case TYPE_TAG.STRING:
      return { kind: "indexed", family: FAMILIES.string };
    case TYPE_TAG.EQUATION:
      return { kind: "indexed", family: FAMILIES.equation };
    case TYPE_TAG.PICTURE:
      return { kind: "indexed", family: FAMILIES.picture };
    case TYPE_TAG.GDB:
      return { kind: "indexed", family: FAMILIES.gdb };
    case TYPE_TAG.PROGRAM:
    case TYPE_TAG.PROTECTED_PROGRAM:
      return { kind: "plain", charset: "upper" };
    default:
      return { kind: "plain", charset: "mixed" };
  }
}

// ============================================================================
// Character set
// ============================================================================

function isUpper(byte: number): boolean {
  return (byte >= 0x41 && byte <= 0x5a) || byte === THETA_BYTE;
}

function isLower(byte: number): boolean {
  return byte >= 0x61 && byte <= 0x7a;
}

function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

function isNameByte(byte: number, charset: CharacterSet, first: boolean): boolean {
  if (isUpper(byte)) return true;
  if (charset === "mixed" && isLower(byte)) return true;
  return !first && isDigit(byte);
}

function byteToChar(byte: number): string {
  return byte === THETA_BYTE ? THETA : String.fromCharCode(byte);
}

function charToByte(char: string): number | undefined {
  if (char === THETA) return THETA_BYTE;
  const code = char.codePointAt(0);
  if (code === undefined || code > 0x7f) return undefined;
  return code;
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Check every byte from `start` on is zero padding
 */
function checkPadding(field: Uint8Array, start: number): Result<void> {
  for (let i = start; i < field.length; i++) {
    if (field[i] !== 0) {
      return fail(
        "invalid_name",
        `Name field ${formatBytes(field)} has data after its padding at byte ${i}`,
        { offset: i }
      );
    }
  }
  return ok(undefined);
}

function decodeCharacters(
  field: Uint8Array,
  start: number,
  maxLength: number,
  charset: CharacterSet
): Result<string> {
  let name = "";
  let i = start;
  for (; i < field.length && field[i] !== 0; i++) {
    const byte = field[i] ?? 0;
    if (!isNameByte(byte, charset, i === start)) {
      return fail(
        "invalid_name",
        `Byte ${formatByte(byte)} at ${i} is not allowed in a variable name`,
        { offset: i }
      );
    }
    name += byteToChar(byte);
  }
  if (name === "") {
    return fail("invalid_name", "Name field is empty", { offset: start });
  }
  if (i - start > maxLength) {
    return fail("invalid_name", `Name "${name}" is longer than ${maxLength} characters`, {
      offset: start,
    });
  }
  const padding = checkPadding(field, i);
  if (!padding.ok) return padding;
  return ok(name);
}

function decodeIndexed(field: Uint8Array, family: IndexedFamily): Result<string> {
  if (field[0] !== family.prefix) {
    return fail(
      "invalid_name",
      `Name field ${formatBytes(field)} should start with ${formatByte(family.prefix)}`,
      { offset: 0 }
    );
  }
  const label = family.labels.get(field[1] ?? 0);
  if (label === undefined) {
    return fail("invalid_name", `Unknown name token ${formatBytes(field.subarray(0, 2))}`, {
      offset: 1,
    });
  }
  const padding = checkPadding(field, 2);
  if (!padding.ok) return padding;
  return ok(label);
}

function decodeList(field: Uint8Array): Result<string> {
  if (field[0] !== NAME_PREFIX.LIST) {
    return fail(
      "invalid_name",
      `List name ${formatBytes(field)} should start with ${formatByte(NAME_PREFIX.LIST)}`,
      { offset: 0 }
    );
  }
  const builtin = BUILTIN_LISTS.get(field[1] ?? 0);
  if (builtin !== undefined) {
    const padding = checkPadding(field, 2);
    if (!padding.ok) return padding;
    return ok(builtin);
  }
  return decodeCharacters(field, 1, MAX_USER_LIST_LENGTH, "upper");
}

function decodeByRule(rule: NameRule, field: Uint8Array): Result<string> {
  switch (rule.kind) {
    case "letter": {
      const byte = field[0] ?? 0;
      if (!isUpper(byte)) {
        return fail("invalid_name", `Byte ${formatByte(byte)} is not a variable letter`, {
          offset: 0,
        });
      }
      const padding = checkPadding(field, 1);
      if (!padding.ok) return padding;
      return ok(byteToChar(byte));
    }
    case "list":
      return decodeList(field);
    case "indexed":
      return decodeIndexed(field, rule.family);
    case "plain":
      return decodeCharacters(field, 0, ENTRY_SIZES.NAME, rule.charset);
  }
}

/**
 * Decode an 8-byte name field
 *
 * @param tag - Entry type tag, selects how the bytes read
 * @param field - The name field (exactly 8 bytes)
 * @param baseOffset - Absolute offset of the field, added to error offsets
 */
export function decodeName(tag: number, field: Uint8Array, baseOffset = 0): Result<string> {
  if (field.length !== ENTRY_SIZES.NAME) {
    return fail(
      "invalid_name",
      `Name field is ${field.length} bytes (expected ${ENTRY_SIZES.NAME})`,
      { offset: baseOffset }
    );
  }
  const result = decodeByRule(ruleForTag(tag), field);
  if (result.ok) return result;
  return {
    ok: false,
    error: { ...result.error, offset: baseOffset + (result.error.offset ?? 0) },
  };
}

// ============================================================================
// Encoding
// ============================================================================

function encodeCharacters(
  name: string,
  prefix: number[],
  maxLength: number,
  charset: CharacterSet
): Result<Uint8Array> {
  const chars = Array.from(name);
  if (chars.length === 0) {
    return fail("invalid_name", "Variable name is empty");
  }
  if (chars.length > maxLength) {
    return fail(
      "field_overflow",
      `Name "${name}" is ${chars.length} characters (max ${maxLength})`
    );
  }

  const field = new Uint8Array(ENTRY_SIZES.NAME);
  field.set(prefix, 0);
  for (const [i, char] of chars.entries()) {
    const byte = charToByte(char);
    if (byte === undefined || !isNameByte(byte, charset, i === 0)) {
      return fail("invalid_name", `Character "${char}" is not allowed at position ${i} of "${name}"`);
    }
    field[prefix.length + i] = byte;
  }
  return ok(field);
}

function encodeIndexed(name: string, family: IndexedFamily): Result<Uint8Array> {
  for (const [index, label] of family.labels) {
    if (label === name) {
      const field = new Uint8Array(ENTRY_SIZES.NAME);
      field[0] = family.prefix;
      field[1] = index;
      return ok(field);
    }
  }
  const examples = Array.from(family.labels.values()).slice(0, 3).join(", ");
  return fail("invalid_name", `"${name}" is not a valid name here (expected e.g. ${examples})`);
}

/**
 * Encode a display name into an 8-byte name field
 */
export function encodeName(tag: number, name: string): Result<Uint8Array> {
  const rule = ruleForTag(tag);
  switch (rule.kind) {
    case "letter": {
      const byte = charToByte(name);
      if (Array.from(name).length !== 1 || byte === undefined || !isUpper(byte)) {
        return fail("invalid_name", `"${name}" is not a variable letter (A-Z or θ)`);
      }
      const field = new Uint8Array(ENTRY_SIZES.NAME);
      field[0] = byte;
      return ok(field);
    }
    case "list":
      for (const [index, label] of BUILTIN_LISTS) {
        if (label === name) {
          const field = new Uint8Array(ENTRY_SIZES.NAME);
          field[0] = NAME_PREFIX.LIST;
          field[1] = index;
          return ok(field);
        }
      }
      return encodeCharacters(name, [NAME_PREFIX.LIST], MAX_USER_LIST_LENGTH, "upper");
    case "indexed":
      return encodeIndexed(name, rule.family);
    case "plain":
      return encodeCharacters(name, [], ENTRY_SIZES.NAME, rule.charset);
  }
}
