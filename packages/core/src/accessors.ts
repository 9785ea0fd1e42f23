/**
 * Typed Value Accessors
 *
 * Each accessor takes an entry or a bare value and returns the typed
 * contents, or a `type_mismatch` error naming the variant actually stored.
 */

import { ENTRY_FLAGS } from "./constants.ts";
import type {
  CalculatorValue,
  ComplexNumber,
  GroupOrAppValue,
  RawOpaqueValue,
  RealNumber,
  Result,
  ValueKind,
  VariableEntry,
} from "./types.ts";
import { fail, ok } from "./utils.ts";

type ValueSource = CalculatorValue | Pick<VariableEntry, "name" | "value">;

function describe(source: ValueSource): { value: CalculatorValue; label: string } {
  if ("kind" in source) {
    return { value: source, label: "value" };
  }
  return { value: source.value, label: `"${source.name}"` };
}

function mismatch<T>(label: string, expected: ValueKind[], actual: ValueKind): Result<T> {
  return fail("type_mismatch", `${label} is ${actual}, not ${expected.join(" or ")}`);
}

export function asReal(source: ValueSource): Result<RealNumber> {
  const { value, label } = describe(source);
  if (value.kind !== "real") return mismatch(label, ["real"], value.kind);
  return ok(value.value);
}

export function asComplex(source: ValueSource): Result<ComplexNumber> {
  const { value, label } = describe(source);
  if (value.kind !== "complex") return mismatch(label, ["complex"], value.kind);
  return ok(value.value);
}

export function asRealList(source: ValueSource): Result<RealNumber[]> {
  const { value, label } = describe(source);
  if (value.kind !== "real-list") return mismatch(label, ["real-list"], value.kind);
  return ok(value.elements);
}

export function asComplexList(source: ValueSource): Result<ComplexNumber[]> {
  const { value, label } = describe(source);
  if (value.kind !== "complex-list") return mismatch(label, ["complex-list"], value.kind);
  return ok(value.elements);
}

export function asMatrix(source: ValueSource): Result<RealNumber[][]> {
  const { value, label } = describe(source);
  if (value.kind !== "matrix") return mismatch(label, ["matrix"], value.kind);
  return ok(value.rows);
}

export function asStringBytes(source: ValueSource): Result<Uint8Array> {
  const { value, label } = describe(source);
  if (value.kind !== "string") return mismatch(label, ["string"], value.kind);
  return ok(value.bytes);
}

/**
 * Token bytes of a program (protected or not)
 */
export function asProgramBytes(source: ValueSource): Result<Uint8Array> {
  const { value, label } = describe(source);
  if (value.kind !== "program") return mismatch(label, ["program"], value.kind);
  return ok(value.tokens);
}

/**
 * Tag and bytes of a group/app or unknown-type value
 */
export function asOpaqueBytes(
  source: ValueSource
): Result<Pick<GroupOrAppValue | RawOpaqueValue, "tag" | "bytes">> {
  const { value, label } = describe(source);
  if (value.kind !== "group-or-app" && value.kind !== "raw-opaque") {
    return mismatch(label, ["group-or-app", "raw-opaque"], value.kind);
  }
  return ok({ tag: value.tag, bytes: value.bytes });
}

/**
 * Whether the entry is stored in archive memory
 */
export function isArchived(entry: Pick<VariableEntry, "flags">): boolean {
  return (entry.flags & ENTRY_FLAGS.ARCHIVED) !== 0;
}

/**
 * Copy of the entry with the archived bit set or cleared
 */
export function withArchived<T extends Pick<VariableEntry, "flags">>(entry: T, archived: boolean): T {
  const flags = archived ? entry.flags | ENTRY_FLAGS.ARCHIVED : entry.flags & ~ENTRY_FLAGS.ARCHIVED;
  return { ...entry, flags };
}
