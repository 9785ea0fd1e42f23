/**
 * Typed accessor tests
 */
import { describe, expect, it } from "vitest";
import {
  asComplex,
  asMatrix,
  asOpaqueBytes,
  asProgramBytes,
  asReal,
  asRealList,
  asStringBytes,
  isArchived,
  withArchived,
} from "../src/accessors.ts";
import type { RealNumber, VariableEntry } from "../src/types.ts";

const ONE: RealNumber = { negative: false, exponent: 0, mantissa: "1" };

const STR1: VariableEntry = {
  name: "Str1",
  version: 0,
  flags: 0,
  value: { kind: "string", bytes: new Uint8Array([0x48, 0x49]) },
};

describe("Accessors", () => {
  it("should read a real value", () => {
    expect(asReal({ kind: "real", value: ONE })).toEqual({ ok: true, value: ONE });
  });

  it("should read from an entry", () => {
    expect(asStringBytes(STR1)).toEqual({ ok: true, value: new Uint8Array([0x48, 0x49]) });
  });

  it("should read complex, list and matrix values", () => {
    const complex = { real: ONE, imaginary: ONE };
    expect(asComplex({ kind: "complex", value: complex })).toEqual({ ok: true, value: complex });
    expect(asRealList({ kind: "real-list", elements: [ONE] })).toEqual({ ok: true, value: [ONE] });
    expect(asMatrix({ kind: "matrix", rows: [[ONE]] })).toEqual({ ok: true, value: [[ONE]] });
  });

  it("should read program tokens", () => {
    const tokens = new Uint8Array([0xde]);
    expect(asProgramBytes({ kind: "program", tokens, protected: true })).toEqual({
      ok: true,
      value: tokens,
    });
  });

  it("should read opaque bytes of either kind", () => {
    const bytes = new Uint8Array([1]);
    expect(asOpaqueBytes({ kind: "raw-opaque", tag: 0x99, bytes })).toEqual({
      ok: true,
      value: { tag: 0x99, bytes },
    });
    expect(asOpaqueBytes({ kind: "group-or-app", tag: 0x15, bytes })).toEqual({
      ok: true,
      value: { tag: 0x15, bytes },
    });
  });

  it("should report a mismatch by entry name", () => {
    const result = asReal(STR1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("type_mismatch");
      expect(result.error.message).toBe('"Str1" is string, not real');
    }
  });

  it("should report a mismatch on a bare value", () => {
    const result = asOpaqueBytes({ kind: "real", value: ONE });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("value is real, not group-or-app or raw-opaque");
    }
  });

  describe("archived flag", () => {
    it("should read bit 7", () => {
      expect(isArchived({ flags: 0x80 })).toBe(true);
      expect(isArchived({ flags: 0x01 })).toBe(false);
    });

    it("should set and clear without touching other bits", () => {
      const archived = withArchived({ ...STR1, flags: 0x01 }, true);
      expect(archived.flags).toBe(0x81);
      expect(archived.name).toBe("Str1");
      expect(withArchived(archived, false).flags).toBe(0x01);
    });

    it("should not modify the input", () => {
      withArchived(STR1, true);
      expect(STR1.flags).toBe(0);
    });
  });
});
