/**
 * Value encoding/decoding tests
 */
import { describe, expect, it } from "vitest";
import { TYPE_TAG } from "../src/constants.ts";
import { encodeReal } from "../src/real.ts";
import type { CalculatorValue, RealNumber, Result } from "../src/types.ts";
import { concatBytes } from "../src/utils.ts";
import { decodeValue, encodeValue, isInterpretedTag, valueTag } from "../src/value.ts";

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

function real(mantissa: string, exponent = 0, negative = false): RealNumber {
  return { negative, exponent, mantissa };
}

function roundtrip(value: CalculatorValue): CalculatorValue {
  return unwrap(decodeValue(valueTag(value), unwrap(encodeValue(value))));
}

describe("Value", () => {
  describe("real", () => {
    it("should roundtrip", () => {
      const value: CalculatorValue = { kind: "real", value: real("314", 2, true) };
      expect(roundtrip(value)).toEqual(value);
    });

    it("should reject a payload of the wrong size", () => {
      const result = decodeValue(TYPE_TAG.REAL, new Uint8Array(10));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("length_mismatch");
    });

    it("should shift error offsets by the payload offset", () => {
      const payload = new Uint8Array([0x00, 0x80, 0xb0, 0, 0, 0, 0, 0, 0]);
      const result = decodeValue(TYPE_TAG.REAL, payload, 100);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("malformed_digit");
        expect(result.error.offset).toBe(102);
      }
    });
  });

  describe("real flags", () => {
    it("should reject a real record carrying extra flag bits", () => {
      const payload = new Uint8Array([0x4c, 0x80, 0x50, 0, 0, 0, 0, 0, 0]);
      const result = decodeValue(TYPE_TAG.REAL, payload, 13);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("invalid_flags");
        expect(result.error.offset).toBe(13);
      }
    });

    it("should reject complex parts typed as reals", () => {
      const payload = concatBytes(unwrap(encodeReal(real("1"))), unwrap(encodeReal(real("2"))));
      const result = decodeValue(TYPE_TAG.COMPLEX, payload);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("invalid_flags");
        expect(result.error.offset).toBe(0);
      }
    });

    it("should re-encode a decoded real payload byte-identically", () => {
      const payload = new Uint8Array([0x80, 0x81, 0x50, 0, 0, 0, 0, 0, 0]);
      expect(unwrap(encodeValue(unwrap(decodeValue(TYPE_TAG.REAL, payload))))).toEqual(payload);
    });
  });

  describe("complex", () => {
    it("should encode two parts typed as complex", () => {
      const bytes = unwrap(
        encodeValue({ kind: "complex", value: { real: real("1"), imaginary: real("2", 0, true) } })
      );
      expect(bytes.length).toBe(18);
      expect(bytes[0]).toBe(0x0c);
      expect(bytes[9]).toBe(0x8c);
    });

    it("should roundtrip", () => {
      const value: CalculatorValue = {
        kind: "complex",
        value: { real: real("15", -1), imaginary: real("25", 3, true) },
      };
      expect(roundtrip(value)).toEqual(value);
    });
  });

  describe("real list", () => {
    it("should prefix the element count", () => {
      const bytes = unwrap(encodeValue({ kind: "real-list", elements: [real("1"), real("2")] }));
      expect(bytes.length).toBe(2 + 2 * 9);
      expect(bytes[0]).toBe(2);
      expect(bytes[1]).toBe(0);
    });

    it("should roundtrip", () => {
      const value: CalculatorValue = {
        kind: "real-list",
        elements: [real("1"), real("25", -1, true), real("0")],
      };
      expect(roundtrip(value)).toEqual(value);
    });

    it("should roundtrip an empty list", () => {
      const value: CalculatorValue = { kind: "real-list", elements: [] };
      expect(unwrap(encodeValue(value))).toEqual(new Uint8Array([0, 0]));
      expect(roundtrip(value)).toEqual(value);
    });

    it("should reject a count that disagrees with the payload length", () => {
      const records = concatBytes(unwrap(encodeReal(real("1"))), unwrap(encodeReal(real("2"))));
      const payload = concatBytes(new Uint8Array([3, 0]), records);
      const result = decodeValue(TYPE_TAG.REAL_LIST, payload);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("length_mismatch");
    });

    it("should reject a payload too short for the count", () => {
      const result = decodeValue(TYPE_TAG.REAL_LIST, new Uint8Array([0]));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("length_mismatch");
    });

    it("should report the malformed element's offset", () => {
      const bad = new Uint8Array([0x00, 0x80, 0xa0, 0, 0, 0, 0, 0, 0]);
      const payload = concatBytes(new Uint8Array([2, 0]), unwrap(encodeReal(real("1"))), bad);
      const result = decodeValue(TYPE_TAG.REAL_LIST, payload);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("malformed_digit");
        expect(result.error.offset).toBe(13);
      }
    });
  });

  describe("complex list", () => {
    it("should roundtrip", () => {
      const value: CalculatorValue = {
        kind: "complex-list",
        elements: [
          { real: real("1"), imaginary: real("2") },
          { real: real("3", 1, true), imaginary: real("0") },
        ],
      };
      const bytes = unwrap(encodeValue(value));
      expect(bytes.length).toBe(2 + 2 * 18);
      expect(roundtrip(value)).toEqual(value);
    });

    it("should reject a real-sized payload", () => {
      const payload = concatBytes(new Uint8Array([1, 0]), unwrap(encodeReal(real("1"))));
      const result = decodeValue(TYPE_TAG.COMPLEX_LIST, payload);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("length_mismatch");
    });
  });

  describe("matrix", () => {
    const value: CalculatorValue = {
      kind: "matrix",
      rows: [
        [real("1"), real("2"), real("3")],
        [real("4"), real("5"), real("6", 0, true)],
      ],
    };

    it("should write rows then columns", () => {
      const bytes = unwrap(encodeValue(value));
      expect(bytes[0]).toBe(2);
      expect(bytes[1]).toBe(3);
      expect(bytes.length).toBe(2 + 6 * 9);
    });

    it("should store records row-major", () => {
      const bytes = unwrap(encodeValue(value));
      // second record is row 0, column 1 → "2"
      expect(bytes[2 + 9 + 2]).toBe(0x20);
      // fourth record is row 1, column 0 → "4"
      expect(bytes[2 + 27 + 2]).toBe(0x40);
    });

    it("should roundtrip", () => {
      expect(roundtrip(value)).toEqual(value);
    });

    it("should reject dimensions that disagree with the payload", () => {
      const payload = concatBytes(
        new Uint8Array([2, 2]),
        unwrap(encodeReal(real("1"))),
        unwrap(encodeReal(real("2"))),
        unwrap(encodeReal(real("3")))
      );
      const result = decodeValue(TYPE_TAG.MATRIX, payload);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("length_mismatch");
    });

    it("should reject ragged rows on encode", () => {
      const result = encodeValue({ kind: "matrix", rows: [[real("1"), real("2")], [real("3")]] });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("length_mismatch");
    });

    it("should reject more than 255 rows", () => {
      const rows = Array.from({ length: 256 }, () => [real("1")]);
      const result = encodeValue({ kind: "matrix", rows });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("field_overflow");
    });
  });

  describe("string", () => {
    it("should copy bytes verbatim", () => {
      const payload = new Uint8Array([0x48, 0x49, 0xbb, 0x00]);
      const value = unwrap(decodeValue(TYPE_TAG.STRING, payload));
      expect(value).toEqual({ kind: "string", bytes: payload });
      if (value.kind === "string") expect(value.bytes).not.toBe(payload);
    });

    it("should decode an empty payload", () => {
      expect(unwrap(decodeValue(TYPE_TAG.STRING, new Uint8Array(0)))).toEqual({
        kind: "string",
        bytes: new Uint8Array(0),
      });
    });
  });

  describe("program", () => {
    const tokens = new Uint8Array([0xde, 0x2a, 0x48, 0x2a]);

    it("should prefix the token length", () => {
      const bytes = unwrap(encodeValue({ kind: "program", tokens, protected: false }));
      expect(Array.from(bytes)).toEqual([4, 0, 0xde, 0x2a, 0x48, 0x2a]);
    });

    it("should use the protected tag when protected", () => {
      expect(valueTag({ kind: "program", tokens, protected: false })).toBe(TYPE_TAG.PROGRAM);
      expect(valueTag({ kind: "program", tokens, protected: true })).toBe(
        TYPE_TAG.PROTECTED_PROGRAM
      );
    });

    it("should decode both program tags", () => {
      const payload = new Uint8Array([4, 0, 0xde, 0x2a, 0x48, 0x2a]);
      expect(unwrap(decodeValue(TYPE_TAG.PROGRAM, payload))).toEqual({
        kind: "program",
        tokens,
        protected: false,
      });
      expect(unwrap(decodeValue(TYPE_TAG.PROTECTED_PROGRAM, payload))).toEqual({
        kind: "program",
        tokens,
        protected: true,
      });
    });

    it("should reject a length prefix that disagrees with the payload", () => {
      const result = decodeValue(TYPE_TAG.PROGRAM, new Uint8Array([5, 0, 0xde, 0x2a]));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("length_mismatch");
    });
  });

  describe("group-or-app", () => {
    it("should keep AppVar bytes opaque", () => {
      const payload = new Uint8Array([2, 0, 0xaa, 0xbb]);
      expect(unwrap(decodeValue(TYPE_TAG.APPVAR, payload))).toEqual({
        kind: "group-or-app",
        tag: TYPE_TAG.APPVAR,
        bytes: payload,
      });
    });

    it("should encode group bytes verbatim", () => {
      const bytes = new Uint8Array([0x0d, 0x00, 0x05]);
      const value: CalculatorValue = { kind: "group-or-app", tag: TYPE_TAG.GROUP, bytes };
      expect(unwrap(encodeValue(value))).toEqual(bytes);
      expect(valueTag(value)).toBe(TYPE_TAG.GROUP);
    });
  });

  describe("raw-opaque", () => {
    it("should decode unknown tags and re-encode byte-identically", () => {
      const payload = new Uint8Array([0x01, 0xff, 0x7e]);
      const value = unwrap(decodeValue(0x99, payload));
      expect(value).toEqual({ kind: "raw-opaque", tag: 0x99, bytes: payload });
      expect(valueTag(value)).toBe(0x99);
      expect(unwrap(encodeValue(value))).toEqual(payload);
    });

    it("should treat pictures as raw-opaque", () => {
      const value = unwrap(decodeValue(TYPE_TAG.PICTURE, new Uint8Array([1, 2])));
      expect(value.kind).toBe("raw-opaque");
    });

    it("should refuse a tag that has a typed variant", () => {
      const result = encodeValue({ kind: "raw-opaque", tag: TYPE_TAG.REAL, bytes: new Uint8Array(9) });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("type_mismatch");
    });

    it("should refuse a tag wider than a byte", () => {
      const result = encodeValue({ kind: "raw-opaque", tag: 0x100, bytes: new Uint8Array(0) });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("field_overflow");
    });
  });

  describe("isInterpretedTag", () => {
    it("should cover typed variants only", () => {
      expect(isInterpretedTag(TYPE_TAG.REAL)).toBe(true);
      expect(isInterpretedTag(TYPE_TAG.FLASH_APP)).toBe(true);
      expect(isInterpretedTag(TYPE_TAG.EQUATION)).toBe(false);
      expect(isInterpretedTag(0x99)).toBe(false);
    });
  });
});
