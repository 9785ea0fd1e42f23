/**
 * String Value Text Helpers
 *
 * String bytes are calculator-encoded, one byte per glyph. Printable ASCII
 * (0x20-0x7E, except backslash) maps to itself; every other byte, including
 * the reserved token range, reads as a `\xNN` escape so text round-trips.
 */

import type { Result, StringValue } from "./types.ts";
import { fail, ok } from "./utils.ts";

const BACKSLASH = 0x5c;

function isPlain(byte: number): boolean {
  return byte >= 0x20 && byte <= 0x7e && byte !== BACKSLASH;
}

/**
 * Render string bytes as text
 *
 * @example stringToText(new Uint8Array([0x48, 0x49, 0xbb])) → "HI\\xBB"
 */
export function stringToText(bytes: Uint8Array): string {
  let text = "";
  for (const byte of bytes) {
    text += isPlain(byte)
      ? String.fromCharCode(byte)
      : `\\x${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return text;
}

/**
 * Parse text written by `stringToText` back into a string value
 *
 * Text that does not map onto string bytes (a malformed escape, or a
 * character with no single-byte form) is `field_overflow`, the code for any
 * value that cannot be written into its field. The message says which.
 */
export function stringFromText(text: string): Result<StringValue> {
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code === BACKSLASH) {
      const escape = /^\\x([0-9A-Fa-f]{2})/.exec(text.slice(i));
      if (escape === null || escape[1] === undefined) {
        return fail(
          "field_overflow",
          `Cannot parse escape at ${i} in "${text}": expected \\x and two hex digits`,
          { offset: i }
        );
      }
      bytes.push(Number.parseInt(escape[1], 16));
      i += 3;
    } else if (isPlain(code)) {
      bytes.push(code);
    } else {
      return fail(
        "field_overflow",
        `Cannot parse character "${text[i] ?? ""}" at ${i}: it has no single-byte encoding, write it as \\xNN`,
        { offset: i }
      );
    }
  }
  return ok({ kind: "string", bytes: new Uint8Array(bytes) });
}
