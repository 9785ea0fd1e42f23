/**
 * Hex encoding/decoding utilities
 */

/**
 * Convert bytes to hex string.
 *
 * @param bytes - Bytes to encode
 * @returns Lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

/**
 * Convert hex string to bytes.
 *
 * Whitespace between byte pairs is ignored, so fixtures can be written as
 * `"2a 2a 54 49"` as well as `"2a2a5449"`.
 *
 * @param hex - Hex string (must have even length once whitespace is removed)
 * @returns Decoded bytes
 * @throws Error if hex string has odd length or a non-hex character
 */
export function hexToBytes(hex: string): Uint8Array {
  const compact = hex.replace(/\s+/g, "");
  if (compact.length % 2 !== 0) {
    throw new Error("Hex string must have even length");
  }
  if (!/^[0-9a-fA-F]*$/.test(compact)) {
    throw new Error(`Invalid hex string: ${hex}`);
  }

  const bytes = new Uint8Array(compact.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(compact.slice(i * 2, i * 2 + 2), 16);
  }

  return bytes;
}

/**
 * Format a single byte as `0xNN` (uppercase digits).
 *
 * @example formatByte(26) → "0x1A"
 */
export function formatByte(byte: number): string {
  return `0x${(byte & 0xff).toString(16).toUpperCase().padStart(2, "0")}`;
}

/**
 * Format bytes as a space-separated dump, e.g. `"5D 00"`.
 *
 * Long inputs are cut after `limit` bytes and end with `…`.
 */
export function formatBytes(bytes: Uint8Array, limit = 16): string {
  const shown = Array.from(bytes.subarray(0, limit)).map((b) =>
    b.toString(16).toUpperCase().padStart(2, "0")
  );
  return bytes.length > limit ? `${shown.join(" ")} …` : shown.join(" ");
}
