/**
 * Codec Utility Functions
 *
 * - u16 LE read/write over byte views
 * - Byte concatenation and comparison
 * - Result constructors
 */

import type { CodecError, CodecErrorCode, Result } from "./types.ts";

/**
 * Read a u16 LE at `offset`. Caller guarantees two bytes are available.
 */
export function readUint16(buffer: Uint8Array, offset: number): number {
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  return view.getUint16(offset, true);
}

/**
 * Encode a u16 as two LE bytes
 */
export function encodeUint16(value: number): Uint8Array {
  const result = new Uint8Array(2);
  const view = new DataView(result.buffer);
  view.setUint16(0, value, true);
  return result;
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, a) => sum + a.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}

/**
 * Byte-wise equality
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(
  code: CodecErrorCode,
  message: string,
  extra: Omit<CodecError, "code" | "message"> = {}
): Result<T> {
  return { ok: false, error: { code, message, ...extra } };
}
