/**
 * Variable Entry Encoding/Decoding
 *
 * Entry layout:
 * - 0-1:     payload length L (u16 LE)
 * - 2:       type tag
 * - 3-10:    name (8 bytes, zero-padded)
 * - 11:      version
 * - 12:      flags (bit 7 = archived)
 * - 13..:    payload (L bytes)
 * - last 2:  payload length L' (u16 LE), must equal L
 */

import {
  ENTRY_OFFSETS,
  ENTRY_OVERHEAD,
  ENTRY_SIZES,
  MAX_PAYLOAD_LENGTH,
} from "./constants.ts";
import { decodeName, encodeName } from "./name.ts";
import type { DecodedEntry, Result, VariableEntryInput } from "./types.ts";
import { concatBytes, encodeUint16, fail, ok, readUint16 } from "./utils.ts";
import { checkEntryBounds } from "./validation.ts";
import { decodeValue, encodeValue, valueTag } from "./value.ts";

/**
 * Total bytes an entry with an `payloadLength`-byte payload occupies
 */
export function entrySize(payloadLength: number): number {
  return ENTRY_OVERHEAD + payloadLength;
}

/**
 * Decode one entry starting at `cursor`
 *
 * @param buffer - Buffer holding the entry
 * @param cursor - Offset of the entry's first byte
 * @param end - Offset one past the last byte the entry may use (default: buffer end)
 */
export function decodeEntry(
  buffer: Uint8Array,
  cursor: number,
  end: number = buffer.length
): Result<DecodedEntry> {
  const remaining = end - cursor;
  if (remaining < ENTRY_OFFSETS.PAYLOAD) {
    return fail(
      "truncated_entry",
      `Entry at ${cursor} needs at least ${ENTRY_OFFSETS.PAYLOAD} header bytes, ${remaining} remain`,
      { offset: cursor }
    );
  }

  const length = readUint16(buffer, cursor + ENTRY_OFFSETS.LENGTH);
  const bounds = checkEntryBounds(length, remaining);
  if (!bounds.ok) {
    return { ok: false, error: { ...bounds.error, offset: cursor } };
  }

  const tag = buffer[cursor + ENTRY_OFFSETS.TAG] ?? 0;
  const nameStart = cursor + ENTRY_OFFSETS.NAME;
  const nameField = buffer.subarray(nameStart, nameStart + ENTRY_SIZES.NAME);
  const version = buffer[cursor + ENTRY_OFFSETS.VERSION] ?? 0;
  const flags = buffer[cursor + ENTRY_OFFSETS.FLAGS] ?? 0;
  const payloadStart = cursor + ENTRY_OFFSETS.PAYLOAD;
  const payload = buffer.subarray(payloadStart, payloadStart + length);
  const trailingLength = readUint16(buffer, payloadStart + length);

  if (trailingLength !== length) {
    return fail(
      "trailing_length_mismatch",
      `Entry at ${cursor} declares ${length} payload bytes up front, ${trailingLength} at the end`,
      { offset: payloadStart + length }
    );
  }

  const name = decodeName(tag, nameField, nameStart);
  if (!name.ok) return name;

  const value = decodeValue(tag, payload, payloadStart);
  if (!value.ok) return value;

  return ok({
    entry: { name: name.value, version, flags, value: value.value },
    length,
    tag,
    bytesConsumed: entrySize(length),
  });
}

function checkByte(value: number, field: string): Result<number> {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    return fail("field_overflow", `${field} ${value} does not fit in one byte`);
  }
  return ok(value);
}

/**
 * Encode one entry
 */
export function encodeEntry(input: VariableEntryInput): Result<Uint8Array> {
  const tag = valueTag(input.value);

  const name = encodeName(tag, input.name);
  if (!name.ok) return name;

  const version = checkByte(input.version ?? 0, "Version");
  if (!version.ok) return version;
  const flags = checkByte(input.flags ?? 0, "Flags");
  if (!flags.ok) return flags;

  const payload = encodeValue(input.value);
  if (!payload.ok) return payload;
  if (payload.value.length > MAX_PAYLOAD_LENGTH) {
    return fail(
      "field_overflow",
      `Payload of "${input.name}" is ${payload.value.length} bytes (max ${MAX_PAYLOAD_LENGTH})`
    );
  }

  const length = encodeUint16(payload.value.length);
  return ok(
    concatBytes(
      length,
      new Uint8Array([tag]),
      name.value,
      new Uint8Array([version.value, flags.value]),
      payload.value,
      length
    )
  );
}
