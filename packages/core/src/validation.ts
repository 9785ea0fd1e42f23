/**
 * Container Validation
 *
 * Three independent checks, each with its own error kind:
 * - Data length: declared N == sum of entry sizes      → length_mismatch
 * - Entry bounds: an entry fits in what is left of N   → truncated_entry
 * - Checksum: stored value == sum of region mod 2^16   → checksum_mismatch
 */

import { computeChecksum } from "./checksum.ts";
import { ENTRY_OVERHEAD } from "./constants.ts";
import type { Result } from "./types.ts";
import { fail, ok } from "./utils.ts";

/**
 * Check the declared data length against the bytes the entries occupy
 */
export function checkDataLength(declared: number, entrySizes: number[]): Result<void> {
  const actual = entrySizes.reduce((sum, size) => sum + size, 0);
  if (declared !== actual) {
    return fail(
      "length_mismatch",
      `Data length field says ${declared} bytes, entries occupy ${actual}`
    );
  }
  return ok(undefined);
}

/**
 * Check an entry with payload length `payloadLength` fits in `remaining` bytes
 *
 * @param remaining - Bytes left in the entry region, counted from the entry start
 */
export function checkEntryBounds(payloadLength: number, remaining: number): Result<void> {
  const needed = ENTRY_OVERHEAD + payloadLength;
  if (needed > remaining) {
    return fail(
      "truncated_entry",
      `Entry needs ${needed} bytes (payload ${payloadLength}), only ${remaining} remain`
    );
  }
  return ok(undefined);
}

/**
 * Check the stored checksum against the entry region
 */
export function checkChecksum(region: Uint8Array, stored: number): Result<void> {
  const computed = computeChecksum(region);
  if (computed !== stored) {
    return fail(
      "checksum_mismatch",
      `Checksum is 0x${stored.toString(16).padStart(4, "0")}, entries sum to 0x${computed.toString(16).padStart(4, "0")}`
    );
  }
  return ok(undefined);
}
