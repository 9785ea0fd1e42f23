/**
 * Checksum
 *
 * The file's trailing checksum is the low 16 bits of the sum of every byte in
 * the entry region, starting from zero.
 */

/**
 * Compute the 16-bit checksum of an entry region
 */
export function computeChecksum(region: Uint8Array): number {
  let sum = 0;
  for (const byte of region) {
    sum = (sum + byte) & 0xffff;
  }
  return sum;
}

/**
 * Check an entry region against an expected checksum
 */
export function verifyChecksum(region: Uint8Array, expected: number): boolean {
  return computeChecksum(region) === expected;
}
