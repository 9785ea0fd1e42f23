/**
 * Well-known file bytes
 */

import { CHECKSUM_SIZE, HEADER_SIZE, SIGNATURES } from "./constants.ts";

/**
 * An empty TI-83 Plus file: signature, zeroed comment, N = 0, checksum 0
 *
 * Structure (57 bytes):
 * - 0-10:   "**TI83F*" 1A 0A 00
 * - 11-52:  42 zero bytes
 * - 53-54:  data length 0
 * - 55-56:  checksum 0
 */
export const EMPTY_FILE_BYTES = new Uint8Array(HEADER_SIZE + CHECKSUM_SIZE);
EMPTY_FILE_BYTES.set(SIGNATURES.ti83plus, 0);
