/**
 * @tivars/encoding
 *
 * Byte/text helpers shared by the tivars packages.
 *
 * - Hex encode/decode (compact and spaced dump forms)
 * - Single-byte formatting for diagnostics
 */

export { bytesToHex, formatByte, formatBytes, hexToBytes } from "./hex.ts";
