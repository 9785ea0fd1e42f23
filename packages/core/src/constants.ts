/**
 * TI Variable File Format Constants
 *
 * File layout:
 * - 0-10:   signature + version (11 bytes)
 * - 11-52:  comment (42 bytes, space- or zero-padded)
 * - 53-54:  data length N (u16 LE)
 * - 55..:   entry region (N bytes)
 * - last 2: checksum (u16 LE, sum of entry region mod 2^16)
 *
 * Entry layout:
 * - [len:2][tag:1][name:8][version:1][flags:1][payload:len][len':2]
 */

/**
 * Signature + version size in bytes
 */
export const SIGNATURE_SIZE = 11;

/**
 * Comment field size in bytes
 */
export const COMMENT_SIZE = 42;

/**
 * Data length field size in bytes
 */
export const DATA_LENGTH_SIZE = 2;

/**
 * Checksum field size in bytes
 */
export const CHECKSUM_SIZE = 2;

/**
 * Offset of each header field
 */
export const FILE_OFFSETS = {
  SIGNATURE: 0,
  COMMENT: SIGNATURE_SIZE,
  DATA_LENGTH: SIGNATURE_SIZE + COMMENT_SIZE,
  ENTRIES: SIGNATURE_SIZE + COMMENT_SIZE + DATA_LENGTH_SIZE,
} as const;

/**
 * Header size (signature + comment + data length)
 */
export const HEADER_SIZE = FILE_OFFSETS.ENTRIES;

/**
 * Largest entry region the u16 data length field can describe
 */
export const MAX_DATA_LENGTH = 0xffff;

/**
 * Known signatures, keyed by format id.
 *
 * Both end with 0x1A 0x0A 0x00; the eight leading characters identify the
 * calculator family.
 */
export const SIGNATURES = {
  /** TI-83 Plus / TI-84 Plus family */
  ti83plus: new Uint8Array([0x2a, 0x2a, 0x54, 0x49, 0x38, 0x33, 0x46, 0x2a, 0x1a, 0x0a, 0x00]),
  /** Original TI-83 */
  ti83: new Uint8Array([0x2a, 0x2a, 0x54, 0x49, 0x38, 0x33, 0x2a, 0x2a, 0x1a, 0x0a, 0x00]),
} as const;

export type FormatId = keyof typeof SIGNATURES;

export const DEFAULT_FORMAT: FormatId = "ti83plus";

/**
 * Entry field sizes
 */
export const ENTRY_SIZES = {
  LENGTH: 2,
  TAG: 1,
  NAME: 8,
  VERSION: 1,
  FLAGS: 1,
  TRAILING_LENGTH: 2,
} as const;

/**
 * Bytes an entry occupies besides its payload (2 + 1 + 8 + 1 + 1 + 2)
 */
export const ENTRY_OVERHEAD =
  ENTRY_SIZES.LENGTH +
  ENTRY_SIZES.TAG +
  ENTRY_SIZES.NAME +
  ENTRY_SIZES.VERSION +
  ENTRY_SIZES.FLAGS +
  ENTRY_SIZES.TRAILING_LENGTH;

/**
 * Offsets of entry fields relative to the start of the entry
 */
export const ENTRY_OFFSETS = {
  LENGTH: 0,
  TAG: 2,
  NAME: 3,
  VERSION: 11,
  FLAGS: 12,
  PAYLOAD: 13,
} as const;

/**
 * Entry flags byte
 */
export const ENTRY_FLAGS = {
  /** Variable lives in archive (flash) memory */
  ARCHIVED: 0x80,
} as const;

/**
 * Largest payload the u16 entry length fields can describe
 */
export const MAX_PAYLOAD_LENGTH = 0xffff;

/**
 * Type tags (entry byte 2)
 *
 * | Tag  | Variant                  |
 * |------|--------------------------|
 * | 0x00 | real                     |
 * | 0x01 | real list                |
 * | 0x02 | matrix                   |
 * | 0x03 | equation (raw-opaque)    |
 * | 0x04 | string                   |
 * | 0x05 | program                  |
 * | 0x06 | protected program        |
 * | 0x07 | picture (raw-opaque)     |
 * | 0x08 | graph database (raw)     |
 * | 0x0C | complex                  |
 * | 0x0D | complex list             |
 * | 0x15 | AppVar (group-or-app)    |
 * | 0x17 | group (group-or-app)     |
 * | 0x24 | flash app (group-or-app) |
 */
export const TYPE_TAG = {
  REAL: 0x00,
  REAL_LIST: 0x01,
  MATRIX: 0x02,
  EQUATION: 0x03,
  STRING: 0x04,
  PROGRAM: 0x05,
  PROTECTED_PROGRAM: 0x06,
  PICTURE: 0x07,
  GDB: 0x08,
  COMPLEX: 0x0c,
  COMPLEX_LIST: 0x0d,
  APPVAR: 0x15,
  GROUP: 0x17,
  FLASH_APP: 0x24,
} as const;

/**
 * Tags stored as opaque group/application data
 */
export const GROUP_OR_APP_TAGS = [TYPE_TAG.APPVAR, TYPE_TAG.GROUP, TYPE_TAG.FLASH_APP] as const;

export type GroupOrAppTag = (typeof GROUP_OR_APP_TAGS)[number];

/**
 * Real number record (9 bytes)
 * - 0:    flags (bit 7 sign, bits 0-4 type)
 * - 1:    exponent, biased by 0x80
 * - 2-8:  14 BCD digits, high nibble first
 */
export const REAL_SIZE = 9;

/**
 * Complex number record (two real records)
 */
export const COMPLEX_SIZE = REAL_SIZE * 2;

/**
 * Number of mantissa digits in a real record
 */
export const MANTISSA_DIGITS = 14;

export const EXPONENT_BIAS = 0x80;

/**
 * Real record flags byte
 */
export const REAL_FLAGS = {
  /** Sign bit (set = negative) */
  SIGN: 0x80,
  /** Type bits */
  TYPE_MASK: 0x1f,
} as const;

/**
 * List count prefix (u16 LE)
 */
export const LIST_COUNT_SIZE = 2;

/**
 * Matrix dimension header (rows byte + columns byte)
 */
export const MATRIX_HEADER_SIZE = 2;

/**
 * Token length prefix for programs and equations (u16 LE)
 */
export const TOKEN_LENGTH_SIZE = 2;

/**
 * Largest matrix dimension (one byte)
 */
export const MAX_MATRIX_DIMENSION = 0xff;
