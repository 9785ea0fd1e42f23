/**
 * Decode Options
 *
 * Each option is a read mode:
 * - "error": malformed data fails the decode (default)
 * - "fix":   the codec repairs what it can and carries on
 */

import { z } from "zod";

export const ReadModeSchema = z.enum(["error", "fix"]);

export type ReadMode = z.infer<typeof ReadModeSchema>;

export const DecodeOptionsSchema = z
  .object({
    /** Read an unrecognized signature as the default format */
    signature: ReadModeSchema.default("error"),
    /** Accept a stored checksum that disagrees with the entry region */
    checksum: ReadModeSchema.default("error"),
    /** Derive N from the buffer size when the data length field disagrees */
    dataLength: ReadModeSchema.default("error"),
  })
  .strict();

export type DecodeOptions = z.infer<typeof DecodeOptionsSchema>;

export type DecodeOptionsInput = z.input<typeof DecodeOptionsSchema>;

/**
 * Fill in defaults and reject unknown keys or modes
 *
 * @throws ZodError on invalid options
 */
export function resolveDecodeOptions(options: DecodeOptionsInput = {}): DecodeOptions {
  return DecodeOptionsSchema.parse(options);
}
