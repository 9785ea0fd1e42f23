/**
 * Container Encoding/Decoding
 *
 * File layout:
 * - 0-10:    signature + version (see SIGNATURES)
 * - 11-52:   comment (42 bytes)
 * - 53-54:   data length N (u16 LE)
 * - 55..:    entries (N bytes)
 * - last 2:  checksum (u16 LE)
 *
 * Decode stages:
 *   start → header-read → comment-read → entries-reading → entries-done
 *         → checksum-read → valid | invalid
 *
 * The first error stops decoding and carries the stage it stopped in;
 * nothing is returned for a partial file.
 */

import { formatBytes } from "@tivars/encoding";
import { computeChecksum } from "./checksum.ts";
import { normalizeComment } from "./comment.ts";
import {
  CHECKSUM_SIZE,
  COMMENT_SIZE,
  DEFAULT_FORMAT,
  FILE_OFFSETS,
  type FormatId,
  HEADER_SIZE,
  MAX_DATA_LENGTH,
  SIGNATURE_SIZE,
  SIGNATURES,
} from "./constants.ts";
import { decodeEntry, encodeEntry } from "./entry.ts";
import { type DecodeOptionsInput, resolveDecodeOptions } from "./options.ts";
import type {
  CalculatorFile,
  CalculatorFileInput,
  CodecError,
  DecodeStage,
  Result,
  VariableEntry,
} from "./types.ts";
import { bytesEqual, concatBytes, encodeUint16, fail, ok, readUint16 } from "./utils.ts";
import { checkChecksum, checkDataLength } from "./validation.ts";

const FORMAT_IDS = ["ti83plus", "ti83"] as const satisfies readonly FormatId[];

/**
 * Identify the format from the leading signature bytes
 */
export function detectFormat(buffer: Uint8Array): FormatId | undefined {
  const signature = buffer.subarray(0, SIGNATURE_SIZE);
  return FORMAT_IDS.find((id) => bytesEqual(signature, SIGNATURES[id]));
}

function stopAt(stage: DecodeStage, error: CodecError): Result<CalculatorFile> {
  return { ok: false, error: { ...error, stage } };
}

/**
 * Decode a complete variable file
 *
 * @param buffer - File bytes; not modified or retained
 * @param options - Read modes, see DecodeOptionsSchema
 * @throws ZodError if `options` is invalid
 */
export function decodeFile(
  buffer: Uint8Array,
  options: DecodeOptionsInput = {}
): Result<CalculatorFile> {
  const {
    signature: signatureMode,
    checksum: checksumMode,
    dataLength: dataLengthMode,
  } = resolveDecodeOptions(options);

  // start → header-read
  let format = detectFormat(buffer);
  if (format === undefined) {
    const signature = formatBytes(buffer.subarray(0, SIGNATURE_SIZE));
    if (signatureMode !== "fix") {
      return stopAt("start", {
        code: "unknown_format",
        message: `Unrecognized signature ${signature}`,
        offset: FILE_OFFSETS.SIGNATURE,
      });
    }
    console.warn(`[tivars] unrecognized signature ${signature}, reading as ${DEFAULT_FORMAT}`);
    format = DEFAULT_FORMAT;
  }

  // header-read → comment-read
  if (buffer.length < HEADER_SIZE + CHECKSUM_SIZE) {
    return stopAt("header-read", {
      code: "truncated_file",
      message: `File is ${buffer.length} bytes, shorter than an empty file (${HEADER_SIZE + CHECKSUM_SIZE})`,
      offset: buffer.length,
    });
  }
  const comment = buffer.slice(FILE_OFFSETS.COMMENT, FILE_OFFSETS.COMMENT + COMMENT_SIZE);

  // comment-read → entries-reading
  let dataLength = readUint16(buffer, FILE_OFFSETS.DATA_LENGTH);
  const available = buffer.length - HEADER_SIZE - CHECKSUM_SIZE;
  if (dataLength !== available && dataLengthMode === "fix") {
    console.warn(`[tivars] data length field says ${dataLength}, using ${available}`);
    dataLength = available;
  }

  const regionEnd = HEADER_SIZE + dataLength;
  const entries: VariableEntry[] = [];
  const entrySizes: number[] = [];
  let cursor = HEADER_SIZE;
  while (cursor < regionEnd) {
    const decoded = decodeEntry(buffer, cursor, Math.min(regionEnd, buffer.length));
    if (!decoded.ok) return stopAt("entries-reading", decoded.error);
    entries.push(decoded.value.entry);
    entrySizes.push(decoded.value.bytesConsumed);
    cursor += decoded.value.bytesConsumed;
  }

  // entries-reading → entries-done
  // Entries are bounded by regionEnd, so this only asserts they tile N exactly
  const lengthCheck = checkDataLength(dataLength, entrySizes);
  if (!lengthCheck.ok) return stopAt("entries-done", lengthCheck.error);

  // entries-done → checksum-read
  if (regionEnd + CHECKSUM_SIZE > buffer.length) {
    return stopAt("entries-done", {
      code: "truncated_file",
      message: `File ends before the checksum at ${regionEnd}`,
      offset: buffer.length,
    });
  }
  const region = buffer.subarray(HEADER_SIZE, regionEnd);
  let checksum = readUint16(buffer, regionEnd);
  if (regionEnd + CHECKSUM_SIZE < buffer.length) {
    return stopAt("checksum-read", {
      code: "length_mismatch",
      message: `File has ${buffer.length - regionEnd - CHECKSUM_SIZE} bytes after the checksum`,
      offset: regionEnd + CHECKSUM_SIZE,
    });
  }

  // checksum-read → valid | invalid
  const checksumCheck = checkChecksum(region, checksum);
  if (!checksumCheck.ok) {
    if (checksumMode !== "fix") {
      return stopAt("checksum-read", { ...checksumCheck.error, offset: regionEnd });
    }
    checksum = computeChecksum(region);
    console.warn(`[tivars] ${checksumCheck.error.message}; using the computed checksum`);
  }

  return ok({ format, comment, dataLength, entries, checksum });
}

/**
 * Encode a variable file
 *
 * Entries are written in the given order. The data length and checksum are
 * computed from the serialized entries.
 */
export function encodeFile(input: CalculatorFileInput): Result<Uint8Array> {
  const format = input.format ?? DEFAULT_FORMAT;
  const signature = SIGNATURES[format];
  if (signature === undefined) {
    return fail("unknown_format", `Unknown format "${String(format)}"`);
  }

  const comment = normalizeComment(input.comment);
  if (!comment.ok) return comment;

  const parts: Uint8Array[] = [];
  for (const [index, entry] of input.entries.entries()) {
    const encoded = encodeEntry(entry);
    if (!encoded.ok) {
      return {
        ok: false,
        error: { ...encoded.error, message: `Entry ${index}: ${encoded.error.message}` },
      };
    }
    parts.push(encoded.value);
  }

  const region = concatBytes(...parts);
  if (region.length > MAX_DATA_LENGTH) {
    return fail(
      "field_overflow",
      `Entries take ${region.length} bytes (max ${MAX_DATA_LENGTH})`
    );
  }

  return ok(
    concatBytes(
      signature,
      comment.value,
      encodeUint16(region.length),
      region,
      encodeUint16(computeChecksum(region))
    )
  );
}

/**
 * Validation result
 */
export type ValidationResult = {
  valid: boolean;
  error?: CodecError;
  format?: FormatId;
  entryCount?: number;
  dataLength?: number;
};

/**
 * Run a full decode and report whether the file is valid
 */
export function validateFile(buffer: Uint8Array): ValidationResult {
  const result = decodeFile(buffer);
  if (!result.ok) {
    return { valid: false, error: result.error };
  }
  return {
    valid: true,
    format: result.value.format,
    entryCount: result.value.entries.length,
    dataLength: result.value.dataLength,
  };
}
