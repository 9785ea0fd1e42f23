/**
 * File Comment Helpers
 *
 * The comment field is 42 bytes. Calculator software leaves it empty or
 * writes text that is either zero-terminated or right-padded with spaces;
 * the calculator itself never reads it. All helpers return new buffers.
 */

import { COMMENT_SIZE } from "./constants.ts";
import type { Result } from "./types.ts";
import { fail, ok } from "./utils.ts";

const SPACE = 0x20;

const textEncoder = new TextEncoder();

function terminatorPosition(comment: Uint8Array): number {
  return comment.indexOf(0);
}

function trailingSpaces(comment: Uint8Array): number {
  let count = 0;
  for (let i = comment.length - 1; i >= 0 && comment[i] === SPACE; i--) {
    count++;
  }
  return count;
}

/**
 * Build a comment field from UTF-8 text
 *
 * @param options.zeroTerminated - Pad with zeros (default) or with spaces
 */
export function createComment(
  text: string,
  options: { zeroTerminated?: boolean } = {}
): Result<Uint8Array> {
  const bytes = textEncoder.encode(text);
  if (bytes.length > COMMENT_SIZE) {
    return fail(
      "field_overflow",
      `Comment is ${bytes.length} bytes (max ${COMMENT_SIZE})`
    );
  }
  const comment = new Uint8Array(COMMENT_SIZE).fill(options.zeroTerminated === false ? SPACE : 0);
  comment.set(bytes, 0);
  return ok(comment);
}

/**
 * Turn encode input (text, raw bytes or nothing) into a 42-byte field.
 * Short byte inputs are zero-padded.
 */
export function normalizeComment(comment: string | Uint8Array | undefined): Result<Uint8Array> {
  if (comment === undefined) {
    return ok(new Uint8Array(COMMENT_SIZE));
  }
  if (typeof comment === "string") {
    return createComment(comment);
  }
  if (comment.length > COMMENT_SIZE) {
    return fail("field_overflow", `Comment is ${comment.length} bytes (max ${COMMENT_SIZE})`);
  }
  const field = new Uint8Array(COMMENT_SIZE);
  field.set(comment, 0);
  return ok(field);
}

/**
 * Read the comment as UTF-8 text
 *
 * Text stops at the first zero byte. Without one, trailing space padding is
 * removed unless `trim` is false.
 *
 * @returns The text, or null when the bytes are not valid UTF-8
 */
export function readComment(comment: Uint8Array, options: { trim?: boolean } = {}): string | null {
  const terminator = terminatorPosition(comment);
  let end = terminator === -1 ? comment.length : terminator;
  if (terminator === -1 && options.trim !== false) {
    end -= trailingSpaces(comment);
  }

  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(comment.subarray(0, end));
  } catch {
    return null;
  }
}

/**
 * Length of the comment text in bytes, ignoring zero termination or
 * space padding
 */
export function commentLength(comment: Uint8Array): number {
  const terminator = terminatorPosition(comment);
  if (terminator !== -1) return terminator;
  return comment.length - trailingSpaces(comment);
}

/**
 * Whether the comment is zero-terminated (false when padded or full)
 */
export function isCommentZeroTerminated(comment: Uint8Array): boolean {
  return terminatorPosition(comment) !== -1;
}

/**
 * Zero-terminate a space-padded comment
 *
 * The first padding space becomes the terminator. A full comment with no
 * padding is returned unchanged.
 */
export function toZeroTerminatedComment(comment: Uint8Array): Uint8Array {
  const result = comment.slice();
  if (isCommentZeroTerminated(result)) return result;

  const spaces = trailingSpaces(result);
  if (spaces === 0) return result;
  result[result.length - spaces] = 0;
  return result;
}

/**
 * Replace zero termination with space padding
 */
export function toPaddedComment(comment: Uint8Array): Uint8Array {
  const result = comment.slice();
  const terminator = terminatorPosition(result);
  if (terminator === -1) return result;
  result.fill(SPACE, terminator);
  return result;
}
