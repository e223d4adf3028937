import { createHash } from "crypto";
import type { FileIdentity, LogExcerpt } from "./types";

export interface DecodedLog {
  text: string;
  /** True when invalid byte sequences were replaced with U+FFFD */
  lossy: boolean;
}

/**
 * Decode uploaded bytes as UTF-8. Invalid input is re-decoded with
 * replacement characters instead of failing the upload.
 */
export function decodeLogBytes(bytes: Uint8Array): DecodedLog {
  try {
    return { text: new TextDecoder("utf-8", { fatal: true }).decode(bytes), lossy: false };
  } catch {
    console.warn("[Pipeline] Upload is not valid UTF-8, decoding with replacement characters");
    return { text: new TextDecoder("utf-8").decode(bytes), lossy: true };
  }
}

export function splitLogLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Keep the first `maxLines` lines. The result is frozen. */
export function createLogExcerpt(lines: readonly string[], maxLines: number): LogExcerpt {
  if (!Number.isInteger(maxLines) || maxLines < 1) {
    throw new RangeError(`maxLines must be a positive integer, got ${maxLines}`);
  }
  return Object.freeze({
    lines: Object.freeze(lines.slice(0, maxLines)),
    totalLines: lines.length,
    truncated: lines.length > maxLines,
  });
}

/** Narrow an existing excerpt to a smaller bound (e.g. chat context). */
export function narrowExcerpt(excerpt: LogExcerpt, maxLines: number): LogExcerpt {
  const narrowed = createLogExcerpt(excerpt.lines, maxLines);
  return Object.freeze({
    lines: narrowed.lines,
    totalLines: excerpt.totalLines,
    truncated: excerpt.truncated || narrowed.truncated,
  });
}

export function computeFileIdentity(name: string, bytes: Uint8Array): FileIdentity {
  const fingerprint = createHash("sha256").update(bytes).digest("hex");
  return { name, fingerprint, key: `${name}:${fingerprint}` };
}
