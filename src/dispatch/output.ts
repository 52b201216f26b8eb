export const TRUNCATION_MARKER = "\n[output truncated]";

export type BoundedOutput = { output: string; truncated: boolean };

/**
 * Cap `output` at `maxBytes` UTF-8 bytes (marker included), cutting on a character
 * boundary. Truncation is always reported.
 */
export function boundOutput(output: string, maxBytes: number): BoundedOutput {
  if (Buffer.byteLength(output, "utf8") <= maxBytes) {
    return { output, truncated: false };
  }

  const budget = Math.max(0, maxBytes - Buffer.byteLength(TRUNCATION_MARKER, "utf8"));
  const buf = Buffer.from(output, "utf8");
  let end = Math.min(budget, buf.length);
  // back off continuation bytes (10xxxxxx) so a multi-byte character is not split
  while (end > 0 && end < buf.length && (buf[end] & 0xc0) === 0x80) end--;

  return { output: buf.subarray(0, end).toString("utf8") + TRUNCATION_MARKER, truncated: true };
}
