/**
 * Pure text-processing helpers used by tool implementations.
 */

/** Bytes sampled when deciding whether a file is binary. */
export const BINARY_SAMPLE_BYTES = 8000;

/** A NUL byte within the sampled prefix marks the buffer as binary. */
export function isBinary(buf: Buffer, sample = BINARY_SAMPLE_BYTES): boolean {
  const n = Math.min(buf.length, sample);
  for (let i = 0; i < n; i++) {
    if (buf[i] === 0) return true;
  }
  return false;
}

/**
 * Split text into lines the way a line iterator does: `\n` or `\r\n` terminators,
 * and a trailing terminator does not produce an empty last line.
 */
export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map((l) => (l.endsWith('\r') ? l.slice(0, -1) : l));
}

/**
 * Truncate a string to at most maxBytes of UTF-8 without splitting a character.
 */
export function truncateBytes(s: string, maxBytes: number): { text: string; truncated: boolean } {
  const b = Buffer.from(s, 'utf8');
  if (b.length <= maxBytes) return { text: s, truncated: false };
  let cut = Math.max(0, maxBytes);
  // back up over continuation bytes (10xxxxxx) to a character boundary
  while (cut > 0 && cut < b.length && (b[cut] & 0xc0) === 0x80) cut--;
  return { text: b.subarray(0, cut).toString('utf8'), truncated: true };
}

/** Count non-overlapping occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let idx = haystack.indexOf(needle);
  while (idx !== -1) {
    count++;
    idx = haystack.indexOf(needle, idx + needle.length);
  }
  return count;
}
