// Splits outbound text into message-sized segments.

import { MESSAGING } from "../constants";

/**
 * Consecutive segments of at most `size` UTF-16 units, in order.
 * Never cuts a surrogate pair in half. Empty input yields no segments.
 */
export function chunkText(text: string, size: number): string[] {
  if (!Number.isInteger(size) || size < MESSAGING.MIN_CHUNK_SIZE) {
    throw new Error(`Chunk size must be an integer >= ${MESSAGING.MIN_CHUNK_SIZE}, got ${size}`);
  }
  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + size, text.length);
    if (end < text.length && isLowSurrogate(text.charCodeAt(end))) end -= 1;
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}
