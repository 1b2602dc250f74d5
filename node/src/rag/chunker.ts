import { createHash } from 'node:crypto';

export interface ChunkWindow {
  index: number;
  start: number;
  text: string;
}

/**
 * Fixed-size character windows. Consecutive windows overlap by exactly `overlap`
 * characters; the last window ends at the end of the text.
 */
export function splitIntoChunks(text: string, size: number, overlap: number): ChunkWindow[] {
  if (size <= 0) throw new RangeError('chunk size must be positive');
  if (overlap < 0 || overlap >= size) throw new RangeError('chunk overlap must be in [0, size)');

  const normalized = text.replace(/\r\n?/g, '\n');
  if (normalized.trim().length === 0) return [];

  const step = size - overlap;
  const windows: ChunkWindow[] = [];
  for (let start = 0; start < normalized.length; start += step) {
    const end = Math.min(start + size, normalized.length);
    windows.push({ index: windows.length, start, text: normalized.slice(start, end) });
    if (end === normalized.length) break;
  }
  return windows;
}

/** Stable id: same source, position and text always hash to the same id. */
export function chunkId(sourceUrl: string, index: number, text: string): string {
  return createHash('sha256').update(`${sourceUrl}\n${index}\n${text}`).digest('hex').slice(0, 32);
}
