// Chunker — size-bounded, boundary-aligned segmentation of normalized text.
//
// Split preference at each budget limit:
//   1. the latest structural boundary inside the look-back window
//   2. the latest word start before the limit (forced split)
//   3. the latest whitespace edge before the limit (forced split)
//   4. a hard cut at the limit, only for a single run longer than the budget
// Chunks are contiguous: concatenating them reproduces the text exactly.

import type { Chunk, NormalizedText } from '../types/document.js';
import { ChunkingError } from '../types/errors.js';
import { locate } from '../extraction/text-extractor.js';

export interface ChunkingOptions {
  /** Maximum chunk length in characters */
  maxChars: number;
  /** How far before the limit a structural boundary may sit and still be used */
  lookbackChars: number;
}

export const DEFAULT_CHUNKING: ChunkingOptions = {
  maxChars: 12_000,
  lookbackChars: 2_000,
};

function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Latest boundary b with max(start, limit - lookback) <= b <= limit and b > start. */
function findBoundary(boundaries: readonly number[], start: number, limit: number, lookback: number): number | undefined {
  const floor = Math.max(start + 1, limit - lookback);
  let lo = 0;
  let hi = boundaries.length - 1;
  let found: number | undefined;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (boundaries[mid] <= limit) {
      found = boundaries[mid];
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found !== undefined && found >= floor ? found : undefined;
}

function findWhitespaceSplit(text: string, start: number, limit: number): number | undefined {
  for (let p = limit; p > start; p--) {
    if (isWhitespace(text[p - 1]) && !isWhitespace(text[p])) return p;
  }
  for (let p = limit; p > start; p--) {
    if (isWhitespace(text[p - 1]) || isWhitespace(text[p])) return p;
  }
  return undefined;
}

function hardCut(text: string, start: number, limit: number): number {
  // never separate a surrogate pair
  if (limit - 1 > start && isHighSurrogate(text.charCodeAt(limit - 1))) return limit - 1;
  return limit;
}

export function validateChunkingOptions(options: ChunkingOptions): void {
  if (!Number.isInteger(options.maxChars) || options.maxChars < 1) {
    throw new ChunkingError(`Chunk budget must be a positive integer, got ${options.maxChars}`, {
      context: { maxChars: options.maxChars },
    });
  }
  if (!Number.isInteger(options.lookbackChars) || options.lookbackChars < 0) {
    throw new ChunkingError(`Look-back window must be a non-negative integer, got ${options.lookbackChars}`, {
      context: { lookbackChars: options.lookbackChars },
    });
  }
}

/**
 * Split normalized text into ordered chunks. Deterministic for a given
 * (text, options) pair.
 */
export function chunkText(normalized: NormalizedText, options: ChunkingOptions = DEFAULT_CHUNKING): Chunk[] {
  validateChunkingOptions(options);

  const { text, boundaries } = normalized;
  const boundarySet = new Set(boundaries);
  const isEdge = (offset: number) => offset === 0 || offset === text.length || boundarySet.has(offset);

  const chunks: Chunk[] = [];
  let start = 0;

  while (start < text.length) {
    let end: number;
    if (text.length - start <= options.maxChars) {
      end = text.length;
    } else {
      const limit = start + options.maxChars;
      end = findBoundary(boundaries, start, limit, options.lookbackChars)
        ?? findWhitespaceSplit(text, start, limit)
        ?? hardCut(text, start, limit);
    }

    chunks.push({
      index: chunks.length,
      start,
      end,
      text: text.slice(start, end),
      forcedSplit: !isEdge(start) || !isEdge(end),
      locator: locate(normalized, start),
    });
    start = end;
  }

  return chunks;
}
