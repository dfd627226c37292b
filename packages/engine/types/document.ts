// BC1: Document Intake — Document, NormalizedText and Chunk value objects
// Created once per run and never mutated afterwards.

export type DocumentFormat = 'markup' | 'plain';

export interface Document {
  readonly bytes: Uint8Array;
  readonly format: DocumentFormat;
  readonly byteLength: number;
}

/** Maps a range of normalized text back to where it came from in the upload. */
export interface SourceSpan {
  readonly start: number;
  readonly end: number;
  /** Element path for markup (`html[1]/body[1]/p[2]`), line range for plain text */
  readonly locator: string;
}

export interface NormalizedText {
  readonly text: string;
  /** Offsets where a structural unit begins, ascending, excluding 0 */
  readonly boundaries: readonly number[];
  readonly spans: readonly SourceSpan[];
}

export interface Chunk {
  readonly index: number;
  /** Inclusive start offset into NormalizedText.text */
  readonly start: number;
  /** Exclusive end offset */
  readonly end: number;
  readonly text: string;
  /** True when a chunk edge falls inside a structural unit */
  readonly forcedSplit: boolean;
  readonly locator?: string;
}

export function createDocument(bytes: Uint8Array, format: DocumentFormat): Document {
  return Object.freeze({ bytes, format, byteLength: bytes.byteLength });
}
