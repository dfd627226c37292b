// Highlighter — marks vocabulary terms in report text.
// Case-insensitive, whole-word, longest term first, never overlapping.

import type { HighlightSpan } from '../types/analysis.js';

export interface VocabularyEntry {
  term: string;
  category?: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function termPattern(term: string): RegExp {
  const words = term.split(/\s+/).map(escapeRegExp);
  return new RegExp(`(?<![\\p{L}\\p{N}_])${words.join('\\s+')}(?![\\p{L}\\p{N}_])`, 'giu');
}

/** Trim, collapse inner whitespace, drop case-insensitive duplicates (first wins), longest first. */
export function normalizeVocabulary(vocabulary: readonly (VocabularyEntry | string)[]): VocabularyEntry[] {
  const byKey = new Map<string, VocabularyEntry>();
  for (const raw of vocabulary) {
    const entry = typeof raw === 'string' ? { term: raw } : raw;
    const term = entry.term.replace(/\s+/g, ' ').trim();
    if (!term) continue;
    const key = term.toLowerCase();
    if (!byKey.has(key)) byKey.set(key, { ...entry, term });
  }
  return [...byKey.values()].sort((a, b) => {
    if (b.term.length !== a.term.length) return b.term.length - a.term.length;
    const ka = a.term.toLowerCase();
    const kb = b.term.toLowerCase();
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
}

export function highlightTerms(
  text: string,
  vocabulary: readonly (VocabularyEntry | string)[],
): HighlightSpan[] {
  const occupied = new Uint8Array(text.length);
  const spans: HighlightSpan[] = [];

  for (const entry of normalizeVocabulary(vocabulary)) {
    const pattern = termPattern(entry.term);
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
      const start = match.index;
      const end = start + match[0].length;
      if (occupied.subarray(start, end).some(flag => flag === 1)) continue;
      occupied.fill(1, start, end);
      spans.push({
        start,
        end,
        text: match[0],
        term: entry.term,
        ...(entry.category ? { category: entry.category } : {}),
      });
    }
  }

  return spans.sort((a, b) => a.start - b.start);
}

/** Wrap each span in the output of `wrap`. Spans must not overlap. */
export function applyHighlights(
  text: string,
  spans: readonly HighlightSpan[],
  wrap: (fragment: string, span: HighlightSpan) => string = fragment => `**${fragment}**`,
): string {
  let out = '';
  let cursor = 0;
  for (const span of [...spans].sort((a, b) => a.start - b.start)) {
    if (span.start < cursor) continue;
    out += text.slice(cursor, span.start) + wrap(text.slice(span.start, span.end), span);
    cursor = span.end;
  }
  return out + text.slice(cursor);
}
