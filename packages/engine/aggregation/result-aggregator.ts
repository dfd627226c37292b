// Result Aggregator — merges ordered chunk results into one report.

import {
  SEVERITY_RANK,
  type AggregatedReport,
  type ChunkResult,
  type OverallSeverity,
  type ReportSegment,
  type TermSpan,
} from '../types/analysis.js';

export const PARAGRAPH_SEPARATOR = '\n\n';
/** Inserted between consecutive narratives that disagree materially. */
export const SEVERITY_BREAK = '\n\n---\n\n';

export interface AggregationOptions {
  /** Rank difference at which two neighbouring chunks disagree materially */
  severityGap?: number;
}

function disagree(a: ChunkResult, b: ChunkResult, gap: number): boolean {
  if (a.degraded !== b.degraded) return true;
  if (a.degraded) return false;
  return Math.abs(SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity]) >= gap;
}

export function overallSeverity(results: readonly ChunkResult[]): OverallSeverity {
  let worst: OverallSeverity = 'unavailable';
  for (const r of results) {
    if (r.degraded) continue;
    if (worst === 'unavailable' || SEVERITY_RANK[r.severity] > SEVERITY_RANK[worst]) {
      worst = r.severity;
    }
  }
  return worst;
}

function dedupeTerms(terms: TermSpan[]): TermSpan[] {
  const seen = new Set<string>();
  const sorted = [...terms].sort((a, b) => a.start - b.start || b.end - a.end);
  const out: TermSpan[] = [];
  let lastEnd = -1;
  for (const span of sorted) {
    const key = `${span.start}:${span.end}:${span.term.toLowerCase()}`;
    if (seen.has(key) || span.start < lastEnd) continue;
    seen.add(key);
    out.push(span);
    lastEnd = span.end;
  }
  return out;
}

/**
 * Results must be complete and ordered by chunk index; the orchestrator
 * reassembles them before calling this.
 */
export function aggregateResults(
  results: readonly ChunkResult[],
  options: AggregationOptions = {},
): AggregatedReport {
  const gap = options.severityGap ?? 2;
  if (results.length === 0) {
    throw new RangeError('Cannot aggregate an empty result set');
  }
  results.forEach((r, i) => {
    if (r.chunkIndex !== i) {
      throw new RangeError(`Result at position ${i} belongs to chunk ${r.chunkIndex}`);
    }
  });

  let text = '';
  const segments: ReportSegment[] = [];
  const terms: TermSpan[] = [];

  results.forEach((r, i) => {
    if (i > 0) {
      text += disagree(results[i - 1], r, gap) ? SEVERITY_BREAK : PARAGRAPH_SEPARATOR;
    }
    const offset = text.length;
    text += r.impact;
    segments.push({
      chunkIndex: r.chunkIndex,
      start: offset,
      end: text.length,
      severity: r.severity,
      degraded: r.degraded,
    });
    for (const t of r.terms) {
      terms.push({ term: t.term, start: t.start + offset, end: t.end + offset });
    }
  });

  return {
    text,
    overallSeverity: overallSeverity(results),
    results,
    segments,
    terms: dedupeTerms(terms),
    degradedChunks: results.filter(r => r.degraded).map(r => r.chunkIndex),
  };
}
