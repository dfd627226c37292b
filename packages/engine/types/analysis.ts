// BC2: Impact Analysis — targets, per-chunk results and the final report

export type Severity = 'none' | 'low' | 'medium' | 'high';
export type OverallSeverity = Severity | 'unavailable';

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  none: 0,
  low: 1,
  medium: 2,
  high: 3,
};

export const DEGRADED_IMPACT = '[Analysis unavailable for this segment]';

export interface AnalysisTarget {
  readonly ticker: string;
  readonly name: string;
  readonly exchange: string;
  readonly sector?: string;
  readonly industry?: string;
}

export interface TermSpan {
  readonly term: string;
  readonly start: number;
  readonly end: number;
}

export interface ChunkResult {
  readonly chunkIndex: number;
  readonly impact: string;
  readonly severity: Severity;
  readonly degraded: boolean;
  /** Offsets are local to `impact` */
  readonly terms: readonly TermSpan[];
  readonly attempts: number;
  readonly latencyMs: number;
  /** Why the chunk was degraded (retries exhausted, unparseable response) */
  readonly degradedReason?: string;
}

/** Where each chunk's narrative sits inside the merged report text. */
export interface ReportSegment {
  readonly chunkIndex: number;
  readonly start: number;
  readonly end: number;
  readonly severity: Severity;
  readonly degraded: boolean;
}

export interface HighlightSpan {
  readonly start: number;
  readonly end: number;
  /** Text as it appears in the report */
  readonly text: string;
  /** Vocabulary entry that matched */
  readonly term: string;
  readonly category?: string;
}

export interface AggregatedReport {
  readonly text: string;
  readonly overallSeverity: OverallSeverity;
  readonly results: readonly ChunkResult[];
  readonly segments: readonly ReportSegment[];
  /** Model-reported key terms, offsets in merged-report coordinates */
  readonly terms: readonly TermSpan[];
  readonly degradedChunks: readonly number[];
}

export interface AnalysisReport extends AggregatedReport {
  readonly runId: string;
  readonly target: AnalysisTarget;
  readonly highlights: readonly HighlightSpan[];
  readonly summary?: string;
  readonly generatedAt: Date;
}
