// BC3: Run Tracking — per-run lifecycle and progress snapshots

export type RunId = string;

export type RunStatus = 'running' | 'completed' | 'failed' | 'cancelled';

export interface ProgressSnapshot {
  readonly runId: RunId;
  readonly status: RunStatus;
  readonly chunksTotal: number;
  readonly chunksCompleted: number;
  /** null until the first chunk resolves */
  readonly estimatedSecondsRemaining: number | null;
  readonly averageChunkMs: number | null;
  readonly elapsedMs: number;
}
