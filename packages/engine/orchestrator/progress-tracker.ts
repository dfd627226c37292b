// Per-run progress state. recordChunk() is the only writer and is fully
// synchronous, so concurrent workers cannot interleave inside an update.

import type { ProgressSnapshot, RunId, RunStatus } from '../types/progress.js';

export interface ProgressTrackerOptions {
  /** Latencies kept for the rolling average */
  window?: number;
  now?: () => number;
}

export class ProgressTracker {
  readonly startedAt: number;
  private completed = 0;
  private readonly latencies: number[] = [];
  private readonly window: number;
  private readonly now: () => number;

  constructor(readonly runId: RunId, readonly chunksTotal: number, options: ProgressTrackerOptions = {}) {
    this.window = Math.max(1, options.window ?? 8);
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  get chunksCompleted(): number {
    return this.completed;
  }

  recordChunk(latencyMs: number): void {
    if (this.completed >= this.chunksTotal) {
      throw new RangeError(`Run ${this.runId} already recorded all ${this.chunksTotal} chunks`);
    }
    this.completed += 1;
    this.latencies.push(Math.max(0, latencyMs));
    if (this.latencies.length > this.window) this.latencies.shift();
  }

  averageChunkMs(): number | null {
    if (this.latencies.length === 0) return null;
    return this.latencies.reduce((sum, ms) => sum + ms, 0) / this.latencies.length;
  }

  /** (total - completed) × rolling average, in seconds to one decimal; null before the first chunk resolves. */
  estimatedSecondsRemaining(): number | null {
    const remaining = this.chunksTotal - this.completed;
    if (remaining === 0) return 0;
    const avg = this.averageChunkMs();
    if (avg === null) return null;
    return Math.round((remaining * avg) / 100) / 10;
  }

  snapshot(status: RunStatus): ProgressSnapshot {
    return {
      runId: this.runId,
      status,
      chunksTotal: this.chunksTotal,
      chunksCompleted: this.completed,
      estimatedSecondsRemaining: status === 'failed' ? null : this.estimatedSecondsRemaining(),
      averageChunkMs: this.averageChunkMs(),
      elapsedMs: this.now() - this.startedAt,
    };
  }
}
