import { describe, it, expect } from 'vitest';
import { ProgressTracker } from '../orchestrator/progress-tracker.js';

function clock(start = 1_000) {
  let t = start;
  return { now: () => t, advance: (ms: number) => { t += ms; } };
}

describe('ProgressTracker', () => {
  it('has no estimate before the first chunk resolves', () => {
    const c = clock();
    const tracker = new ProgressTracker('run-1', 4, { now: c.now });
    expect(tracker.snapshot('running')).toEqual({
      runId: 'run-1',
      status: 'running',
      chunksTotal: 4,
      chunksCompleted: 0,
      estimatedSecondsRemaining: null,
      averageChunkMs: null,
      elapsedMs: 0,
    });
  });

  it('estimates remaining time from the rolling average', () => {
    const c = clock();
    const tracker = new ProgressTracker('run-1', 4, { now: c.now });
    tracker.recordChunk(1000);
    c.advance(1200);
    const snap = tracker.snapshot('running');
    expect(snap.chunksCompleted).toBe(1);
    expect(snap.estimatedSecondsRemaining).toBe(3);
    expect(snap.elapsedMs).toBe(1200);
  });

  it('multiplies the remaining chunks by the average latency', () => {
    const tracker = new ProgressTracker('run-1', 10);
    tracker.recordChunk(1000);
    expect(tracker.estimatedSecondsRemaining()).toBe(9);
    tracker.recordChunk(1500);
    expect(tracker.estimatedSecondsRemaining()).toBe(10);
  });

  it('averages only the most recent latencies', () => {
    const tracker = new ProgressTracker('run-1', 10, { window: 2 });
    tracker.recordChunk(100);
    tracker.recordChunk(200);
    tracker.recordChunk(600);
    expect(tracker.averageChunkMs()).toBe(400);
  });

  it('never exceeds the chunk total', () => {
    const tracker = new ProgressTracker('run-1', 2);
    tracker.recordChunk(10);
    tracker.recordChunk(10);
    expect(() => tracker.recordChunk(10)).toThrow(RangeError);
    expect(tracker.chunksCompleted).toBe(2);
    expect(tracker.estimatedSecondsRemaining()).toBe(0);
  });
});
