// Analysis Service — owns the per-run registry behind startAnalysis,
// getProgress and getReport. Each run has explicit creation, a terminal
// state, and teardown on retrieval, cancellation or TTL eviction.

import { randomUUID } from 'node:crypto';
import type { AnalysisReport, AnalysisTarget } from '../types/analysis.js';
import type { Chunk, Document } from '../types/document.js';
import {
  AnalysisFailedError,
  ImpactAnalysisError,
  PendingError,
  RunCancelledError,
  UnknownRunError,
  errorMessage,
  type CancelReason,
} from '../types/errors.js';
import { ALL_EVENT_TYPES, type EventHandler } from '../types/events.js';
import type { ProgressSnapshot, RunId, RunStatus } from '../types/progress.js';
import { extractText } from '../extraction/text-extractor.js';
import { DEFAULT_CHUNKING, chunkText, type ChunkingOptions } from '../chunking/chunker.js';
import { aggregateResults } from '../aggregation/result-aggregator.js';
import { highlightTerms, type VocabularyEntry } from '../highlighting/highlighter.js';
import { loadVocabulary } from '../highlighting/vocabulary.js';
import { createLogger, type Logger } from '../utils/log.js';
import type { AnalysisOrchestrator } from './analysis-orchestrator.js';
import { ProgressTracker } from './progress-tracker.js';

export interface AnalysisServiceConfig {
  orchestrator: AnalysisOrchestrator;
  chunking?: Partial<ChunkingOptions>;
  /** Highlight vocabulary (default: bundled regulatory vocabulary) */
  vocabulary?: readonly VocabularyEntry[];
  /** Run the consolidated summary stage (default: true) */
  summary?: boolean;
  /** Finished or cancelled runs are evicted after this long (default: 30 min) */
  runTtlMs?: number;
  /** Wall-clock limit per run; exceeded runs are cancelled with reason 'timeout' */
  runTimeoutMs?: number;
  onEvent?: (event: { type: string; runId: RunId; payload: unknown }) => void;
  logger?: Logger;
  now?: () => number;
}

interface RunRecord {
  readonly runId: RunId;
  readonly target: AnalysisTarget;
  readonly tracker: ProgressTracker;
  readonly controller: AbortController;
  status: RunStatus;
  report?: AnalysisReport;
  error?: ImpactAnalysisError;
  cancelReason?: CancelReason;
  done: Promise<void>;
  runTimer?: NodeJS.Timeout;
  evictTimer?: NodeJS.Timeout;
}

export class AnalysisService {
  private readonly runs = new Map<RunId, RunRecord>();
  private readonly orchestrator: AnalysisOrchestrator;
  private readonly chunking: ChunkingOptions;
  private readonly vocabulary: readonly VocabularyEntry[];
  private readonly summary: boolean;
  private readonly runTtlMs: number;
  private readonly runTimeoutMs?: number;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly relay?: EventHandler;

  constructor(config: AnalysisServiceConfig) {
    this.orchestrator = config.orchestrator;
    this.chunking = { ...DEFAULT_CHUNKING, ...config.chunking };
    this.vocabulary = config.vocabulary ?? loadVocabulary();
    this.summary = config.summary ?? true;
    this.runTtlMs = config.runTtlMs ?? 30 * 60_000;
    this.runTimeoutMs = config.runTimeoutMs;
    this.log = config.logger ?? createLogger('AnalysisService');
    this.now = config.now ?? Date.now;

    if (config.onEvent) {
      const handler = config.onEvent;
      const relay: EventHandler = e => handler({ type: e.type, runId: e.runId, payload: e.payload });
      for (const type of ALL_EVENT_TYPES) this.orchestrator.eventBus.on(type, relay);
      this.relay = relay;
    }
  }

  /**
   * Validate and chunk the document, resolve the ticker, then start the run
   * in the background. Rejects before any AI call for format, empty-document,
   * chunking and target errors; no run is registered in that case.
   */
  async startAnalysis(document: Document, ticker: string): Promise<RunId> {
    const normalized = extractText(document);
    const chunks = chunkText(normalized, this.chunking);
    const target = await this.orchestrator.resolveTarget(ticker);

    const runId = randomUUID();
    const record: RunRecord = {
      runId,
      target,
      tracker: new ProgressTracker(runId, chunks.length, { now: this.now }),
      controller: new AbortController(),
      status: 'running',
      done: Promise.resolve(),
    };
    this.runs.set(runId, record);

    if (this.runTimeoutMs !== undefined) {
      record.runTimer = setTimeout(() => this.cancel(runId, 'timeout'), this.runTimeoutMs);
      record.runTimer.unref();
    }

    this.log.info('Run started', {
      runId,
      ticker: target.ticker,
      chunks: chunks.length,
      forcedSplits: chunks.filter(c => c.forcedSplit).length,
      chars: normalized.text.length,
    });
    this.orchestrator.emit('RunStarted', runId, { ticker: target.ticker, chunksTotal: chunks.length });
    record.done = this.execute(record, chunks);
    return runId;
  }

  getProgress(runId: RunId): ProgressSnapshot {
    const record = this.require(runId);
    if (record.status === 'cancelled') {
      throw new RunCancelledError(runId, record.cancelReason);
    }
    return record.tracker.snapshot(record.status);
  }

  /** Returns the finished report and tears the run down. */
  getReport(runId: RunId): AnalysisReport {
    const record = this.require(runId);
    switch (record.status) {
      case 'running':
        throw new PendingError(runId, record.tracker.chunksCompleted, record.tracker.chunksTotal);
      case 'cancelled':
        throw new RunCancelledError(runId, record.cancelReason);
      case 'failed': {
        this.teardown(record);
        throw record.error ?? new AnalysisFailedError(`Analysis ${runId} failed`);
      }
      case 'completed': {
        this.teardown(record);
        if (!record.report) throw new AnalysisFailedError(`Analysis ${runId} produced no report`);
        return record.report;
      }
    }
  }

  /** Wait for the run to reach a terminal state, then behave like getReport. */
  async waitForReport(runId: RunId): Promise<AnalysisReport> {
    await this.require(runId).done;
    return this.getReport(runId);
  }

  /**
   * Cancel a running run without waiting for in-flight AI calls. The run is
   * kept as a tombstone until evicted so later lookups report the cancellation.
   * Returns false when the run had already finished.
   */
  cancel(runId: RunId, reason: CancelReason = 'cancelled'): boolean {
    const record = this.require(runId);
    if (record.status !== 'running') return false;

    record.status = 'cancelled';
    record.cancelReason = reason;
    clearTimeout(record.runTimer);
    record.controller.abort(new RunCancelledError(runId, reason));
    this.log.info('Run cancelled', { runId, reason, chunksCompleted: record.tracker.chunksCompleted });
    this.orchestrator.emit('RunCancelled', runId, { reason, chunksCompleted: record.tracker.chunksCompleted });
    this.scheduleEviction(record);
    return true;
  }

  get activeRuns(): number {
    let n = 0;
    for (const record of this.runs.values()) {
      if (record.status === 'running') n++;
    }
    return n;
  }

  /** Cancel everything still running, drop all runs and detach the onEvent relay. */
  dispose(): void {
    for (const record of this.runs.values()) {
      if (record.status === 'running') this.cancel(record.runId);
      clearTimeout(record.runTimer);
      clearTimeout(record.evictTimer);
    }
    this.runs.clear();
    if (this.relay) {
      for (const type of ALL_EVENT_TYPES) this.orchestrator.eventBus.off(type, this.relay);
    }
  }

  private async execute(record: RunRecord, chunks: readonly Chunk[]): Promise<void> {
    const { runId, target, tracker, controller } = record;
    const signal = controller.signal;
    try {
      const results = await this.orchestrator.analyze(chunks, target, { runId, progress: tracker, signal });
      const aggregated = aggregateResults(results);
      const highlights = highlightTerms(aggregated.text, [
        ...this.vocabulary,
        ...aggregated.terms.map(t => t.term),
      ]);

      let summary: string | undefined;
      if (this.summary && aggregated.degradedChunks.length < results.length) {
        summary = await this.orchestrator.summarize(aggregated, target, runId, signal);
      }
      if (record.status !== 'running') return;

      record.report = {
        ...aggregated,
        runId,
        target,
        highlights,
        ...(summary ? { summary } : {}),
        generatedAt: new Date(this.now()),
      };
      record.status = 'completed';
      this.log.info('Run completed', {
        runId,
        overallSeverity: aggregated.overallSeverity,
        degradedChunks: aggregated.degradedChunks.length,
        elapsedMs: this.now() - tracker.startedAt,
      });
      this.orchestrator.emit('RunCompleted', runId, {
        overallSeverity: aggregated.overallSeverity,
        degradedChunks: aggregated.degradedChunks,
      });
    } catch (err) {
      // A cancelled run already reached its terminal state
      if (record.status !== 'running') return;
      record.status = 'failed';
      record.error = err instanceof ImpactAnalysisError
        ? err
        : new AnalysisFailedError(`Analysis failed: ${errorMessage(err)}`, { cause: err, context: { runId } });
      this.log.error('Run failed', { runId, code: record.error.code, error: record.error.message });
      this.orchestrator.emit('RunFailed', runId, { code: record.error.code, error: record.error.message });
    } finally {
      clearTimeout(record.runTimer);
      if (record.status !== 'cancelled') this.scheduleEviction(record);
    }
  }

  private require(runId: RunId): RunRecord {
    const record = this.runs.get(runId);
    if (!record) throw new UnknownRunError(runId);
    return record;
  }

  private scheduleEviction(record: RunRecord): void {
    clearTimeout(record.evictTimer);
    record.evictTimer = setTimeout(() => this.teardown(record), this.runTtlMs);
    record.evictTimer.unref();
  }

  private teardown(record: RunRecord): void {
    clearTimeout(record.runTimer);
    clearTimeout(record.evictTimer);
    this.runs.delete(record.runId);
  }
}
