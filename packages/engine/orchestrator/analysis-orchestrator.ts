// Analysis Orchestrator — fans chunks out to the AI model through a bounded
// worker pool and reassembles one ChunkResult per chunk, in chunk order.
//
// Policy per chunk: bounded timeout per attempt; timeouts and transient
// failures retry with exponential backoff; exhausted retries degrade the
// chunk; a non-retryable provider error fails the whole run.

import { randomUUID } from 'node:crypto';
import {
  DEGRADED_IMPACT,
  type AggregatedReport,
  type AnalysisTarget,
  type ChunkResult,
  type TermSpan,
} from '../types/analysis.js';
import type { Chunk } from '../types/document.js';
import {
  AnalysisFailedError,
  InvalidTargetError,
  ModelTimeoutError,
  ProviderError,
  errorMessage,
} from '../types/errors.js';
import { SimpleEventBus, type DomainEventType, type EventBus } from '../types/events.js';
import type { RunId } from '../types/progress.js';
import type { CompanyProfile, TickerDirectory } from '../bridge/ticker-directory.js';
import { highlightTerms } from '../highlighting/highlighter.js';
import { parseAssessment } from '../utils/response-parser.js';
import { SYSTEM_PROMPT, buildChunkPrompt, buildSummaryPrompt } from '../utils/prompts.js';
import {
  RetriesExhaustedError,
  exponentialBackoff,
  withRetry,
  type RetryOutcome,
  type Sleep,
} from '../utils/retry.js';
import { createLogger, type Logger } from '../utils/log.js';
import { runPool } from './worker-pool.js';
import type { ProgressTracker } from './progress-tracker.js';

export interface ModelRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  /** Absent for the consolidated summary call */
  chunkIndex?: number;
}

/** One AI call. Must honour `signal`; provider failures should surface as ProviderError. */
export type ImpactModel = (request: ModelRequest, signal: AbortSignal) => Promise<string>;

export interface OrchestratorConfig {
  model: ImpactModel;
  directory: TickerDirectory;
  /** Max concurrent AI calls (default: 4) */
  concurrency?: number;
  /** Attempts per chunk including the first (default: 3) */
  maxAttempts?: number;
  /** Per-attempt timeout (default: 60s) */
  timeoutMs?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  maxResponseTokens?: number;
  summaryMaxTokens?: number;
  eventBus?: EventBus;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
}

export interface RunContext {
  runId: RunId;
  progress: ProgressTracker;
  signal: AbortSignal;
}

/** Listing-symbol shape: 1-5 alphanumerics, optional class suffix (BRK.B, RDS-A). */
export const TICKER_PATTERN = /^[A-Z][A-Z0-9]{0,4}(?:[.-][A-Z0-9]{1,2})?$/;

function isRetryable(err: unknown): boolean {
  // Anything the bridge did not classify counts as a transient transport failure
  return err instanceof ProviderError ? err.retryable : true;
}

export class AnalysisOrchestrator {
  readonly concurrency: number;
  readonly eventBus: EventBus;
  private readonly model: ImpactModel;
  private readonly directory: TickerDirectory;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly backoff: (attempt: number) => number;
  private readonly maxResponseTokens: number;
  private readonly summaryMaxTokens: number;
  private readonly log: Logger;
  private readonly sleep?: Sleep;
  private readonly now: () => number;

  constructor(config: OrchestratorConfig) {
    this.model = config.model;
    this.directory = config.directory;
    this.concurrency = config.concurrency ?? 4;
    this.maxAttempts = config.maxAttempts ?? 3;
    this.timeoutMs = config.timeoutMs ?? 60_000;
    this.backoff = exponentialBackoff(config.backoffBaseMs ?? 1000, config.backoffMaxMs ?? 20_000);
    this.maxResponseTokens = config.maxResponseTokens ?? 1500;
    this.summaryMaxTokens = config.summaryMaxTokens ?? 3000;
    this.eventBus = config.eventBus ?? new SimpleEventBus();
    this.log = config.logger ?? createLogger('Orchestrator');
    this.sleep = config.sleep;
    this.now = config.now ?? Date.now;
  }

  /** Validate the ticker before any AI cost is incurred. */
  async resolveTarget(ticker: string): Promise<AnalysisTarget> {
    const symbol = ticker.trim().toUpperCase();
    if (!TICKER_PATTERN.test(symbol)) {
      throw new InvalidTargetError(`Invalid ticker symbol: "${ticker}"`, { context: { ticker } });
    }

    let profile: CompanyProfile | null;
    try {
      profile = await this.directory.lookup(symbol);
    } catch (err) {
      throw new InvalidTargetError(`Could not validate ticker ${symbol}: ${errorMessage(err)}`, {
        cause: err,
        context: { ticker: symbol },
      });
    }
    if (!profile) {
      throw new InvalidTargetError(`Unknown ticker symbol: ${symbol}`, { context: { ticker: symbol } });
    }

    return {
      ticker: profile.symbol.toUpperCase(),
      name: profile.name,
      exchange: profile.exchange,
      ...(profile.sector ? { sector: profile.sector } : {}),
      ...(profile.industry ? { industry: profile.industry } : {}),
    };
  }

  /**
   * Analyze every chunk. Resolves with results ordered by chunk index;
   * rejects with AnalysisFailedError on a non-retryable provider error,
   * or with the abort reason when the run signal fires.
   */
  async analyze(chunks: readonly Chunk[], target: AnalysisTarget, ctx: RunContext): Promise<ChunkResult[]> {
    ctx.signal.throwIfAborted();
    // Local controller so a fatal chunk can abandon its in-flight siblings
    const controller = new AbortController();
    const forward = (): void => controller.abort(ctx.signal.reason);
    ctx.signal.addEventListener('abort', forward, { once: true });

    try {
      return await runPool(
        chunks,
        this.concurrency,
        async chunk => {
          const result = await this.analyzeChunk(chunk, chunks.length, target, ctx.runId, controller.signal);
          // Listeners read progress, so it is recorded before they are told
          ctx.progress.recordChunk(result.latencyMs);
          this.announce(ctx.runId, result);
          return result;
        },
        controller.signal,
      );
    } catch (err) {
      controller.abort(err);
      if (err instanceof ProviderError && !err.retryable && !ctx.signal.aborted) {
        this.log.error('Non-retryable provider error, failing run', {
          runId: ctx.runId,
          status: err.status,
          error: err.message,
        });
        throw new AnalysisFailedError(`Analysis failed: ${err.message}`, {
          cause: err,
          context: { runId: ctx.runId, status: err.status },
        });
      }
      throw err;
    } finally {
      ctx.signal.removeEventListener('abort', forward);
    }
  }

  /**
   * Consolidated summary of the merged report. Undefined when retries run
   * out or the model returns nothing; fatal provider errors fail the run.
   */
  async summarize(
    report: AggregatedReport,
    target: AnalysisTarget,
    runId: RunId,
    signal: AbortSignal,
  ): Promise<string | undefined> {
    const request: ModelRequest = {
      system: SYSTEM_PROMPT,
      prompt: buildSummaryPrompt(report, target),
      maxTokens: this.summaryMaxTokens,
    };
    try {
      const { value } = await withRetry(() => this.callModel(request, signal), {
        maxAttempts: this.maxAttempts,
        backoff: this.backoff,
        isRetryable,
        signal,
        sleep: this.sleep,
        onRetry: (err, attempt, delayMs) => {
          this.log.warn('Summary call failed, retrying', { runId, attempt, delayMs, error: errorMessage(err) });
        },
      });
      const summary = value.trim();
      if (!summary) return undefined;
      this.emit('SummaryGenerated', runId, { length: summary.length });
      return summary;
    } catch (err) {
      if (err instanceof RetriesExhaustedError) {
        this.log.warn('Summary unavailable after retries', { runId, attempts: err.attempts });
        return undefined;
      }
      if (err instanceof ProviderError && !err.retryable && !signal.aborted) {
        throw new AnalysisFailedError(`Summary failed: ${err.message}`, {
          cause: err,
          context: { runId, status: err.status },
        });
      }
      throw err;
    }
  }

  private async analyzeChunk(
    chunk: Chunk,
    totalChunks: number,
    target: AnalysisTarget,
    runId: RunId,
    signal: AbortSignal,
  ): Promise<ChunkResult> {
    const started = this.now();
    const request: ModelRequest = {
      system: SYSTEM_PROMPT,
      prompt: buildChunkPrompt(chunk, totalChunks, target),
      maxTokens: this.maxResponseTokens,
      chunkIndex: chunk.index,
    };

    let outcome: RetryOutcome<string>;
    try {
      outcome = await withRetry(() => this.callModel(request, signal), {
        maxAttempts: this.maxAttempts,
        backoff: this.backoff,
        isRetryable,
        signal,
        sleep: this.sleep,
        onRetry: (err, attempt, delayMs) => {
          this.log.warn('Chunk call failed, retrying', {
            runId, chunk: chunk.index, attempt, delayMs, error: errorMessage(err),
          });
          this.emit('ChunkRetried', runId, { chunkIndex: chunk.index, attempt, delayMs, error: errorMessage(err) });
        },
      });
    } catch (err) {
      if (err instanceof RetriesExhaustedError) {
        return this.degraded(chunk.index, err.attempts, this.now() - started, runId, errorMessage(err.lastError));
      }
      throw err;
    }

    const latencyMs = this.now() - started;
    const { value: raw, attempts } = outcome;
    const parsed = parseAssessment(raw);
    if (!parsed.ok) {
      return this.degraded(chunk.index, attempts, latencyMs, runId, `Unparseable response: ${parsed.reason}`);
    }

    const { severity, impact, keyTerms } = parsed.value;
    const terms: TermSpan[] = highlightTerms(impact, keyTerms)
      .map(({ term, start, end }) => ({ term, start, end }));
    return { chunkIndex: chunk.index, impact, severity, degraded: false, terms, attempts, latencyMs };
  }

  private announce(runId: RunId, result: ChunkResult): void {
    const { chunkIndex, attempts, latencyMs } = result;
    if (result.degraded) {
      this.emit('ChunkDegraded', runId, { chunkIndex, attempts, reason: result.degradedReason });
    } else {
      this.emit('ChunkAnalyzed', runId, { chunkIndex, severity: result.severity, attempts, latencyMs });
    }
  }

  private degraded(
    chunkIndex: number,
    attempts: number,
    latencyMs: number,
    runId: RunId,
    reason: string,
  ): ChunkResult {
    this.log.warn('Chunk degraded', { runId, chunk: chunkIndex, attempts, reason });
    return {
      chunkIndex,
      impact: DEGRADED_IMPACT,
      severity: 'none',
      degraded: true,
      terms: [],
      attempts,
      latencyMs,
      degradedReason: reason,
    };
  }

  /** One attempt: races the model against the timeout and the run signal. */
  private async callModel(request: ModelRequest, signal: AbortSignal): Promise<string> {
    const attempt = new AbortController();
    const timer = setTimeout(() => attempt.abort(new ModelTimeoutError(this.timeoutMs)), this.timeoutMs);
    const forward = (): void => attempt.abort(signal.reason);
    signal.addEventListener('abort', forward, { once: true });

    try {
      return await new Promise<string>((resolve, reject) => {
        attempt.signal.addEventListener('abort', () => reject(attempt.signal.reason), { once: true });
        this.model(request, attempt.signal).then(resolve, reject);
      });
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', forward);
    }
  }

  emit(type: DomainEventType, runId: RunId, payload: unknown): void {
    this.eventBus.emit({ eventId: randomUUID(), type, runId, timestamp: new Date(), payload });
  }
}
