// Error taxonomy for the analysis engine.
// Degraded chunks are not errors; they are carried as data in ChunkResult.

export type ErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'EMPTY_DOCUMENT'
  | 'CHUNKING'
  | 'INVALID_TARGET'
  | 'ANALYSIS_FAILED'
  | 'UNKNOWN_RUN'
  | 'PENDING'
  | 'RUN_CANCELLED'
  | 'PROVIDER'
  | 'MODEL_TIMEOUT';

export abstract class ImpactAnalysisError extends Error {
  abstract readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.context = options?.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedFormatError extends ImpactAnalysisError {
  readonly code = 'UNSUPPORTED_FORMAT';
}

export class EmptyDocumentError extends ImpactAnalysisError {
  readonly code = 'EMPTY_DOCUMENT';
}

/** Configuration error: the chunk budget cannot hold a single character. */
export class ChunkingError extends ImpactAnalysisError {
  readonly code = 'CHUNKING';
}

export class InvalidTargetError extends ImpactAnalysisError {
  readonly code = 'INVALID_TARGET';
}

/** Fatal, non-retryable provider failure. No partial report is produced. */
export class AnalysisFailedError extends ImpactAnalysisError {
  readonly code = 'ANALYSIS_FAILED';
}

export class UnknownRunError extends ImpactAnalysisError {
  readonly code = 'UNKNOWN_RUN';

  constructor(readonly runId: string) {
    super(`Unknown analysis run: ${runId}`, { context: { runId } });
  }
}

export class PendingError extends ImpactAnalysisError {
  readonly code = 'PENDING';

  constructor(readonly runId: string, readonly chunksCompleted: number, readonly chunksTotal: number) {
    super(`Analysis ${runId} is still running (${chunksCompleted}/${chunksTotal} chunks)`, {
      context: { runId, chunksCompleted, chunksTotal },
    });
  }
}

export type CancelReason = 'cancelled' | 'timeout';

export class RunCancelledError extends ImpactAnalysisError {
  readonly code = 'RUN_CANCELLED';

  constructor(readonly runId: string, readonly reason: CancelReason = 'cancelled') {
    super(
      reason === 'timeout'
        ? `Analysis ${runId} exceeded its time limit and was cancelled`
        : `Analysis ${runId} was cancelled`,
      { context: { runId, reason } },
    );
  }
}

/**
 * AI provider failure normalised at the bridge.
 * `retryable` decides between local retry and failing the whole run.
 */
export class ProviderError extends ImpactAnalysisError {
  readonly code: ErrorCode = 'PROVIDER';

  constructor(
    message: string,
    readonly retryable: boolean,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, { cause: options?.cause, context: { retryable, status } });
  }
}

export class ModelTimeoutError extends ProviderError {
  override readonly code = 'MODEL_TIMEOUT';

  constructor(readonly timeoutMs: number) {
    super(`AI call timed out after ${timeoutMs}ms`, true);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
