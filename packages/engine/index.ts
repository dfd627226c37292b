// Regulatory impact analysis engine
// Extracts, chunks and analyzes regulatory documents against a listed company

export { AnalysisService } from './orchestrator/analysis-service.js';
export type { AnalysisServiceConfig } from './orchestrator/analysis-service.js';
export { AnalysisOrchestrator, TICKER_PATTERN } from './orchestrator/analysis-orchestrator.js';
export type { ImpactModel, ModelRequest, OrchestratorConfig, RunContext } from './orchestrator/analysis-orchestrator.js';
export { ProgressTracker } from './orchestrator/progress-tracker.js';
export { runPool } from './orchestrator/worker-pool.js';

export { extractText, locate, BLOCK_SEPARATOR } from './extraction/text-extractor.js';
export { resolveFormat, sniffFormat } from './extraction/format.js';
export type { FormatHints } from './extraction/format.js';
export { chunkText, validateChunkingOptions, DEFAULT_CHUNKING } from './chunking/chunker.js';
export type { ChunkingOptions } from './chunking/chunker.js';
export { aggregateResults, overallSeverity, PARAGRAPH_SEPARATOR, SEVERITY_BREAK } from './aggregation/result-aggregator.js';
export type { AggregationOptions } from './aggregation/result-aggregator.js';
export { highlightTerms, applyHighlights, normalizeVocabulary } from './highlighting/highlighter.js';
export type { VocabularyEntry } from './highlighting/highlighter.js';
export { loadVocabulary } from './highlighting/vocabulary.js';

export * from './types/index.js';

// Bridges — AI provider and market-data lookups
export { createAnthropicModel, isRetryableStatus } from './bridge/anthropic-model.js';
export type { AnthropicModelConfig } from './bridge/anthropic-model.js';
export { createFmpClient } from './bridge/fmp-client.js';
export type { FmpClientConfig, FmpFetch } from './bridge/fmp-client.js';
export { FmpTickerDirectory, StaticTickerDirectory } from './bridge/ticker-directory.js';
export type { CompanyProfile, TickerDirectory } from './bridge/ticker-directory.js';

// Configuration — env-driven, selects the ticker directory backend
export { loadConfig, ConfigError } from './config/index.js';
export type { ImpactConfig } from './config/index.js';
export { createAnalysisService, createTickerDirectory } from './config/factory.js';
export type { ServiceOverrides } from './config/factory.js';

export { createLogger, silentLogger } from './utils/log.js';
export type { Logger, LogLevel } from './utils/log.js';
export { parseAssessment } from './utils/response-parser.js';
export type { ModelAssessment } from './utils/response-parser.js';
