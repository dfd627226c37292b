// Service factory: selects the ticker directory and wires the model bridge
// from configuration. FMP when FMP_API_KEY is set, the bundled directory otherwise.

import { createAnthropicModel } from '../bridge/anthropic-model.js';
import { createFmpClient } from '../bridge/fmp-client.js';
import { FmpTickerDirectory, StaticTickerDirectory, type TickerDirectory } from '../bridge/ticker-directory.js';
import { AnalysisOrchestrator, type ImpactModel } from '../orchestrator/analysis-orchestrator.js';
import { AnalysisService, type AnalysisServiceConfig } from '../orchestrator/analysis-service.js';
import { createLogger } from '../utils/log.js';
import type { ImpactConfig } from './index.js';

export type DirectoryBackend = 'fmp' | 'static';

export function directoryBackend(config: ImpactConfig): DirectoryBackend {
  return config.fmp.apiKey ? 'fmp' : 'static';
}

export function createTickerDirectory(config: ImpactConfig): TickerDirectory {
  switch (directoryBackend(config)) {
    case 'fmp':
      return new FmpTickerDirectory(createFmpClient({
        apiKey: config.fmp.apiKey ?? '',
        baseUrl: config.fmp.baseUrl,
        rateLimit: config.fmp.rateLimit,
        cacheTtl: config.fmp.cacheTtl,
      }));
    case 'static':
    default:
      return new StaticTickerDirectory();
  }
}

export interface ServiceOverrides {
  model?: ImpactModel;
  directory?: TickerDirectory;
  onEvent?: AnalysisServiceConfig['onEvent'];
  summary?: boolean;
}

export function createAnalysisService(config: ImpactConfig, overrides: ServiceOverrides = {}): AnalysisService {
  const model = overrides.model ?? createAnthropicModel({
    apiKey: config.anthropicApiKey ?? '',
    model: config.model,
  });

  const orchestrator = new AnalysisOrchestrator({
    model,
    directory: overrides.directory ?? createTickerDirectory(config),
    concurrency: config.analysis.concurrency,
    maxAttempts: config.analysis.maxAttempts,
    timeoutMs: config.analysis.timeoutMs,
    backoffBaseMs: config.analysis.backoffBaseMs,
    backoffMaxMs: config.analysis.backoffMaxMs,
    maxResponseTokens: config.maxResponseTokens,
    logger: createLogger('Orchestrator', config.logLevel),
  });

  return new AnalysisService({
    orchestrator,
    chunking: config.chunking,
    summary: overrides.summary ?? config.analysis.summary,
    runTtlMs: config.runTtlMs,
    runTimeoutMs: config.runTimeoutMs,
    onEvent: overrides.onEvent,
    logger: createLogger('AnalysisService', config.logLevel),
  });
}
