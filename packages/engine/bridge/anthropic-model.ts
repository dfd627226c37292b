// Anthropic Messages API behind the ImpactModel seam.
// SDK-level retries are disabled: the orchestrator owns timeout and retry policy.

import Anthropic from '@anthropic-ai/sdk';
import { ProviderError } from '../types/errors.js';
import type { ImpactModel } from '../orchestrator/analysis-orchestrator.js';

export interface AnthropicModelConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  baseURL?: string;
}

const RETRYABLE_STATUS = new Set([408, 409, 429]);

export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return RETRYABLE_STATUS.has(status) || status >= 500;
}

export function toProviderError(err: unknown): unknown {
  if (err instanceof Anthropic.APIUserAbortError) return err;
  if (err instanceof Anthropic.APIConnectionError) {
    return new ProviderError(`Anthropic connection failed: ${err.message}`, true, undefined, { cause: err });
  }
  if (err instanceof Anthropic.APIError) {
    const status = typeof err.status === 'number' ? err.status : undefined;
    return new ProviderError(
      `Anthropic API error${status ? ` ${status}` : ''}: ${err.message}`,
      isRetryableStatus(status),
      status,
      { cause: err },
    );
  }
  return err;
}

export function createAnthropicModel(config: AnthropicModelConfig): ImpactModel {
  if (!config.apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is not set');
  }
  const client = new Anthropic({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
  const model = config.model ?? 'claude-sonnet-4-5-20250929';
  const temperature = config.temperature ?? 0.1;

  return async (request, signal) => {
    try {
      const response = await client.messages.create(
        {
          model,
          max_tokens: request.maxTokens,
          temperature,
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal },
      );
      return response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
    } catch (err) {
      throw toProviderError(err);
    }
  };
}
