// Shared fixtures for engine tests

import { vi } from 'vitest';
import type { Chunk } from '../types/document.js';
import { createDocument, type Document, type DocumentFormat } from '../types/document.js';
import type { ImpactModel, ModelRequest } from '../orchestrator/analysis-orchestrator.js';
import { StaticTickerDirectory } from '../bridge/ticker-directory.js';

/** `${prefix}0 ${prefix}1 ... ${prefix}(n-1 mod 10)`; every token is two characters. */
export function words(prefix: string, n: number): string {
  return Array.from({ length: n }, (_, i) => `${prefix}${i % 10}`).join(' ');
}

export function doc(content: string, format: DocumentFormat): Document {
  return createDocument(new TextEncoder().encode(content), format);
}

export function reply(severity: string, impact: string, keyTerms: string[] = []): string {
  return JSON.stringify({ severity, impact, key_terms: keyTerms });
}

export function makeChunks(n: number): Chunk[] {
  let offset = 0;
  return Array.from({ length: n }, (_, index) => {
    const text = `Section ${index + 1} imposes new reporting requirements.`;
    const chunk = { index, start: offset, end: offset + text.length, text, forcedSplit: false };
    offset += text.length;
    return chunk;
  });
}

export const ACME = {
  symbol: 'ACME',
  name: 'Acme Corp',
  exchange: 'NYSE',
  sector: 'Industrials',
};

export function testDirectory(): StaticTickerDirectory {
  return new StaticTickerDirectory([ACME, { symbol: 'BETA', name: 'Beta Holdings', exchange: 'NASDAQ' }]);
}

/** Model stand-in that rejects when its signal aborts and otherwise never settles. */
export function hangingModel(): ImpactModel {
  return (_request: ModelRequest, signal: AbortSignal) =>
    new Promise<string>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}

export function mockModel(impl: (request: ModelRequest) => Promise<string> | string) {
  return vi.fn(async (request: ModelRequest, _signal: AbortSignal) => impl(request));
}
