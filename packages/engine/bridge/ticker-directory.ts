// Ticker validation: resolves a listing symbol to company metadata.
// FMP profile lookups when an API key is configured, a bundled directory otherwise.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { FmpFetch } from './fmp-client.js';

export interface CompanyProfile {
  symbol: string;
  name: string;
  exchange: string;
  sector?: string;
  industry?: string;
}

export interface TickerDirectory {
  /** null when the symbol is not listed */
  lookup(symbol: string): Promise<CompanyProfile | null>;
}

const FmpProfileSchema = z.array(z.object({
  symbol: z.string(),
  companyName: z.string(),
  exchange: z.string().optional(),
  exchangeShortName: z.string().optional(),
  sector: z.string().nullish(),
  industry: z.string().nullish(),
}));

export class FmpTickerDirectory implements TickerDirectory {
  constructor(private readonly fmp: FmpFetch) {}

  async lookup(symbol: string): Promise<CompanyProfile | null> {
    const parsed = FmpProfileSchema.safeParse(await this.fmp('profile', { symbol }));
    if (!parsed.success) {
      throw new Error(`FMP: unexpected profile response for ${symbol}`);
    }
    const [profile] = parsed.data;
    if (!profile) return null;
    return {
      symbol: profile.symbol.toUpperCase(),
      name: profile.companyName,
      exchange: profile.exchangeShortName ?? profile.exchange ?? 'UNKNOWN',
      ...(profile.sector ? { sector: profile.sector } : {}),
      ...(profile.industry ? { industry: profile.industry } : {}),
    };
  }
}

const CompanyListSchema = z.array(z.object({
  symbol: z.string().min(1),
  name: z.string().min(1),
  exchange: z.string().min(1),
  sector: z.string().optional(),
  industry: z.string().optional(),
}));

const COMPANIES_URL = new URL('../data/companies.json', import.meta.url);

export class StaticTickerDirectory implements TickerDirectory {
  private readonly bySymbol: Map<string, CompanyProfile>;

  constructor(companies?: readonly CompanyProfile[]) {
    const list = companies ?? CompanyListSchema.parse(JSON.parse(readFileSync(COMPANIES_URL, 'utf-8')));
    this.bySymbol = new Map(list.map(c => [c.symbol.toUpperCase(), c]));
  }

  get size(): number {
    return this.bySymbol.size;
  }

  async lookup(symbol: string): Promise<CompanyProfile | null> {
    return this.bySymbol.get(symbol.toUpperCase()) ?? null;
  }
}
