// Argument parsing for `regimpact analyze`.

import type { DocumentFormat } from '../types/document.js';

export interface AnalyzeArgs {
  file: string;
  ticker: string;
  format?: DocumentFormat;
  maxChars?: number;
  concurrency?: number;
  summary: boolean;
  json: boolean;
}

export type ParseOutcome =
  | { ok: true; args: AnalyzeArgs }
  | { ok: false; error: string }
  | { ok: false; help: true };

function positiveInt(flag: string, value: string | undefined): number | string {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < 1) {
    return `${flag} expects a positive integer, got "${value ?? ''}"`;
  }
  return n;
}

export function parseAnalyzeArgs(argv: readonly string[]): ParseOutcome {
  let file: string | undefined;
  let ticker: string | undefined;
  let format: DocumentFormat | undefined;
  let maxChars: number | undefined;
  let concurrency: number | undefined;
  let summary = true;
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { ok: false, help: true };
      case '--ticker':
      case '-t':
        ticker = argv[++i];
        if (!ticker) return { ok: false, error: `${arg} expects a ticker symbol` };
        break;
      case '--format': {
        const value = argv[++i];
        if (value !== 'markup' && value !== 'plain') {
          return { ok: false, error: `--format must be "markup" or "plain", got "${value ?? ''}"` };
        }
        format = value;
        break;
      }
      case '--max-chars': {
        const n = positiveInt(arg, argv[++i]);
        if (typeof n === 'string') return { ok: false, error: n };
        maxChars = n;
        break;
      }
      case '--concurrency': {
        const n = positiveInt(arg, argv[++i]);
        if (typeof n === 'string') return { ok: false, error: n };
        concurrency = n;
        break;
      }
      case '--no-summary':
        summary = false;
        break;
      case '--json':
        json = true;
        break;
      default:
        if (arg.startsWith('-')) return { ok: false, error: `Unknown option: ${arg}` };
        if (file) return { ok: false, error: `Unexpected argument: ${arg}` };
        file = arg;
    }
  }

  if (!file) return { ok: false, error: 'No document file given' };
  if (!ticker) return { ok: false, error: '--ticker is required' };
  return {
    ok: true,
    args: {
      file,
      ticker,
      ...(format ? { format } : {}),
      ...(maxChars ? { maxChars } : {}),
      ...(concurrency ? { concurrency } : {}),
      summary,
      json,
    },
  };
}
