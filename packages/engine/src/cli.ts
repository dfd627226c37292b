#!/usr/bin/env node
// regimpact — regulatory impact analysis CLI
//
// Usage:
//   regimpact analyze bill.html --ticker AAPL               # highlighted report
//   regimpact analyze bill.txt --ticker JPM --json          # JSON report on stdout
//   regimpact analyze bill.xml -t XOM --max-chars 8000 --no-summary
//   regimpact help

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { loadConfig } from '../config/index.js';
import { createAnalysisService } from '../config/factory.js';
import { resolveFormat } from '../extraction/format.js';
import { createDocument } from '../types/document.js';
import { ImpactAnalysisError, RunCancelledError, errorMessage } from '../types/errors.js';
import type { AnalysisService } from '../orchestrator/analysis-service.js';
import type { AnalysisReport } from '../types/analysis.js';
import type { ProgressSnapshot } from '../types/progress.js';
import { parseAnalyzeArgs, type AnalyzeArgs } from './args.js';
import { renderReport, reportToJson } from './render.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;
const errTTY = process.stderr.isTTY ?? false;

const ansi = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  red: '\x1b[31m',
};

function c(color: keyof typeof ansi, text: string, tty = errTTY): string {
  return tty ? `${ansi[color]}${text}${ansi.reset}` : text;
}

// ── CLI class ───────────────────────────────────────────────────────

class ImpactCli {
  private service: AnalysisService | null = null;

  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || (rawArgs.includes('--help') && rawArgs[0] !== 'analyze')) {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    switch (command) {
      case 'analyze':
        await this.handleAnalyze(rawArgs.slice(1));
        break;
      case 'help':
      case '-h':
        this.printHelp();
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        this.printHelp();
        process.exitCode = 1;
    }
  }

  // ── Subcommand: analyze ─────────────────────────────────────────

  private async handleAnalyze(argv: string[]): Promise<void> {
    const parsed = parseAnalyzeArgs(argv);
    if (!parsed.ok) {
      if ('help' in parsed) {
        this.printHelp();
        return;
      }
      console.error(`  ${c('red', 'Error:')} ${parsed.error}\n`);
      process.exitCode = 1;
      return;
    }
    const args = parsed.args;

    const config = loadConfig();
    if (!config.anthropicApiKey) {
      console.error(`  ${c('red', 'Error:')} ANTHROPIC_API_KEY environment variable is required.\n`);
      process.exitCode = 1;
      return;
    }
    if (args.maxChars) config.chunking.maxChars = args.maxChars;
    if (args.concurrency) config.analysis.concurrency = args.concurrency;

    const service = createAnalysisService(config, {
      summary: args.summary && config.analysis.summary,
      onEvent: event => {
        if (event.type === 'ChunkAnalyzed' || event.type === 'ChunkDegraded') {
          this.printProgress(event.runId);
        }
      },
    });
    this.service = service;

    const bytes = readFileSync(args.file);
    const format = resolveFormat({
      format: args.format,
      filename: args.file,
      bytes,
    });
    const document = createDocument(bytes, format);

    console.error(`\n  ${c('bold', 'regimpact')} ${c('dim', `${args.file} (${format}) → ${args.ticker.toUpperCase()}`)}`);
    console.error(`  ${c('dim', `Model: ${config.model} | Chunk budget: ${config.chunking.maxChars} chars | Concurrency: ${config.analysis.concurrency}`)}\n`);

    const runId = await service.startAnalysis(document, args.ticker);
    const onSigint = (): void => {
      service.cancel(runId);
    };
    process.once('SIGINT', onSigint);

    try {
      const report = await service.waitForReport(runId);
      console.error('');
      this.printReport(args, report);
    } finally {
      process.off('SIGINT', onSigint);
      service.dispose();
    }
  }

  private printProgress(runId: string): void {
    if (!this.service) return;
    let p: ProgressSnapshot;
    try {
      p = this.service.getProgress(runId);
    } catch (err) {
      // a segment can finish while SIGINT is cancelling the run
      if (err instanceof RunCancelledError) return;
      throw err;
    }
    const eta = p.estimatedSecondsRemaining === null ? '' : ` · ~${p.estimatedSecondsRemaining}s left`;
    console.error(`  ${c('cyan', '▸')} ${p.chunksCompleted}/${p.chunksTotal} segments${c('dim', eta)}`);
  }

  private printReport(args: AnalyzeArgs, report: AnalysisReport): void {
    if (args.json) {
      console.log(reportToJson(report));
    } else {
      console.log(renderReport(report, { color: isTTY }));
    }
  }

  printHelp(): void {
    console.log(`
  ${c('bold', 'regimpact', isTTY)} — regulatory document impact analysis

  ${c('bold', 'Usage:', isTTY)}
    regimpact analyze <file> --ticker <SYMBOL> [options]
    regimpact help

  ${c('bold', 'Options:', isTTY)}
    -t, --ticker <SYMBOL>   Company to assess (required)
    --format markup|plain   Override format detection
    --max-chars <N>         Chunk budget in characters (default: MAX_CHUNK_CHARS or 12000)
    --concurrency <N>       Parallel AI calls (default: ANALYSIS_CONCURRENCY or 4)
    --no-summary            Skip the consolidated summary
    --json                  Print the report as JSON

  ${c('bold', 'Environment:', isTTY)}
    ANTHROPIC_API_KEY       Required. Anthropic API key.
    IMPACT_MODEL            Model override (default: claude-sonnet-4-5-20250929).
    FMP_API_KEY             Validate tickers against FMP profiles instead of the bundled list.
    LOG_LEVEL               debug | info | warn | error | silent

  ${c('bold', 'Examples:', isTTY)}
    regimpact analyze bill.html --ticker AAPL
    regimpact analyze act.txt -t JPM --json > report.json
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new ImpactCli();
cli.start().catch((err: unknown) => {
  const code = err instanceof ImpactAnalysisError ? ` [${err.code}]` : '';
  console.error(`${c('red', 'Fatal:')}${code} ${errorMessage(err)}`);
  process.exit(1);
});
