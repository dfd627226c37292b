// Terminal and JSON renderings of a finished report.

import type { AnalysisReport, OverallSeverity } from '../types/analysis.js';
import { applyHighlights } from '../highlighting/highlighter.js';

export interface RenderOptions {
  /** Emit ANSI escapes (bold highlights, coloured severity) */
  color: boolean;
}

const SEVERITY_COLOR: Record<OverallSeverity, string> = {
  none: '\x1b[32m',
  low: '\x1b[36m',
  medium: '\x1b[33m',
  high: '\x1b[31m',
  unavailable: '\x1b[90m',
};

export function renderReport(report: AnalysisReport, { color }: RenderOptions): string {
  const bold = (s: string): string => (color ? `\x1b[1m${s}\x1b[0m` : s);
  const severity = color
    ? `${SEVERITY_COLOR[report.overallSeverity]}${report.overallSeverity.toUpperCase()}\x1b[0m`
    : report.overallSeverity.toUpperCase();
  const { target } = report;

  const lines = [
    `${bold('Regulatory impact:')} ${target.name} (${target.exchange}: ${target.ticker})`,
    `Overall severity: ${severity}`,
    `Segments: ${report.results.length}` +
      (report.degradedChunks.length > 0 ? ` (${report.degradedChunks.length} unavailable)` : ''),
    '',
  ];

  if (report.summary) {
    lines.push(bold('Summary'), '', report.summary, '', bold('Segment analysis'), '');
  }

  lines.push(color ? applyHighlights(report.text, report.highlights, s => bold(s)) : report.text);
  return lines.join('\n');
}

export function reportToJson(report: AnalysisReport): string {
  return JSON.stringify({ ...report, generatedAt: report.generatedAt.toISOString() }, null, 2);
}
