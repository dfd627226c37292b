// Prompt templates for per-segment assessment and the consolidated summary.

import type { AggregatedReport, AnalysisTarget } from '../types/analysis.js';
import type { Chunk } from '../types/document.js';

export const SYSTEM_PROMPT =
  'You are a financial analyst assessing how regulatory documents affect listed companies. ' +
  'Be concise and factual. Never invent provisions that are not in the text.';

function describeTarget(target: AnalysisTarget): string {
  const parts = [`${target.name} (${target.exchange}: ${target.ticker})`];
  if (target.sector) parts.push(`sector: ${target.sector}`);
  if (target.industry) parts.push(`industry: ${target.industry}`);
  return parts.join(', ');
}

export function buildChunkPrompt(chunk: Chunk, totalChunks: number, target: AnalysisTarget): string {
  return `Assess the impact of this regulatory document segment ${chunk.index + 1}/${totalChunks} on ${describeTarget(target)}.

<segment>
${chunk.text}
</segment>

Consider:
1. Key provisions and financial amounts
2. Whether the company's sector or operations are affected
3. Implementation timelines
4. Likely effect on revenue, costs and risk

Classify the severity of the impact on this company as one of: none, low, medium, high.
List the key regulatory terms and risk phrases you relied on, exactly as you use them in your impact text.

Respond with JSON only:
{"severity": "none|low|medium|high", "impact": "<2-5 sentences>", "key_terms": ["<term>", "..."]}`;
}

export function buildSummaryPrompt(report: AggregatedReport, target: AnalysisTarget): string {
  return `Based on these segment assessments of a regulatory document, write a consolidated impact report for ${describeTarget(target)}.
Overall severity across segments: ${report.overallSeverity}.

${report.text}

Provide exactly this structure:

1. DOCUMENT SUMMARY:
[What the document does, main provisions, budget amounts]

2. IMPACT ON ${target.ticker}:
[How the provisions affect the company, with the most important first]

3. ESTIMATED STOCK IMPACT:
[Direction (positive/negative/neutral) and rough magnitude, with the main driver]

4. INVESTMENT STANCE:
[BUY, HOLD or SELL] - [One-sentence rationale]

5. KEY RISKS AND OPPORTUNITIES:
- [Risk or opportunity]

6. MARKET OUTLOOK:
Mid-term (6-18 months): [Prediction]
Long-term (2-5 years): [Prediction]`;
}
