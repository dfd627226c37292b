// Parses a model reply into a structured chunk assessment.
// JSON is preferred; labeled "SEVERITY:/IMPACT:/KEY TERMS:" text is accepted as a fallback.

import { z } from 'zod';
import type { Severity } from '../types/analysis.js';

export interface ModelAssessment {
  severity: Severity;
  impact: string;
  keyTerms: string[];
}

export type ParseResult =
  | { ok: true; value: ModelAssessment }
  | { ok: false; reason: string };

const SeveritySchema = z.string()
  .transform(s => s.trim().toLowerCase())
  .pipe(z.enum(['none', 'low', 'medium', 'high']));

const AssessmentSchema = z.object({
  severity: SeveritySchema,
  impact: z.string().trim().min(1),
  key_terms: z.array(z.string().trim().min(1)).default([]),
});

function stripFences(text: string): string {
  return text.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '').trim();
}

function parseJson(raw: string): ParseResult | null {
  const text = stripFences(raw);
  const open = text.indexOf('{');
  const close = text.lastIndexOf('}');
  if (open === -1 || close <= open) return null;

  let data: unknown;
  try {
    data = JSON.parse(text.slice(open, close + 1));
  } catch {
    return null;
  }
  const parsed = AssessmentSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: `Invalid assessment: ${issue.path.join('.') || 'root'} ${issue.message}` };
  }
  return {
    ok: true,
    value: { severity: parsed.data.severity, impact: parsed.data.impact, keyTerms: parsed.data.key_terms },
  };
}

const LABEL = /^\s*(SEVERITY|IMPACT|KEY TERMS)\s*:\s*(.*)$/i;

function parseLabeled(raw: string): ParseResult | null {
  const fields = new Map<string, string[]>();
  let current: string | null = null;
  for (const line of raw.split(/\r?\n/)) {
    const m = LABEL.exec(line);
    if (m) {
      current = m[1].toUpperCase();
      fields.set(current, [m[2]]);
    } else if (current) {
      fields.get(current)?.push(line);
    }
  }
  if (!fields.has('SEVERITY') || !fields.has('IMPACT')) return null;

  const severity = SeveritySchema.safeParse((fields.get('SEVERITY') ?? []).join(' '));
  if (!severity.success) return { ok: false, reason: 'Unrecognised severity label' };
  const impact = (fields.get('IMPACT') ?? []).join('\n').trim();
  if (!impact) return { ok: false, reason: 'Empty impact text' };
  const keyTerms = (fields.get('KEY TERMS') ?? [])
    .join(',')
    .split(',')
    .map(t => t.trim())
    .filter(Boolean);
  return { ok: true, value: { severity: severity.data, impact, keyTerms } };
}

export function parseAssessment(raw: string): ParseResult {
  if (!raw.trim()) return { ok: false, reason: 'Empty response' };
  return parseJson(raw) ?? parseLabeled(raw) ?? { ok: false, reason: 'Response is neither JSON nor labeled text' };
}
