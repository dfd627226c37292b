import { describe, it, expect } from 'vitest';
import { parseAssessment } from '../utils/response-parser.js';

describe('parseAssessment', () => {
  it('parses a JSON reply', () => {
    const result = parseAssessment('{"severity":"medium","impact":"Costs rise.","key_terms":["compliance costs"]}');
    expect(result).toEqual({
      ok: true,
      value: { severity: 'medium', impact: 'Costs rise.', keyTerms: ['compliance costs'] },
    });
  });

  it('accepts fenced JSON with surrounding prose and mixed-case severity', () => {
    const raw = 'Here is the assessment:\n```json\n{"severity": "High", "impact": "  Export ban hits sales. "}\n```';
    const result = parseAssessment(raw);
    expect(result).toEqual({ ok: true, value: { severity: 'high', impact: 'Export ban hits sales.', keyTerms: [] } });
  });

  it('rejects an unknown severity', () => {
    const result = parseAssessment('{"severity":"critical","impact":"x"}');
    expect(result.ok).toBe(false);
  });

  it('rejects an empty impact', () => {
    const result = parseAssessment('{"severity":"low","impact":"   "}');
    expect(result).toEqual({ ok: false, reason: 'Invalid assessment: impact String must contain at least 1 character(s)' });
  });

  it('falls back to labeled text', () => {
    const raw = 'SEVERITY: Medium\nIMPACT: Costs rise.\nMargins narrow.\nKEY TERMS: compliance costs, tariffs';
    expect(parseAssessment(raw)).toEqual({
      ok: true,
      value: { severity: 'medium', impact: 'Costs rise.\nMargins narrow.', keyTerms: ['compliance costs', 'tariffs'] },
    });
  });

  it('reports unparseable replies', () => {
    expect(parseAssessment('I cannot help with that.')).toEqual({
      ok: false,
      reason: 'Response is neither JSON nor labeled text',
    });
    expect(parseAssessment('  ')).toEqual({ ok: false, reason: 'Empty response' });
  });
});
