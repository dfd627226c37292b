import { describe, it, expect } from 'vitest';
import { applyHighlights, highlightTerms, normalizeVocabulary } from '../highlighting/highlighter.js';
import { loadVocabulary } from '../highlighting/vocabulary.js';

describe('highlightTerms', () => {
  it('prefers the longest phrase over an overlapping single word', () => {
    const spans = highlightTerms('New export controls and controls on capital.', ['controls', 'export controls']);
    expect(spans).toEqual([
      { start: 4, end: 19, text: 'export controls', term: 'export controls' },
      { start: 24, end: 32, text: 'controls', term: 'controls' },
    ]);
  });

  it('matches case-insensitively on whole words only', () => {
    const spans = highlightTerms('Tariff TARIFFS tariffed', ['tariff']);
    expect(spans.map(s => [s.start, s.end, s.text])).toEqual([[0, 6, 'Tariff']]);
  });

  it('matches phrases across line breaks and repeated spaces', () => {
    const spans = highlightTerms('a carbon\n  tax', ['Carbon Tax']);
    expect(spans).toEqual([{ start: 2, end: 14, text: 'carbon\n  tax', term: 'Carbon Tax' }]);
  });

  it('escapes punctuation in terms', () => {
    const spans = highlightTerms('the S&P 500 index and S&P 5000', ['S&P 500']);
    expect(spans.map(s => [s.start, s.end])).toEqual([[4, 11]]);
  });

  it('keeps the category of the matching entry', () => {
    const spans = highlightTerms('Penalties apply.', [{ term: 'penalties', category: 'risk' }]);
    expect(spans[0].category).toBe('risk');
  });

  it('returns no spans for an empty vocabulary', () => {
    expect(highlightTerms('Anything at all.', [])).toEqual([]);
  });
});

describe('normalizeVocabulary', () => {
  it('deduplicates case-insensitively and orders longest first', () => {
    const entries = normalizeVocabulary([
      { term: 'fine', category: 'risk' },
      'FINE',
      '  capital   requirements ',
      'audit',
      '',
    ]);
    expect(entries.map(e => e.term)).toEqual(['capital requirements', 'audit', 'fine']);
    expect(entries[2].category).toBe('risk');
  });
});

describe('applyHighlights', () => {
  it('wraps spans with the default marker', () => {
    const text = 'a fine day';
    expect(applyHighlights(text, highlightTerms(text, ['fine']))).toBe('a **fine** day');
  });

  it('uses a custom wrapper', () => {
    const text = 'Tariffs and fines.';
    const spans = highlightTerms(text, ['tariffs', 'fines']);
    expect(applyHighlights(text, spans, s => `[${s}]`)).toBe('[Tariffs] and [fines].');
  });
});

describe('loadVocabulary', () => {
  it('loads the bundled regulatory vocabulary', () => {
    const vocabulary = loadVocabulary();
    expect(vocabulary.length).toBeGreaterThan(50);
    expect(vocabulary).toContainEqual({ term: 'compliance costs', category: 'regulatory' });
  });
});
