import { describe, it, expect } from 'vitest';
import { extractText, locate } from '../extraction/text-extractor.js';
import { createDocument } from '../types/document.js';
import { EmptyDocumentError, UnsupportedFormatError } from '../types/errors.js';
import { doc } from './helpers.js';

describe('extractText — plain text', () => {
  it('normalizes line endings and collapses whitespace into paragraphs', () => {
    const result = extractText(doc('First line\r\nsecond   line\r\n\r\n\r\nThird paragraph  \n', 'plain'));
    expect(result.text).toBe('First line\nsecond line\n\nThird paragraph');
    expect(result.boundaries).toEqual([24]);
    expect(result.spans.map(s => s.locator)).toEqual(['lines 1-2', 'line 5']);
  });

  it('throws EmptyDocumentError for whitespace-only input', () => {
    expect(() => extractText(doc('   \n\n \t ', 'plain'))).toThrow(EmptyDocumentError);
  });
});

describe('extractText — markup', () => {
  const html = '<html><head><title>T</title><style>p { color: red }</style></head><body>' +
    '<h1>Act</h1><p>Section <b>one</b> text.</p><script>track()</script><p>Line a<br>Line b</p>' +
    '</body></html>';

  it('strips tags and keeps blocks separated by blank lines', () => {
    const result = extractText(doc(html, 'markup'));
    expect(result.text).toBe('T\n\nAct\n\nSection one text.\n\nLine a\nLine b');
    expect(result.boundaries).toEqual([3, 8, 27]);
  });

  it('records element paths as source locators', () => {
    const result = extractText(doc(html, 'markup'));
    expect(result.spans.map(s => s.locator)).toEqual([
      'html[1]/head[1]/title[1]',
      'html[1]/body[1]/h1[1]',
      'html[1]/body[1]/p[1]',
      'html[1]/body[1]/p[2]',
    ]);
    expect(locate(result, 10)).toBe('html[1]/body[1]/p[1]');
    expect(locate(result, 1000)).toBeUndefined();
  });

  it('keeps a table as one unit with cells joined by pipes', () => {
    const result = extractText(doc(
      '<p>Budget</p><table><tr><th>Item</th><th>Amount</th></tr>' +
      '<tr><td>Grants</td><td>$5 billion</td></tr></table>',
      'markup',
    ));
    expect(result.text).toBe('Budget\n\nItem | Amount\nGrants | $5 billion');
    expect(result.boundaries).toEqual([8]);
  });

  it('parses documents with an XML declaration in XML mode', () => {
    const result = extractText(doc(
      '<?xml version="1.0"?><bill><section><title>Scope</title><text>Applies to  banks.</text></section></bill>',
      'markup',
    ));
    expect(result.text).toBe('Scope\n\nApplies to banks.');
    expect(result.spans[0].locator).toBe('bill[1]/section[1]/title[1]');
  });

  it('throws EmptyDocumentError when only dropped content remains', () => {
    expect(() => extractText(doc('<html><body><script>a()</script>  </body></html>', 'markup')))
      .toThrow(EmptyDocumentError);
  });
});

describe('extractText — invalid bytes', () => {
  it('rejects bytes that are not UTF-8', () => {
    const document = createDocument(new Uint8Array([0xff, 0xfe, 0x41]), 'plain');
    expect(() => extractText(document)).toThrow(UnsupportedFormatError);
  });

  it('rejects binary content with NUL bytes', () => {
    const document = createDocument(new Uint8Array([0x41, 0x00, 0x42]), 'plain');
    expect(() => extractText(document)).toThrow('Document contains binary content');
  });

  it('is deterministic', () => {
    const input = doc('<p>One</p><p>Two</p>', 'markup');
    expect(extractText(input)).toEqual(extractText(input));
  });
});
