// Format resolution at the upload boundary.
// Declared tag > MIME type > file extension > content sniffing.

import type { DocumentFormat } from '../types/document.js';
import { UnsupportedFormatError } from '../types/errors.js';

const FORMAT_ALIASES = new Map<string, DocumentFormat>([
  ['markup', 'markup'],
  ['html', 'markup'],
  ['htm', 'markup'],
  ['xhtml', 'markup'],
  ['xml', 'markup'],
  ['text/html', 'markup'],
  ['text/xml', 'markup'],
  ['application/xml', 'markup'],
  ['application/xhtml+xml', 'markup'],
  ['plain', 'plain'],
  ['text', 'plain'],
  ['txt', 'plain'],
  ['text/plain', 'plain'],
]);

export interface FormatHints {
  format?: string;
  contentType?: string;
  filename?: string;
  bytes?: Uint8Array;
}

function lookup(value: string, source: string): DocumentFormat {
  const format = FORMAT_ALIASES.get(value.trim().toLowerCase());
  if (!format) {
    throw new UnsupportedFormatError(
      `Unsupported document ${source} "${value}". Accepted: HTML, XML or plain text`,
      { context: { [source]: value } },
    );
  }
  return format;
}

export function sniffFormat(bytes: Uint8Array): DocumentFormat {
  const head = new TextDecoder('utf-8').decode(bytes.subarray(0, 512));
  return head.trimStart().startsWith('<') ? 'markup' : 'plain';
}

export function resolveFormat(hints: FormatHints): DocumentFormat {
  if (hints.format) return lookup(hints.format, 'format');
  if (hints.contentType) return lookup(hints.contentType.split(';')[0], 'content type');
  if (hints.filename) {
    const dot = hints.filename.lastIndexOf('.');
    if (dot > 0 && dot < hints.filename.length - 1) {
      return lookup(hints.filename.slice(dot + 1), 'file extension');
    }
  }
  if (hints.bytes) return sniffFormat(hints.bytes);
  throw new UnsupportedFormatError('No document format declared and no content to sniff');
}
