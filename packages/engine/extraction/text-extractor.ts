// Text Extractor — turns uploaded bytes into one normalized text stream.
// Block-level structure survives as a blank-line separator whose offsets are
// recorded so the chunker can split on them.

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import type { Document, NormalizedText, SourceSpan } from '../types/document.js';
import { EmptyDocumentError, UnsupportedFormatError } from '../types/errors.js';

export const BLOCK_SEPARATOR = '\n\n';

const DROPPED_SELECTOR = 'script, style, noscript, template';

const INLINE_TAGS = new Set([
  'a', 'abbr', 'b', 'bdi', 'bdo', 'cite', 'code', 'data', 'dfn', 'em', 'font', 'i',
  'kbd', 'mark', 'q', 's', 'samp', 'small', 'span', 'strong', 'sub', 'sup', 'time',
  'u', 'var', 'wbr', 'ins', 'del',
]);

interface Block {
  text: string;
  locator: string;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Collapse whitespace per line, drop blank lines, keep explicit line breaks. */
function cleanBlock(raw: string): string {
  return raw
    .split('\n')
    .map(collapse)
    .filter(line => line.length > 0)
    .join('\n');
}

class BlockCollector {
  readonly blocks: Block[] = [];
  private buffer = '';
  private locator = '';

  append(text: string, locator: string): void {
    if (this.buffer.trim() === '') this.locator = locator;
    this.buffer += text;
  }

  lineBreak(): void {
    this.buffer += '\n';
  }

  push(block: Block): void {
    this.flush();
    if (block.text) this.blocks.push(block);
  }

  flush(): void {
    const text = cleanBlock(this.buffer);
    if (text) this.blocks.push({ text, locator: this.locator });
    this.buffer = '';
  }
}

function tableText($: CheerioAPI, table: Element): string {
  const rows = $(table)
    .find('tr')
    .toArray()
    .map(row => $(row)
      .children('td, th')
      .toArray()
      .map(cell => collapse($(cell).text()))
      .filter(Boolean)
      .join(' | '))
    .filter(Boolean);
  return rows.length > 0 ? rows.join('\n') : collapse($(table).text());
}

function walk(
  $: CheerioAPI,
  nodes: AnyNode[],
  parentPath: string,
  blockPath: string,
  out: BlockCollector,
): void {
  const seen = new Map<string, number>();

  for (const node of nodes) {
    if (isText(node)) {
      out.append(node.data.replace(/\s+/g, ' '), blockPath || '/');
      continue;
    }
    if (!isTag(node)) {
      // CDATA sections carry text children; comments and directives do not
      if (hasChildren(node)) walk($, node.children, parentPath, blockPath, out);
      continue;
    }

    const nth = (seen.get(node.name) ?? 0) + 1;
    seen.set(node.name, nth);
    const path = parentPath ? `${parentPath}/${node.name}[${nth}]` : `${node.name}[${nth}]`;
    const tag = node.name.toLowerCase();

    if (tag === 'br') {
      out.lineBreak();
    } else if (tag === 'table') {
      out.push({ text: tableText($, node), locator: path });
    } else if (INLINE_TAGS.has(tag)) {
      walk($, node.children, path, blockPath, out);
    } else {
      out.flush();
      walk($, node.children, path, path, out);
      out.flush();
    }
  }
}

function assemble(blocks: readonly Block[]): NormalizedText {
  let text = '';
  const boundaries: number[] = [];
  const spans: SourceSpan[] = [];

  blocks.forEach((block, i) => {
    if (i > 0) {
      text += BLOCK_SEPARATOR;
      boundaries.push(text.length);
    }
    spans.push({ start: text.length, end: text.length + block.text.length, locator: block.locator });
    text += block.text;
  });

  return { text, boundaries, spans };
}

function extractMarkupBlocks(source: string): Block[] {
  const xml = /^\s*<\?xml\b/i.test(source);
  const $ = cheerio.load(source, { xml });
  $(DROPPED_SELECTOR).remove();

  const out = new BlockCollector();
  walk($, $.root()[0].children, '', '', out);
  out.flush();
  return out.blocks;
}

function extractPlainBlocks(source: string): Block[] {
  const lines = source.replace(/\r\n?/g, '\n').split('\n');
  const blocks: Block[] = [];
  let current: string[] = [];
  let firstLine = 0;
  let lastLine = 0;

  const flush = () => {
    if (current.length === 0) return;
    blocks.push({
      text: current.join('\n'),
      locator: firstLine === lastLine ? `line ${firstLine}` : `lines ${firstLine}-${lastLine}`,
    });
    current = [];
  };

  lines.forEach((line, i) => {
    const cleaned = collapse(line);
    if (!cleaned) {
      flush();
      return;
    }
    if (current.length === 0) firstLine = i + 1;
    lastLine = i + 1;
    current.push(cleaned);
  });
  flush();

  return blocks;
}

function decode(bytes: Uint8Array): string {
  let source: string;
  try {
    source = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new UnsupportedFormatError('Document is not valid UTF-8 text', { cause: err });
  }
  if (source.includes('\u0000')) {
    throw new UnsupportedFormatError('Document contains binary content');
  }
  return source;
}

/**
 * Extract normalized text from a document.
 * Pure: the same document always yields the same NormalizedText.
 */
export function extractText(document: Document): NormalizedText {
  const source = decode(document.bytes);

  let blocks: Block[];
  switch (document.format) {
    case 'markup':
      blocks = extractMarkupBlocks(source);
      break;
    case 'plain':
      blocks = extractPlainBlocks(source);
      break;
    default:
      throw new UnsupportedFormatError(`Unsupported document format "${String(document.format)}"`);
  }

  const normalized = assemble(blocks);
  if (normalized.text.length === 0) {
    throw new EmptyDocumentError('Document contains no analyzable text', {
      context: { format: document.format, byteLength: document.byteLength },
    });
  }
  return normalized;
}

/** Source locator for a character offset, or undefined when out of range. */
export function locate(normalized: NormalizedText, offset: number): string | undefined {
  if (offset < 0 || offset >= normalized.text.length) return undefined;
  const { spans } = normalized;
  let lo = 0;
  let hi = spans.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (spans[mid].start <= offset) lo = mid;
    else hi = mid - 1;
  }
  return spans[lo]?.locator;
}
