// Curated regulatory-risk vocabulary, bundled as a JSON data file.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { VocabularyEntry } from './highlighter.js';

const VocabularySchema = z.array(z.object({
  term: z.string().min(1),
  category: z.enum(['regulatory', 'risk', 'financial']),
}));

const VOCABULARY_URL = new URL('../data/regulatory-vocabulary.json', import.meta.url);

let cached: VocabularyEntry[] | null = null;

export function loadVocabulary(path: URL | string = VOCABULARY_URL): VocabularyEntry[] {
  if (path === VOCABULARY_URL && cached) return cached;
  const entries = VocabularySchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  if (path === VOCABULARY_URL) cached = entries;
  return entries;
}
