/**
 * TermRanker: extracts salient terms from a job description and ranks them.
 *
 * Known phrases from the vocabulary are matched first (longest first), then
 * "N+ years" qualifications, then any remaining content word as a soft term.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { EmptyInputError } from './errors.js';
import { boundedPattern, normalizeTerm, round, tokenize } from './text.js';
import type { RankedTerm, TermCategory } from './types.js';

export const DEFAULT_MAX_TERMS = 50;

export const CATEGORY_WEIGHTS: Readonly<Record<TermCategory, number>> = {
  skill: 1,
  tool: 1,
  qualification: 0.9,
  soft: 0.6,
};

const FREQUENCY_SHARE = 0.7;
const POSITION_SHARE = 0.3;

// ─── Vocabulary ──────────────────────────────────────────────────────

const TermListSchema = z.array(z.string().trim().min(1));

export const VocabularySchema = z.object({
  skill: TermListSchema,
  tool: TermListSchema,
  qualification: TermListSchema,
  soft: TermListSchema,
  stopwords: TermListSchema,
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

interface VocabularyPhrase {
  key: string;
  display: string;
  category: TermCategory;
  words: number;
}

interface CompiledVocabulary {
  phrases: VocabularyPhrase[];
  stopwords: Set<string>;
}

const VOCABULARY_CATEGORIES: TermCategory[] = ['skill', 'tool', 'qualification', 'soft'];

export function compileVocabulary(vocabulary: Vocabulary): CompiledVocabulary {
  const byKey = new Map<string, VocabularyPhrase>();
  // Earlier categories win when a phrase is listed twice.
  for (const category of VOCABULARY_CATEGORIES) {
    for (const display of vocabulary[category]) {
      const key = normalizeTerm(display);
      if (!key || byKey.has(key)) continue;
      byKey.set(key, { key, display: display.toLowerCase(), category, words: key.split(' ').length });
    }
  }
  const phrases = [...byKey.values()].sort(
    (a, b) => b.words - a.words || b.key.length - a.key.length || a.key.localeCompare(b.key),
  );
  return { phrases, stopwords: new Set(vocabulary.stopwords.map(normalizeTerm)) };
}

let defaultVocabulary: CompiledVocabulary | null = null;

function loadDefaultVocabulary(): CompiledVocabulary {
  if (!defaultVocabulary) {
    const raw = readFileSync(new URL('./data/term-vocabulary.json', import.meta.url), 'utf8');
    defaultVocabulary = compileVocabulary(VocabularySchema.parse(JSON.parse(raw)));
  }
  return defaultVocabulary;
}

// ─── Ranking ─────────────────────────────────────────────────────────

export interface RankTermsOptions {
  max_terms?: number;
  vocabulary?: Vocabulary;
}

interface Occurrence {
  text: string;
  category: TermCategory;
  count: number;
  first: number;
}

const QUALIFICATION_RE = /(?<![a-z0-9+#])(\d+)\s*\+?\s*years?(?![a-z0-9+#])/g;
const NUMERIC_RE = /^[\d+#]+$/;

/**
 * Ranks the salient terms of `text`. Output is ordered by importance, ties
 * broken by first occurrence, and capped at `max_terms`.
 *
 * @throws EmptyInputError when `text` is blank
 */
export function rankTerms(text: string, options: RankTermsOptions = {}): RankedTerm[] {
  if (!text.trim()) {
    throw new EmptyInputError();
  }

  const vocabulary = options.vocabulary ? compileVocabulary(options.vocabulary) : loadDefaultVocabulary();
  const maxTerms = options.max_terms ?? DEFAULT_MAX_TERMS;
  const normalized = normalizeTerm(text);
  const consumed = new Uint8Array(normalized.length);
  const occurrences = new Map<string, Occurrence>();

  const record = (key: string, display: string, category: TermCategory, index: number): void => {
    const existing = occurrences.get(key);
    if (existing) {
      existing.count += 1;
      existing.first = Math.min(existing.first, index);
    } else {
      occurrences.set(key, { text: display, category, count: 1, first: index });
    }
  };

  const isFree = (start: number, end: number): boolean => {
    for (let i = start; i < end; i++) {
      if (consumed[i]) return false;
    }
    return true;
  };

  const consume = (start: number, end: number): void => {
    consumed.fill(1, start, end);
  };

  for (const phrase of vocabulary.phrases) {
    for (const match of normalized.matchAll(boundedPattern(phrase.key))) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (!isFree(start, end)) continue;
      consume(start, end);
      record(phrase.key, phrase.display, phrase.category, start);
    }
  }

  for (const match of normalized.matchAll(QUALIFICATION_RE)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (!isFree(start, end)) continue;
    consume(start, end);
    const key = `${match[1]}+ years`;
    record(key, key, 'qualification', start);
  }

  for (const token of tokenize(normalized)) {
    const end = token.index + token.value.length;
    if (!isFree(token.index, end)) continue;
    if (token.value.length < 3 || NUMERIC_RE.test(token.value)) continue;
    if (vocabulary.stopwords.has(token.value)) continue;
    record(token.value, token.value, 'soft', token.index);
  }

  if (occurrences.size === 0) return [];

  const maxFrequency = Math.max(...[...occurrences.values()].map((o) => o.count));
  const earlyCutoff = normalized.length / 3;

  const ranked = [...occurrences.values()].map((o) => {
    const early = o.first < earlyCutoff ? 1 : 0;
    const importance = CATEGORY_WEIGHTS[o.category]
      * (FREQUENCY_SHARE * (o.count / maxFrequency) + POSITION_SHARE * early);
    return { term: { text: o.text, category: o.category, importance: round(importance, 4) }, first: o.first };
  });

  ranked.sort((a, b) => b.term.importance - a.term.importance || a.first - b.first);
  return ranked.slice(0, maxTerms).map((r) => r.term);
}
