/**
 * Text normalization shared by the ranker and the scorer. Both sides of every
 * comparison go through `normalizeTerm`, so keys line up.
 */

const TOKEN_RE = /[a-z0-9+#]+/g;

/** Lowercase, drop apostrophes, turn other punctuation (except `+` and `#`) into spaces. */
export function normalizeTerm(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^a-z0-9+#\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export interface Token {
  value: string;
  index: number;
}

/** Tokens of already-normalized text, with their offsets. */
export function tokenize(normalized: string): Token[] {
  const tokens: Token[] = [];
  for (const match of normalized.matchAll(TOKEN_RE)) {
    tokens.push({ value: match[0], index: match.index ?? 0 });
  }
  return tokens;
}

const SUFFIXES = ['ing', 'ed', 'es', 's'];

/**
 * Strips one inflection suffix, then a trailing `e`, so "manage", "managed"
 * and "managing" share a stem. Stems never drop below three characters.
 */
export function lightStem(word: string): string {
  let stem = word;
  for (const suffix of SUFFIXES) {
    if (stem.endsWith(suffix) && stem.length - suffix.length >= 3) {
      stem = stem.slice(0, -suffix.length);
      break;
    }
  }
  return stem.endsWith('e') && stem.length > 3 ? stem.slice(0, -1) : stem;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Matches `needle` in normalized text only where it is not glued to other word characters. */
export function boundedPattern(needle: string, flags = 'g'): RegExp {
  return new RegExp(`(?<![a-z0-9+#])${escapeRegExp(needle)}(?![a-z0-9+#])`, flags);
}

export function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
