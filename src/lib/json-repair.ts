import logger from './logger.js';

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Closes braces/brackets left open by a truncated model response.
 */
function closePartial(s: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of s) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  return s.replace(/,\s*$/, '') + stack.reverse().join('');
}

/**
 * Multi-step JSON repair for LLM outputs that may include markdown fences,
 * surrounding prose, trailing commas or a truncated tail.
 * Returns `undefined` when nothing parseable can be recovered.
 */
export function repairJSON(text: string): unknown {
  if (!text) return undefined;

  let cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();

  const direct = tryParse(cleaned);
  if (direct !== undefined) return direct;

  const firstBrace = cleaned.indexOf('{');
  const firstBracket = cleaned.indexOf('[');
  const useBrace = firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket);
  const start = useBrace ? firstBrace : firstBracket;
  if (start >= 0) {
    const lastClose = cleaned.lastIndexOf(useBrace ? '}' : ']');
    cleaned = lastClose > start ? cleaned.slice(start, lastClose + 1) : cleaned.slice(start);
    const extracted = tryParse(cleaned);
    if (extracted !== undefined) return extracted;
  }

  const noTrailing = cleaned.replace(/,\s*([\]}])/g, '$1');
  const withoutCommas = tryParse(noTrailing);
  if (withoutCommas !== undefined) return withoutCommas;

  if (noTrailing.length > 50_000) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return undefined;
  }

  const closed = closePartial(noTrailing);
  if (closed !== noTrailing) {
    const repaired = tryParse(closed);
    if (repaired !== undefined) return repaired;
  }

  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return undefined;
}
