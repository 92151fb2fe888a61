/**
 * StructureValidator: LaTeX well-formedness plus a 0–100 structural
 * quality score.
 */

import type { AtsFinding } from './ats-rules.js';
import type { StructurePolicy } from './config.js';
import { round } from './text.js';
import type { DocumentScan, StructureReport } from './types.js';

const MISSING_SECTION_PENALTY = 10;
const MISSING_SECTION_CAP = 30;
const EXTRA_SECTION_PENALTY = 5;
const EXTRA_SECTION_CAP = 15;
const SPARSE_BULLETS_CAP = 20;
const DENSE_BULLETS_PENALTY = 10;
const SYNTAX_ERROR_PENALTY = 10;
const SYNTAX_ERROR_CAP = 40;
const HAZARD_PENALTY = 3;
const HAZARD_CAP = 9;

/** Blanks out comments while keeping line numbering intact. */
function stripComments(markup: string): string[] {
  return markup.split('\n').map((line) => line.replace(/(^|[^\\])%.*$/, '$1'));
}

function checkSkeleton(markup: string): string[] {
  const errors: string[] = [];
  if (!/\\documentclass\b/.test(markup)) errors.push('Missing \\documentclass declaration');
  if (!markup.includes('\\begin{document}')) errors.push('Missing \\begin{document}');
  if (!markup.includes('\\end{document}')) errors.push('Missing \\end{document}');
  return errors;
}

function checkEnvironments(lines: string[]): string[] {
  const errors: string[] = [];
  const stack: Array<{ name: string; line: number }> = [];

  lines.forEach((text, index) => {
    const line = index + 1;
    for (const match of text.matchAll(/\\(begin|end)\s*\{([^{}]*)\}/g)) {
      const name = match[2].trim();
      if (match[1] === 'begin') {
        stack.push({ name, line });
        continue;
      }
      const at = stack.map((e) => e.name).lastIndexOf(name);
      if (at < 0) {
        errors.push(`\\end{${name}} at line ${line} has no matching \\begin{${name}}`);
        continue;
      }
      for (const unclosed of stack.splice(at).slice(1).reverse()) {
        errors.push(`Environment '${unclosed.name}' opened at line ${unclosed.line} is not closed before \\end{${name}} at line ${line}`);
      }
    }
  });

  for (const open of stack) {
    errors.push(`Environment '${open.name}' opened at line ${open.line} is never closed`);
  }
  return errors;
}

function checkDisplayMath(lines: string[]): string[] {
  const errors: string[] = [];
  const open: number[] = [];

  lines.forEach((text, index) => {
    const line = index + 1;
    for (const match of text.matchAll(/(\\+)([[\]])/g)) {
      // `\\[2pt]` is a line break with spacing, not display math.
      if (match[1].length % 2 === 0) continue;
      if (match[2] === '[') {
        open.push(line);
      } else if (open.length > 0) {
        open.pop();
      } else {
        errors.push(`Unmatched '\\]' at line ${line}`);
      }
    }
  });

  for (const line of open) {
    errors.push(`Unmatched '\\[' opened at line ${line}`);
  }
  return errors;
}

function checkTrailingBackslash(lines: string[]): string[] {
  const errors: string[] = [];
  lines.forEach((text, index) => {
    const trailing = /(\\+)$/.exec(text.trimEnd());
    if (trailing && trailing[1].length % 2 === 1) {
      errors.push(`Line ${index + 1} ends with a single backslash`);
    }
  });
  return errors;
}

export function scoreQuality(
  scan: DocumentScan,
  errorCount: number,
  hazardCount: number,
  policy: StructurePolicy,
): number {
  if (!scan.plain_text.trim()) return 0;

  let score = 100;
  const sections = scan.section_count;
  if (sections < policy.min_sections) {
    score -= Math.min(MISSING_SECTION_CAP, MISSING_SECTION_PENALTY * (policy.min_sections - sections));
  } else if (sections > policy.max_sections) {
    score -= Math.min(EXTRA_SECTION_CAP, EXTRA_SECTION_PENALTY * (sections - policy.max_sections));
  }

  const density = sections > 0 ? scan.bullet_count / sections : 0;
  if (density < policy.min_bullets_per_section && policy.min_bullets_per_section > 0) {
    score -= SPARSE_BULLETS_CAP * ((policy.min_bullets_per_section - density) / policy.min_bullets_per_section);
  } else if (density > policy.max_bullets_per_section) {
    score -= DENSE_BULLETS_PENALTY;
  }

  score -= Math.min(SYNTAX_ERROR_CAP, SYNTAX_ERROR_PENALTY * errorCount);
  score -= Math.min(HAZARD_CAP, HAZARD_PENALTY * hazardCount);

  return round(Math.max(0, score), 2);
}

export function validateStructure(
  markup: string,
  scan: DocumentScan,
  policy: StructurePolicy,
  hazards: readonly AtsFinding[] = [],
): StructureReport {
  const lines = stripComments(markup);
  const syntaxErrors = [...new Set([
    ...checkSkeleton(markup),
    ...checkEnvironments(lines),
    ...checkDisplayMath(lines),
    ...checkTrailingBackslash(lines),
    ...scan.escape_violations,
  ])];

  return {
    is_valid: syntaxErrors.length === 0,
    syntax_errors: syntaxErrors,
    quality_score: scoreQuality(scan, syntaxErrors.length, hazards.length, policy),
    section_count: scan.section_count,
    bullet_count: scan.bullet_count,
  };
}
