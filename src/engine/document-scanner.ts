/**
 * DocumentScanner: single-pass tokenizer over LaTeX markup.
 *
 * Produces the visible text (what an ATS would read), the section split,
 * section/bullet counts and escaping problems. Never throws: malformed input
 * yields a partial scan with `escape_violations` filled in.
 */

import type { DocumentScan, ScannedSection } from './types.js';

const BEGIN_DOCUMENT = '\\begin{document}';
const END_DOCUMENT = '\\end{document}';

/** Environments in which `&` is a column separator. */
const ALIGNMENT_ENVS = new Set([
  'tabular', 'tabular*', 'tabularx', 'longtable', 'array',
  'align', 'align*', 'alignat', 'alignat*', 'eqnarray', 'eqnarray*',
  'matrix', 'pmatrix', 'bmatrix', 'vmatrix', 'cases', 'split',
]);

const MATH_ENVS = new Set([
  'math', 'displaymath', 'equation', 'equation*', 'align', 'align*',
  'alignat', 'alignat*', 'gather', 'gather*', 'multline', 'multline*',
  'eqnarray', 'eqnarray*',
]);

/** Environments whose first brace group is a column spec, not content. */
const COLUMN_SPEC_ENVS = new Set(['tabular', 'tabularx', 'longtable', 'array']);

/** Commands whose leading brace arguments carry no visible text. */
const HIDDEN_ARGUMENTS: Readonly<Record<string, number>> = {
  documentclass: 1,
  usepackage: 1,
  pagestyle: 1,
  thispagestyle: 1,
  vspace: 1,
  hspace: 1,
  label: 1,
  ref: 1,
  includegraphics: 1,
  href: 1,
  hypersetup: 1,
  color: 1,
  textcolor: 1,
  setlength: 2,
  addtolength: 2,
  newcommand: 2,
  renewcommand: 2,
  definecolor: 3,
  titleformat: 2,
};

type GroupKind = 'plain' | 'hidden' | 'section-title';

interface OpenGroup {
  kind: GroupKind;
  line: number;
  /** Hidden arguments still owed to the command that opened this group. */
  remaining: number;
}

interface SectionMark {
  titleStart: number;
  titleEnd: number;
}

function buildLineIndex(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') starts.push(i + 1);
  }
  return starts;
}

function lineAt(starts: number[], offset: number): number {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (starts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}

function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z]/.test(ch);
}

function hasContentBefore(text: string, lineStart: number, offset: number): boolean {
  return text.slice(lineStart, offset).trim().length > 0;
}

export function scanDocument(markup: string): DocumentScan {
  const text = markup ?? '';
  const lines = buildLineIndex(text);
  const beginIdx = text.indexOf(BEGIN_DOCUMENT);
  const endIdx = text.indexOf(END_DOCUMENT, beginIdx < 0 ? 0 : beginIdx);
  const bodyStart = beginIdx < 0 ? 0 : beginIdx + BEGIN_DOCUMENT.length;
  const bodyEnd = endIdx < 0 ? text.length : endIdx;

  const violations: string[] = [];
  const groups: OpenGroup[] = [];
  const envStack: string[] = [];
  const sectionMarks: SectionMark[] = [];
  let plain = '';
  let bulletCount = 0;
  let pendingHidden = 0;
  let pendingSection = false;
  let inlineMath: { line: number; display: boolean } | null = null;
  let bracketMath = 0;

  const inBody = (offset: number): boolean => offset >= bodyStart && offset < bodyEnd;
  const hidden = (): boolean => groups.some((g) => g.kind === 'hidden');
  const inMath = (): boolean => inlineMath !== null || bracketMath > 0 || envStack.some((e) => MATH_ENVS.has(e));
  const inAlignment = (): boolean => envStack.some((e) => ALIGNMENT_ENVS.has(e));
  const emit = (offset: number, value: string): void => {
    if (inBody(offset) && !hidden()) plain += value;
  };
  const flag = (offset: number, message: string): void => {
    if (inBody(offset) && !hidden()) violations.push(message);
  };

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const line = lineAt(lines, i);

    if (ch === '%') {
      if (inBody(i) && hasContentBefore(text, lines[line - 1], i)) {
        flag(i, `Unescaped '%' at line ${line} comments out the rest of the line`);
      }
      const newline = text.indexOf('\n', i);
      i = newline < 0 ? text.length : newline;
      continue;
    }

    if (ch === '\\') {
      const next = text[i + 1];
      if (isLetter(next)) {
        let j = i + 1;
        while (isLetter(text[j])) j++;
        let name = text.slice(i + 1, j);
        if (text[j] === '*') {
          name += '*';
          j++;
        }

        if (name === 'begin' || name === 'end') {
          const envMatch = /^\s*\{([^{}]*)\}/.exec(text.slice(j));
          if (envMatch) {
            const env = envMatch[1].trim();
            j += envMatch[0].length;
            if (name === 'begin') {
              envStack.push(env);
              if (COLUMN_SPEC_ENVS.has(env)) pendingHidden = 1;
            } else {
              const at = envStack.lastIndexOf(env);
              if (at >= 0) envStack.splice(at, 1);
            }
            emit(i, '\n');
            i = j;
            continue;
          }
        }

        pendingHidden = HIDDEN_ARGUMENTS[name] ?? 0;
        if ((name === 'section' || name === 'section*') && inBody(i)) {
          pendingSection = true;
          emit(i, '\n');
        } else if (name === 'item') {
          if (inBody(i)) bulletCount++;
          emit(i, '\n');
        } else if (name === 'par' || name === 'newline' || name === 'linebreak') {
          emit(i, '\n');
        }
        // Optional arguments never carry visible text.
        const optional = /^\[[^\]]*\]/.exec(text.slice(j));
        if (optional) j += optional[0].length;
        i = j;
        continue;
      }

      if (next === '\\') {
        emit(i, '\n');
        const spacing = /^\[[^\]]*\]/.exec(text.slice(i + 2));
        i += 2 + (spacing ? spacing[0].length : 0);
        continue;
      }
      if (next === '[') {
        bracketMath++;
        i += 2;
        continue;
      }
      if (next === ']') {
        bracketMath = Math.max(0, bracketMath - 1);
        i += 2;
        continue;
      }
      if (next === '(' || next === ')') {
        bracketMath = Math.max(0, bracketMath + (next === '(' ? 1 : -1));
        i += 2;
        continue;
      }
      if (next !== undefined && '%&#_${}'.includes(next)) {
        emit(i, next);
        i += 2;
        continue;
      }
      // Spacing commands like `\,` and `\ `.
      if (next !== undefined && ' ,;:!'.includes(next)) emit(i, ' ');
      i += next === undefined ? 1 : 2;
      continue;
    }

    if (ch === '{') {
      let kind: GroupKind = 'plain';
      let remaining = 0;
      if (pendingHidden > 0) {
        kind = 'hidden';
        remaining = pendingHidden - 1;
        pendingHidden = 0;
      } else if (pendingSection) {
        kind = 'section-title';
        pendingSection = false;
        sectionMarks.push({ titleStart: plain.length, titleEnd: plain.length });
      }
      groups.push({ kind, line, remaining });
      i++;
      continue;
    }

    if (ch === '}') {
      const open = groups.pop();
      if (!open) {
        violations.push(`Unmatched '}' at line ${line}`);
      } else if (open.kind === 'hidden') {
        pendingHidden = open.remaining;
      } else if (open.kind === 'section-title') {
        const mark = sectionMarks[sectionMarks.length - 1];
        if (mark) mark.titleEnd = plain.length;
        emit(i, '\n');
      }
      i++;
      continue;
    }

    if (!/\s/.test(ch)) {
      pendingHidden = 0;
      pendingSection = false;
    }

    if (ch === '$') {
      const display = text[i + 1] === '$';
      if (inlineMath && inlineMath.display === display) {
        inlineMath = null;
      } else if (!inlineMath && inBody(i) && !hidden()) {
        inlineMath = { line, display };
      }
      i += display ? 2 : 1;
      continue;
    }

    if (ch === '&' && !inAlignment()) {
      flag(i, `Unescaped '&' at line ${line}`);
    } else if (ch === '#') {
      flag(i, `Unescaped '#' at line ${line}`);
    } else if (ch === '_' && !inMath()) {
      flag(i, `Unescaped '_' outside math at line ${line}`);
    }

    if (ch === '~') emit(i, ' ');
    else if (ch !== '&' || !inAlignment()) emit(i, ch);
    else emit(i, ' ');
    i++;
  }

  if (inlineMath) {
    violations.push(`Unmatched '$' opened at line ${inlineMath.line}`);
  }
  for (const open of groups) {
    violations.push(`Unmatched '{' opened at line ${open.line}`);
  }

  const sections: ScannedSection[] = sectionMarks.map((mark, index) => {
    const nextStart = sectionMarks[index + 1]?.titleStart ?? plain.length;
    return {
      title: collapse(plain.slice(mark.titleStart, mark.titleEnd)),
      text: collapse(plain.slice(mark.titleEnd, nextStart)),
    };
  });

  return {
    plain_text: collapse(plain),
    section_count: sectionMarks.length,
    bullet_count: bulletCount,
    escape_violations: violations,
    sections,
  };
}

function collapse(value: string): string {
  return value
    .split('\n')
    .map((l) => l.replace(/[ \t]+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');
}
