/**
 * ATS rules for rendered LaTeX.
 * Machine-checkable constraints on constructs that applicant tracking systems
 * cannot read once the document is compiled to PDF.
 */

export interface AtsFinding {
  section: string;
  issue: string;
  instruction: string;
  priority: 'high' | 'medium';
}

export const ATS_RULEBOOK_SNIPPET = `ATS RULES (MANDATORY):
- Standard section headers only (Professional Summary, Professional Experience, Projects, Skills, Education)
- No tables, no columns, no graphics, no icons, no coloured text
- Contact details as plain text at the top of the document
- Plain bullets and straightforward reverse chronology
- Keyword-rich but natural language; do not keyword-stuff
- Quantify impact where the source material supports it; never invent numbers`;

const HAZARDS: Array<{ re: RegExp; message: string; section: string; priority: AtsFinding['priority'] }> = [
  { re: /\\includegraphics\b/, message: 'Embedded graphics detected', section: 'formatting', priority: 'high' },
  { re: /\\begin\{(?:tabular\*?|tabularx|longtable)\}/, message: 'Table layout detected', section: 'formatting', priority: 'high' },
  { re: /\\(?:begin\{tikzpicture\}|tikz\b|usepackage(?:\[[^\]]*\])?\{(?:tikz|pgf)\})/, message: 'TikZ/PGF drawing detected', section: 'formatting', priority: 'high' },
  { re: /\\begin\{multicols\*?\}|\\usepackage(?:\[[^\]]*\])?\{multicol\}/, message: 'Multi-column layout detected', section: 'formatting', priority: 'medium' },
  { re: /\\(?:textcolor|color|colorbox)\b/, message: 'Coloured text detected', section: 'formatting', priority: 'medium' },
  { re: /\\fa[A-Z][A-Za-z]*\b|\\faIcon\b/, message: 'Icon font glyphs detected', section: 'formatting', priority: 'medium' },
  { re: /\\section\*?\{\s*Objective\s*\}/i, message: 'Objective heading detected; use Professional Summary', section: 'summary', priority: 'medium' },
  { re: /\\section\*?\{\s*Profile\s*\}/i, message: 'Non-standard heading "Profile" detected', section: 'summary', priority: 'medium' },
];

function stripComments(markup: string): string {
  return markup
    .split('\n')
    .map((line) => line.replace(/(^|[^\\])%.*$/, '$1'))
    .join('\n');
}

export function runAtsHazardCheck(markup: string): AtsFinding[] {
  const text = stripComments(markup ?? '');
  const findings: AtsFinding[] = [];

  for (const rule of HAZARDS) {
    if (rule.re.test(text)) {
      findings.push({
        section: rule.section,
        issue: rule.message,
        instruction: 'Rewrite the affected content using ATS-safe plain text formatting only.',
        priority: rule.priority,
      });
    }
  }

  return findings;
}
