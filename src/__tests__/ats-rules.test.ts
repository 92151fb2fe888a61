import { describe, it, expect } from 'vitest';
import { runAtsHazardCheck } from '../engine/ats-rules.js';

describe('runAtsHazardCheck', () => {
  it('returns nothing for plain single-column markup', () => {
    const markup = '\\section{Skills}\n\\begin{itemize}\n  \\item Python\n\\end{itemize}';
    expect(runAtsHazardCheck(markup)).toEqual([]);
  });

  it('reports hazards in rule order with their priority', () => {
    const markup = [
      '\\textcolor{blue}{Test Candidate}',
      '\\includegraphics[width=2cm]{photo.png}',
      '\\begin{tabular}{ll}',
      'Python & SQL \\\\',
      '\\end{tabular}',
    ].join('\n');

    expect(runAtsHazardCheck(markup).map((f) => [f.issue, f.priority])).toEqual([
      ['Embedded graphics detected', 'high'],
      ['Table layout detected', 'high'],
      ['Coloured text detected', 'medium'],
    ]);
  });

  it('ignores commented-out constructs', () => {
    expect(runAtsHazardCheck('% \\includegraphics{photo.png}\nPlain text')).toEqual([]);
  });

  it('flags non-standard headings', () => {
    const findings = runAtsHazardCheck('\\section{Objective}\nTo grow.\n\\section*{Profile}\nEngineer.');
    expect(findings.map((f) => f.section)).toEqual(['summary', 'summary']);
    expect(findings[0].issue).toBe('Objective heading detected; use Professional Summary');
  });
});
