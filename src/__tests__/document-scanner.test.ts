import { describe, it, expect } from 'vitest';
import { scanDocument } from '../engine/document-scanner.js';

describe('scanDocument', () => {
  it('recovers visible text, sections and bullets', () => {
    const markup = [
      '\\documentclass{article}',
      '\\begin{document}',
      '\\section{Skills}',
      '\\begin{itemize}',
      '  \\item Python \\& SQL',
      '  \\item \\textbf{Docker}',
      '\\end{itemize}',
      '\\section*{Experience}',
      'Built pipelines at \\href{https://example.com/a_b}{Acme Corp}.',
      '\\end{document}',
    ].join('\n');

    const scan = scanDocument(markup);

    expect(scan.plain_text).toBe('Skills\nPython & SQL\nDocker\nExperience\nBuilt pipelines at Acme Corp.');
    expect(scan.section_count).toBe(2);
    expect(scan.bullet_count).toBe(2);
    expect(scan.escape_violations).toEqual([]);
    expect(scan.sections).toEqual([
      { title: 'Skills', text: 'Python & SQL\nDocker' },
      { title: 'Experience', text: 'Built pipelines at Acme Corp.' },
    ]);
  });

  it('flags unescaped special characters with line numbers', () => {
    const markup = [
      '\\documentclass{article}',
      '\\begin{document}',
      'Grew revenue 20% YoY',
      'R&D lead',
      'Issue #42',
      'snake_case names',
      '% a full-line comment is fine',
      'Cost $5 per unit',
      '\\end{document}',
    ].join('\n');

    expect(scanDocument(markup).escape_violations).toEqual([
      "Unescaped '%' at line 3 comments out the rest of the line",
      "Unescaped '&' at line 4",
      "Unescaped '#' at line 5",
      "Unescaped '_' outside math at line 6",
      "Unmatched '$' opened at line 8",
    ]);
  });

  it('reports unmatched braces', () => {
    expect(scanDocument('\\begin{document}\n\\textbf{Unclosed\n\\end{document}').escape_violations)
      .toEqual(["Unmatched '{' opened at line 2"]);
    expect(scanDocument('\\begin{document}\nStray } here\n\\end{document}').escape_violations)
      .toEqual(["Unmatched '}' at line 2"]);
  });

  it('allows underscores in math and ampersands in tables', () => {
    const markup = [
      '\\begin{document}',
      'Accuracy $x_1$ improved',
      '\\begin{tabular}{ll}',
      'a & b \\\\',
      '\\end{tabular}',
      '\\end{document}',
    ].join('\n');

    expect(scanDocument(markup).escape_violations).toEqual([]);
  });

  it('treats the whole input as body when there is no document environment', () => {
    const scan = scanDocument('Plain 50% text');
    expect(scan.plain_text).toBe('Plain 50');
    expect(scan.escape_violations).toEqual(["Unescaped '%' at line 1 comments out the rest of the line"]);
  });

  it('hides every argument of a layout command even when one holds a command', () => {
    const scan = scanDocument([
      '\\documentclass{article}',
      '\\begin{document}',
      '\\setlength{\\itemsep}{2pt}',
      '\\newcommand{\\role}{Engineer}',
      '\\section{Skills}',
      'Python',
      '\\end{document}',
    ].join('\n'));

    expect(scan.plain_text).toBe('Skills\nPython');
    expect(scan.sections).toEqual([{ title: 'Skills', text: 'Python' }]);
  });

  it('never throws on malformed input', () => {
    expect(scanDocument('\\')).toEqual({
      plain_text: '',
      section_count: 0,
      bullet_count: 0,
      escape_violations: [],
      sections: [],
    });
    expect(scanDocument('{{{').escape_violations).toHaveLength(3);
  });
});
