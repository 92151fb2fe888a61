import { describe, it, expect } from 'vitest';
import { scanDocument } from '../engine/document-scanner.js';
import { scoreQuality, validateStructure } from '../engine/structure-validator.js';
import { createConfig } from '../engine/config.js';
import type { DocumentScan } from '../engine/types.js';

const policy = createConfig().structure;

function doc(body: string[]): string {
  return ['\\documentclass{article}', '\\begin{document}', ...body, '\\end{document}'].join('\n');
}

function validate(markup: string) {
  return validateStructure(markup, scanDocument(markup), policy);
}

function scanWith(sectionCount: number, bulletCount: number): DocumentScan {
  return {
    plain_text: 'content',
    section_count: sectionCount,
    bullet_count: bulletCount,
    escape_violations: [],
    sections: [],
  };
}

describe('validateStructure', () => {
  it('accepts a well-formed document in the target shape', () => {
    const body = ['Summary', 'Experience', 'Projects', 'Skills'].flatMap((title) => [
      `\\section{${title}}`,
      '\\begin{itemize}',
      '  \\item First point',
      '  \\item Second point',
      '\\end{itemize}',
    ]);

    const report = validate(doc(body));

    expect(report).toEqual({
      is_valid: true,
      syntax_errors: [],
      quality_score: 100,
      section_count: 4,
      bullet_count: 8,
    });
  });

  it('reports mismatched and unclosed environments', () => {
    const markup = [
      '\\documentclass{article}',
      '\\begin{document}',
      '\\begin{itemize}',
      '\\item One',
      '\\end{enumerate}',
      '\\end{document}',
    ].join('\n');

    const report = validate(markup);

    expect(report.is_valid).toBe(false);
    expect(report.syntax_errors).toEqual([
      '\\end{enumerate} at line 5 has no matching \\begin{enumerate}',
      "Environment 'itemize' opened at line 3 is not closed before \\end{document} at line 6",
    ]);
    // 100 - 30 (no sections) - 20 (no bullets per section) - 20 (two errors)
    expect(report.quality_score).toBe(30);
  });

  it('re-surfaces an unmatched opening brace from the scanner', () => {
    const report = validate(doc(['\\textbf{Open']));

    expect(report.is_valid).toBe(false);
    expect(report.syntax_errors).toEqual(["Unmatched '{' opened at line 3"]);
  });

  it('checks the skeleton, display math and trailing backslashes', () => {
    const markup = ['Intro \\[ x', 'Line ends badly \\', 'ok \\\\[2pt]'].join('\n');

    const report = validate(markup);

    expect(report.syntax_errors).toEqual([
      'Missing \\documentclass declaration',
      'Missing \\begin{document}',
      'Missing \\end{document}',
      "Unmatched '\\[' opened at line 1",
      'Line 2 ends with a single backslash',
    ]);
    expect(report.quality_score).toBe(10);
  });

  it('scores an empty document at zero without throwing', () => {
    const report = validate('');
    expect(report.quality_score).toBe(0);
    expect(report.is_valid).toBe(false);
  });

  it('returns the same report for the same markup', () => {
    const markup = doc(['\\section{Skills}', '\\begin{itemize}', '  \\item Python & SQL', '\\end{itemize}']);
    expect(validate(markup)).toEqual(validate(markup));
  });
});

describe('scoreQuality', () => {
  it('caps penalties for too many sections, dense bullets and ATS hazards', () => {
    // 100 - 10 (two extra sections) - 10 (density 10) - 9 (four hazards, capped)
    expect(scoreQuality(scanWith(9, 90), 0, 4, policy)).toBe(71);
  });

  it('scales the sparse-bullet penalty with the shortfall', () => {
    // 100 - 10 (one missing section) - 10 (density 1 of 2)
    expect(scoreQuality(scanWith(3, 3), 0, 0, policy)).toBe(80);
  });

  it('caps the syntax error penalty at 40', () => {
    expect(scoreQuality(scanWith(5, 10), 12, 0, policy)).toBe(60);
  });
});
