import { describe, it, expect } from 'vitest';
import { escapeLatex, renderLatex } from '../engine/latex-renderer.js';
import { scanDocument } from '../engine/document-scanner.js';
import { validateStructure } from '../engine/structure-validator.js';
import { createConfig } from '../engine/config.js';
import type { ResumeContent } from '../engine/schemas.js';

const content: ResumeContent = {
  personal_info: { name: 'Ana O_Neil', email: 'ana@example.com', phone: '555-0100' },
  professional_summary: 'Cut costs 30% & shipped C# tools',
  experience: [{
    title: 'Engineer',
    company: 'R&D Labs',
    duration: '2021-2024',
    bullets: ['Owned the $2M budget', 'Wrote {templated} docs #1'],
  }],
  projects: [],
  skills: { Languages: ['C++', 'C#'] },
  education: [{ degree: 'BSc', school: 'Example University' }],
};

describe('escapeLatex', () => {
  it('escapes every special character', () => {
    expect(escapeLatex('50% of R&D_costs $5 #1 {x}')).toBe('50\\% of R\\&D\\_costs \\$5 \\#1 \\{x\\}');
    expect(escapeLatex('~^')).toBe('\\textasciitilde{}\\textasciicircum{}');
    expect(escapeLatex('a\\b')).toBe('a\\textbackslash{}b');
  });

  it('leaves ordinary text alone', () => {
    expect(escapeLatex('Senior Engineer, 2019-2024')).toBe('Senior Engineer, 2019-2024');
  });
});

describe('renderLatex', () => {
  it('produces markup that validates cleanly even with special characters in the content', () => {
    const markup = renderLatex(content);
    const scan = scanDocument(markup);
    const report = validateStructure(markup, scan, createConfig().structure);

    expect(scan.escape_violations).toEqual([]);
    expect(report.syntax_errors).toEqual([]);
    expect(report.is_valid).toBe(true);
    expect(report.section_count).toBe(4);
    expect(report.bullet_count).toBe(3);
  });

  it('keeps the original text visible to the scanner', () => {
    const scan = scanDocument(renderLatex(content));

    expect(scan.sections).toEqual([
      { title: 'Professional Summary', text: 'Cut costs 30% & shipped C# tools' },
      {
        title: 'Professional Experience',
        text: 'Engineer -- R&D Labs 2021-2024\nOwned the $2M budget\nWrote {templated} docs #1',
      },
      { title: 'Skills', text: 'Languages: C++, C#' },
      { title: 'Education', text: 'BSc -- Example University' },
    ]);
  });

  it('omits empty sections and keeps the standard order', () => {
    const markup = renderLatex({
      ...content,
      projects: [{ name: 'Pipeline', description: 'ETL tooling', bullets: ['Scheduled nightly loads'] }],
    });
    const order = ['Professional Summary', 'Professional Experience', 'Projects', 'Skills', 'Education']
      .map((title) => markup.indexOf(`\\section{${title}}`));

    expect(order.every((at) => at > 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
    expect(renderLatex(content)).not.toContain('\\section{Projects}');
    expect(renderLatex({ ...content, education: [] })).not.toContain('\\section{Education}');
  });

  it('renders skill groups as bullets and contact details in the header', () => {
    const markup = renderLatex(content);
    expect(markup).toContain('  \\item Languages: C++, C\\#');
    expect(markup).toContain('  {\\LARGE\\textbf{Ana O\\_Neil}}\\\\[4pt]');
    expect(markup).toContain('  ana@example.com \\quad 555-0100');
    expect(markup.startsWith('\\documentclass[11pt]{article}')).toBe(true);
    expect(markup.endsWith('\\end{document}\n')).toBe(true);
  });
});
