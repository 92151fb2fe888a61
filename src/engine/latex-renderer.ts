/**
 * Renders structured resume content into a single-column, ATS-safe LaTeX
 * document. Every piece of user text passes through `escapeLatex`.
 */

import type { EducationEntry, ExperienceEntry, ProjectEntry, ResumeContent } from './schemas.js';
import type { Renderer } from './types.js';

const PREAMBLE = String.raw`\documentclass[11pt]{article}
\usepackage[margin=0.6in]{geometry}
\usepackage{enumitem}
\usepackage{hyperref}
\usepackage{titlesec}

\titleformat{\section}{\large\bfseries}{}{0em}{}[\titlerule]
\titlespacing{\section}{0pt}{10pt}{6pt}
\setlist{nosep}
\pagestyle{empty}`;

const LATEX_SPECIALS: Readonly<Record<string, string>> = {
  '\\': '\\textbackslash{}',
  '&': '\\&',
  '%': '\\%',
  '$': '\\$',
  '#': '\\#',
  '_': '\\_',
  '{': '\\{',
  '}': '\\}',
  '~': '\\textasciitilde{}',
  '^': '\\textasciicircum{}',
};

export function escapeLatex(text: string): string {
  let out = '';
  for (const ch of text) {
    out += LATEX_SPECIALS[ch] ?? ch;
  }
  return out;
}

function itemize(items: readonly string[]): string[] {
  const bullets = items.map((item) => item.trim()).filter(Boolean);
  if (bullets.length === 0) return [];
  return ['\\begin{itemize}', ...bullets.map((b) => `  \\item ${escapeLatex(b)}`), '\\end{itemize}'];
}

function renderHeader(content: ResumeContent): string[] {
  const { name, email, phone } = content.personal_info;
  const contact = [email, phone].map((part) => part.trim()).filter(Boolean).map(escapeLatex);
  return [
    '\\begin{center}',
    `  {\\LARGE\\textbf{${escapeLatex(name)}}}\\\\[4pt]`,
    `  ${contact.join(' \\quad ')}`,
    '\\end{center}',
  ];
}

function renderExperience(entry: ExperienceEntry): string[] {
  const heading = [`\\textbf{${escapeLatex(entry.title)}} -- ${escapeLatex(entry.company)}`];
  if (entry.duration.trim()) heading.push(`\\hfill ${escapeLatex(entry.duration)}`);
  return [heading.join(' '), ...itemize(entry.bullets), ''];
}

function renderProject(entry: ProjectEntry): string[] {
  const description = entry.description?.trim() ?? '';
  const heading = description
    ? `\\textbf{${escapeLatex(entry.name)}} -- ${escapeLatex(description)}`
    : `\\textbf{${escapeLatex(entry.name)}}`;
  return [heading, ...itemize(entry.bullets), ''];
}

function renderEducation(entry: EducationEntry): string {
  const year = entry.year?.trim() ?? '';
  const dated = year ? ` \\hfill ${escapeLatex(year)}` : '';
  return `\\textbf{${escapeLatex(entry.degree)}} -- ${escapeLatex(entry.school)}${dated}\\par`;
}

export function renderLatex(content: ResumeContent): string {
  const body: string[] = [...renderHeader(content), ''];

  if (content.professional_summary.trim()) {
    body.push('\\section{Professional Summary}', escapeLatex(content.professional_summary.trim()), '');
  }

  if (content.experience.length > 0) {
    body.push('\\section{Professional Experience}');
    for (const entry of content.experience) body.push(...renderExperience(entry));
  }

  if (content.projects.length > 0) {
    body.push('\\section{Projects}');
    for (const entry of content.projects) body.push(...renderProject(entry));
  }

  const skillLines = Object.entries(content.skills)
    .filter(([, items]) => items.length > 0)
    .map(([group, items]) => `${group}: ${items.join(', ')}`);
  if (skillLines.length > 0) {
    body.push('\\section{Skills}', ...itemize(skillLines), '');
  }

  if (content.education.length > 0) {
    body.push('\\section{Education}', ...content.education.map(renderEducation), '');
  }

  return [PREAMBLE, '', '\\begin{document}', '', ...body, '\\end{document}', ''].join('\n');
}

export const latexRenderer: Renderer = { render: renderLatex };
