/**
 * ComplianceScorer: weighted, sectioned keyword coverage.
 *
 * Pure: the same scan and ranking always produce the same report.
 */

import type { AtsFinding } from './ats-rules.js';
import type { FrozenRefinementConfig } from './config.js';
import { boundedPattern, lightStem, normalizeTerm, round, tokenize } from './text.js';
import type { ComplianceReport, DocumentScan, RankedTerm } from './types.js';

export type CompliancePolicy = Pick<
  FrozenRefinementConfig,
  | 'section_weights'
  | 'section_coverage_targets'
  | 'required_sections'
  | 'high_importance_threshold'
  | 'high_importance_coverage_floor'
>;

/** Heading variants mapped to canonical section keys, in lookup order. */
export const SECTION_ALIASES: Readonly<Record<string, readonly string[]>> = {
  skills: ['skills', 'technical skills', 'core competencies', 'competencies', 'technologies', 'tech stack'],
  experience: ['experience', 'professional experience', 'work experience', 'employment', 'employment history', 'work history'],
  projects: ['projects', 'selected projects', 'key projects', 'personal projects'],
  summary: ['summary', 'professional summary', 'profile', 'objective', 'about'],
  education: ['education', 'academic background', 'certifications'],
};

export function canonicalSection(title: string, extraKeys: readonly string[] = []): string {
  const normalized = normalizeTerm(title);
  for (const [key, aliases] of Object.entries(SECTION_ALIASES)) {
    if (aliases.includes(normalized)) return key;
  }
  for (const key of extraKeys) {
    if (normalizeTerm(key) === normalized) return key;
  }
  for (const [key, aliases] of Object.entries(SECTION_ALIASES)) {
    if (aliases.some((alias) => boundedPattern(alias, '').test(normalized))) return key;
  }
  return normalized;
}

interface SectionIndex {
  normalized: string;
  stems: Set<string>;
}

function indexText(text: string): SectionIndex {
  const normalized = normalizeTerm(text);
  return {
    normalized,
    stems: new Set(tokenize(normalized).map((t) => lightStem(t.value))),
  };
}

export function termMatches(term: string, section: SectionIndex): boolean {
  const key = normalizeTerm(term);
  if (!key) return false;
  if (boundedPattern(key, '').test(section.normalized)) return true;
  return key.split(' ').every((word) => section.stems.has(lightStem(word)));
}

function sumImportance(terms: readonly RankedTerm[]): number {
  return terms.reduce((sum, t) => sum + t.importance, 0);
}

export function scoreCompliance(
  scan: DocumentScan,
  terms: readonly RankedTerm[],
  policy: CompliancePolicy,
  hazards: readonly AtsFinding[] = [],
): ComplianceReport {
  const weightKeys = Object.keys(policy.section_weights);

  // Several headings can map to one key (e.g. two experience sections).
  const merged = new Map<string, string[]>();
  for (const section of scan.sections) {
    const key = canonicalSection(section.title, weightKeys);
    const texts = merged.get(key) ?? [];
    texts.push(section.text);
    merged.set(key, texts);
  }
  const sections = new Map<string, SectionIndex>();
  for (const [key, texts] of merged) {
    sections.set(key, indexText(texts.join('\n')));
  }

  const searchable = sections.size > 0 ? [...sections.values()] : [indexText(scan.plain_text)];
  const present: RankedTerm[] = [];
  const missing: RankedTerm[] = [];
  for (const term of terms) {
    (searchable.some((s) => termMatches(term.text, s)) ? present : missing).push(term);
  }

  const totalImportance = sumImportance(terms);
  const sectionScores: Record<string, number> = {};
  let weighted = 0;
  let weightSum = 0;
  for (const key of weightKeys) {
    const weight = policy.section_weights[key] ?? 0;
    const index = sections.get(key);
    let score = 0;
    if (index && totalImportance > 0) {
      const coverage = sumImportance(terms.filter((t) => termMatches(t.text, index))) / totalImportance;
      const target = policy.section_coverage_targets[key] ?? 1;
      score = target > 0 ? Math.min(coverage / target, 1) * 100 : 100;
    }
    sectionScores[key] = round(score, 2);
    weighted += weight * score;
    weightSum += weight;
  }
  const overall = weightSum > 0 ? weighted / weightSum : 0;

  const blocking: string[] = [];
  if (terms.length === 0) {
    blocking.push('No terms could be extracted from the job description');
  }
  for (const required of policy.required_sections) {
    if (!sections.has(required)) {
      blocking.push(`Missing required section: ${required}`);
    }
  }
  const highImportance = terms.filter((t) => t.importance >= policy.high_importance_threshold);
  if (highImportance.length > 0) {
    const presentHigh = highImportance.filter((t) => present.includes(t));
    const coverage = sumImportance(presentHigh) / sumImportance(highImportance);
    if (coverage < policy.high_importance_coverage_floor) {
      const missingHigh = highImportance.filter((t) => !presentHigh.includes(t)).map((t) => t.text);
      blocking.push(
        `High-importance term coverage ${Math.round(coverage * 100)}% is below ${Math.round(policy.high_importance_coverage_floor * 100)}% (missing: ${missingHigh.join(', ')})`,
      );
    }
  }
  for (const hazard of hazards) {
    if (hazard.priority === 'high') {
      blocking.push(`ATS hazard: ${hazard.issue}`);
    }
  }

  return {
    overall_score: round(Math.min(100, Math.max(0, overall)), 2),
    section_scores: sectionScores,
    present_terms: present.map((t) => t.text),
    missing_terms: missing.map((t) => t.text),
    blocking_issues: blocking,
  };
}
