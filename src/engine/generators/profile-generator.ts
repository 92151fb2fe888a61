/**
 * Deterministic, offline content generator. Lays the candidate profile out as
 * resume content and moves the skills the job description mentions to the
 * front of each group. Used when no LLM provider is configured.
 */

import { boundedPattern, normalizeTerm } from '../text.js';
import type { CandidateProfile, ResumeContent } from '../schemas.js';
import type { ContentGenerator, GenerationRequest } from '../types.js';

function mentions(normalizedSpec: string, skill: string): boolean {
  const key = normalizeTerm(skill);
  return key.length > 0 && boundedPattern(key, '').test(normalizedSpec);
}

function buildSummary(candidate: CandidateProfile, relevant: string[]): string {
  const base = candidate.summary?.trim()
    || `${candidate.experience[0]?.title ?? 'Professional'} with experience at ${candidate.experience.map((e) => e.company).join(', ')}.`;
  return relevant.length > 0 ? `${base} Relevant skills: ${relevant.join(', ')}.` : base;
}

export function buildProfileContent(candidate: CandidateProfile, specificationText: string): ResumeContent {
  const normalizedSpec = normalizeTerm(specificationText);
  const relevant: string[] = [];
  const skills: Record<string, string[]> = {};

  for (const [group, items] of Object.entries(candidate.skills)) {
    const matched = items.filter((item) => mentions(normalizedSpec, item));
    relevant.push(...matched);
    skills[group] = [...matched, ...items.filter((item) => !matched.includes(item))];
  }

  return {
    personal_info: { name: candidate.name, email: candidate.email, phone: candidate.phone },
    professional_summary: buildSummary(candidate, relevant),
    experience: candidate.experience.map((e) => ({ ...e, bullets: [...e.bullets] })),
    projects: candidate.projects.map((p) => ({ ...p, bullets: [...p.bullets] })),
    skills,
    education: candidate.education.map((e) => ({ ...e })),
  };
}

export function createProfileGenerator(): ContentGenerator {
  return {
    async generate(request: GenerationRequest): Promise<ResumeContent> {
      return buildProfileContent(request.candidate, request.specification_text);
    },
  };
}
