import { ATS_RULEBOOK_SNIPPET } from '../ats-rules.js';
import type { GenerationRequest } from '../types.js';

export const RESUME_SYSTEM_PROMPT = `You are an expert resume writer who tailors a candidate's real experience to a specific job description.

${ATS_RULEBOOK_SNIPPET}

CONTENT RULES:
- Use only facts present in the candidate profile. Reword and reorder them; never invent employers, titles, dates, degrees or metrics.
- Mirror the job description's terminology where the candidate genuinely has the skill.
- Every experience entry gets 2-6 bullets that start with a strong action verb.
- The skills section lists the job-relevant skills first.
- The professional summary is 2-4 sentences.

OUTPUT FORMAT:
Return ONLY a JSON object, no markdown fences, with exactly this shape:
{
  "personal_info": { "name": "", "email": "", "phone": "" },
  "professional_summary": "",
  "experience": [{ "title": "", "company": "", "duration": "", "bullets": [""] }],
  "projects": [{ "name": "", "description": "", "bullets": [""] }],
  "skills": { "Category": ["skill"] },
  "education": [{ "degree": "", "school": "", "year": "" }]
}`;

export function buildResumeUserPrompt(request: GenerationRequest): string {
  const sections = [
    `## Job description\n${request.specification_text.trim()}`,
    `## Candidate profile (JSON)\n${JSON.stringify(request.candidate, null, 2)}`,
  ];

  if (request.previous_feedback) {
    sections.push(
      `## Feedback on draft ${request.round_index}\nThe previous draft was scored and rejected. Fix every point below while keeping everything that already worked.\n\n${request.previous_feedback}`,
    );
  }

  sections.push('Write the tailored resume now as the JSON object described in the instructions.');
  return sections.join('\n\n');
}
