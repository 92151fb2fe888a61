import { describe, it, expect } from 'vitest';
import { buildProfileContent, createProfileGenerator } from '../engine/generators/profile-generator.js';
import { CandidateProfileSchema } from '../engine/schemas.js';

const candidate = CandidateProfileSchema.parse({
  name: 'Test Candidate',
  email: 'candidate@example.com',
  phone: '555-0100',
  experience: [
    { title: 'Engineer', company: 'Example Co', duration: '2021-2024', bullets: ['Ran Python jobs'] },
    { title: 'Analyst', company: 'Other Inc', bullets: ['Wrote reports'] },
  ],
  skills: { Languages: ['Go', 'Python', 'SQL'], Tools: ['Vim', 'Docker'] },
});

describe('buildProfileContent', () => {
  it('moves skills named in the job description to the front of each group', () => {
    const content = buildProfileContent(candidate, 'Python and Docker experience');

    expect(content.skills).toEqual({
      Languages: ['Python', 'Go', 'SQL'],
      Tools: ['Docker', 'Vim'],
    });
  });

  it('derives a summary from the experience when the profile has none', () => {
    const content = buildProfileContent(candidate, 'Python and Docker experience');

    expect(content.professional_summary).toBe(
      'Engineer with experience at Example Co, Other Inc. Relevant skills: Python, Docker.',
    );
  });

  it('keeps the candidate summary when no skills match', () => {
    const content = buildProfileContent({ ...candidate, summary: 'Builds data tools.' }, 'Kotlin developer');

    expect(content.professional_summary).toBe('Builds data tools.');
    expect(content.skills.Languages).toEqual(['Go', 'Python', 'SQL']);
  });

  it('matches whole terms only', () => {
    const content = buildProfileContent(candidate, 'Experience with Golang services');
    expect(content.skills.Languages).toEqual(['Go', 'Python', 'SQL']);
  });

  it('copies profile entries rather than sharing them', () => {
    const content = buildProfileContent(candidate, 'Python');

    expect(content.personal_info).toEqual({ name: 'Test Candidate', email: 'candidate@example.com', phone: '555-0100' });
    expect(content.experience).toEqual(candidate.experience);
    expect(content.experience[0].bullets).not.toBe(candidate.experience[0].bullets);
  });
});

describe('createProfileGenerator', () => {
  it('ignores feedback and returns the same content every round', async () => {
    const generator = createProfileGenerator();
    const base = {
      specification_text: 'Python',
      candidate,
      signal: new AbortController().signal,
    };

    const first = await generator.generate({ ...base, previous_feedback: null, round_index: 0 });
    const second = await generator.generate({ ...base, previous_feedback: 'Add more keywords', round_index: 1 });

    expect(second).toEqual(first);
  });
});
