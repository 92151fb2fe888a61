import { z } from 'zod';

// ─── Candidate profile (run input) ───────────────────────────────────

export const ExperienceEntrySchema = z.object({
  title: z.string().min(1),
  company: z.string().min(1),
  duration: z.string().default(''),
  bullets: z.array(z.string().min(1)).default([]),
});

export const ProjectEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  bullets: z.array(z.string().min(1)).default([]),
});

export const EducationEntrySchema = z.object({
  degree: z.string().min(1),
  school: z.string().min(1),
  year: z.string().optional(),
});

export const SkillGroupsSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

export const CandidateProfileSchema = z.object({
  name: z.string().min(1),
  email: z.string().email(),
  phone: z.string().min(1),
  summary: z.string().optional(),
  experience: z.array(ExperienceEntrySchema).min(1),
  projects: z.array(ProjectEntrySchema).default([]),
  skills: SkillGroupsSchema.refine((groups) => Object.keys(groups).length > 0, {
    message: 'At least one skill group is required',
  }),
  education: z.array(EducationEntrySchema).default([]),
});

export type CandidateProfileInput = z.input<typeof CandidateProfileSchema>;
export type CandidateProfile = z.infer<typeof CandidateProfileSchema>;

// ─── Resume content (generator output) ───────────────────────────────

export const ResumeContentSchema = z.object({
  personal_info: z.object({
    name: z.string().min(1),
    email: z.string(),
    phone: z.string(),
  }),
  professional_summary: z.string().default(''),
  experience: z.array(ExperienceEntrySchema).default([]),
  projects: z.array(ProjectEntrySchema).default([]),
  skills: SkillGroupsSchema.default({}),
  education: z.array(EducationEntrySchema).default([]),
});

export type ResumeContent = z.infer<typeof ResumeContentSchema>;
export type ExperienceEntry = z.infer<typeof ExperienceEntrySchema>;
export type ProjectEntry = z.infer<typeof ProjectEntrySchema>;
export type EducationEntry = z.infer<typeof EducationEntrySchema>;
