/**
 * Shared type definitions for the validation & convergence engine.
 *
 * Report fields are snake_case: they are serialized verbatim into the
 * execution report that downstream tooling parses.
 */

import type { ResumeContent, CandidateProfile } from './schemas.js';

// ─── Terms ───────────────────────────────────────────────────────────

export type TermCategory = 'skill' | 'tool' | 'qualification' | 'soft';

export interface RankedTerm {
  text: string;
  category: TermCategory;
  /** 0–1, higher means more salient in the job description */
  importance: number;
}

// ─── Drafts & scans ──────────────────────────────────────────────────

export interface Draft {
  readonly content: ResumeContent;
  readonly markup: string;
}

export interface ScannedSection {
  title: string;
  text: string;
}

export interface DocumentScan {
  plain_text: string;
  section_count: number;
  bullet_count: number;
  escape_violations: string[];
  sections: ScannedSection[];
}

// ─── Reports ─────────────────────────────────────────────────────────

export interface ComplianceReport {
  overall_score: number;
  section_scores: Record<string, number>;
  present_terms: string[];
  missing_terms: string[];
  blocking_issues: string[];
}

export interface StructureReport {
  is_valid: boolean;
  syntax_errors: string[];
  quality_score: number;
  section_count: number;
  bullet_count: number;
}

export const STANDARD_NAMES = [
  'ats_score_met',
  'keywords_complete',
  'latex_valid',
  'pdf_quality_met',
  'no_blocking_issues',
] as const;

export type StandardName = (typeof STANDARD_NAMES)[number];

export type StandardsChecklist = Record<StandardName, boolean>;

export type Decision = 'PASS' | 'CONTINUE';

export type StandardsOutcome =
  | {
      decision: 'PASS';
      checklist: StandardsChecklist;
      waived_standards: StandardName[];
    }
  | {
      decision: 'CONTINUE';
      checklist: StandardsChecklist;
      failed_standards: StandardName[];
      feedback_text: string;
    };

// ─── Rounds & runs ───────────────────────────────────────────────────

export interface IterationRecord {
  readonly index: number;
  readonly compliance_report: ComplianceReport;
  readonly structure_report: StructureReport;
  readonly checklist: StandardsChecklist;
  readonly decision: Decision;
  readonly feedback_text: string | null;
  readonly waived_standards: StandardName[];
  readonly generation_error: string | null;
  readonly scoring_errors: string[];
  readonly duration_ms: number;
}

export type FinalStatus = 'pass' | 'fail';
export type TerminationReason = 'pass' | 'max_iterations' | 'cancelled';

export interface ExecutionResult {
  readonly final_status: FinalStatus;
  readonly termination_reason: TerminationReason;
  readonly total_iterations: number;
  readonly iterations: readonly IterationRecord[];
  readonly elapsed_time_ms: number;
  readonly final_draft: Draft | null;
}

// ─── External collaborators ──────────────────────────────────────────

export interface GenerationRequest {
  specification_text: string;
  candidate: CandidateProfile;
  previous_feedback: string | null;
  round_index: number;
  signal: AbortSignal;
}

export interface ContentGenerator {
  generate(request: GenerationRequest): Promise<ResumeContent>;
}

export interface Renderer {
  render(content: ResumeContent): string;
}
