/**
 * Execution report: the serialized audit trail of one run.
 *
 * Field names and nesting are a contract with downstream parsers. Any
 * incompatible change must bump `REPORT_SCHEMA_VERSION`.
 */

import { z } from 'zod';
import { formatIssues } from '../lib/validate.js';
import { ReportFormatError } from './errors.js';
import { ResumeContentSchema } from './schemas.js';
import { STANDARD_NAMES, type ExecutionResult } from './types.js';

export const REPORT_SCHEMA_VERSION = 1;

const StandardNameSchema = z.enum(STANDARD_NAMES);

export const ComplianceReportSchema = z.object({
  overall_score: z.number().min(0).max(100),
  section_scores: z.record(z.string(), z.number().min(0).max(100)),
  present_terms: z.array(z.string()),
  missing_terms: z.array(z.string()),
  blocking_issues: z.array(z.string()),
});

export const StructureReportSchema = z.object({
  is_valid: z.boolean(),
  syntax_errors: z.array(z.string()),
  quality_score: z.number().min(0).max(100),
  section_count: z.number().int().min(0),
  bullet_count: z.number().int().min(0),
});

export const IterationRecordSchema = z.object({
  index: z.number().int().min(0),
  compliance_report: ComplianceReportSchema,
  structure_report: StructureReportSchema,
  checklist: z.object({
    ats_score_met: z.boolean(),
    keywords_complete: z.boolean(),
    latex_valid: z.boolean(),
    pdf_quality_met: z.boolean(),
    no_blocking_issues: z.boolean(),
  }),
  decision: z.enum(['PASS', 'CONTINUE']),
  feedback_text: z.string().nullable(),
  waived_standards: z.array(StandardNameSchema),
  generation_error: z.string().nullable(),
  scoring_errors: z.array(z.string()),
  duration_ms: z.number().min(0),
});

export const ExecutionReportSchema = z.object({
  schema_version: z.literal(REPORT_SCHEMA_VERSION),
  final_status: z.enum(['pass', 'fail']),
  termination_reason: z.enum(['pass', 'max_iterations', 'cancelled']),
  total_iterations: z.number().int().min(0),
  elapsed_time_ms: z.number().min(0),
  iterations: z.array(IterationRecordSchema),
  final_draft: z.object({
    content: ResumeContentSchema,
    markup: z.string(),
  }).nullable(),
}).refine((report) => report.total_iterations === report.iterations.length, {
  message: 'total_iterations must equal the number of iteration records',
  path: ['total_iterations'],
});

export type ExecutionReport = z.infer<typeof ExecutionReportSchema>;

export function toExecutionReport(result: ExecutionResult): ExecutionReport {
  return {
    schema_version: REPORT_SCHEMA_VERSION,
    final_status: result.final_status,
    termination_reason: result.termination_reason,
    total_iterations: result.total_iterations,
    elapsed_time_ms: result.elapsed_time_ms,
    iterations: result.iterations.map((record) => ({
      index: record.index,
      compliance_report: record.compliance_report,
      structure_report: record.structure_report,
      checklist: record.checklist,
      decision: record.decision,
      feedback_text: record.feedback_text,
      waived_standards: [...record.waived_standards],
      generation_error: record.generation_error,
      scoring_errors: [...record.scoring_errors],
      duration_ms: record.duration_ms,
    })),
    final_draft: result.final_draft
      ? { content: result.final_draft.content, markup: result.final_draft.markup }
      : null,
  };
}

/**
 * Parses and validates a serialized report (a JSON string or an already
 * decoded value).
 */
export function parseExecutionReport(input: unknown): ExecutionReport {
  let value: unknown = input;
  if (typeof input === 'string') {
    try {
      value = JSON.parse(input);
    } catch (err) {
      throw new ReportFormatError(`Execution report is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  const parsed = ExecutionReportSchema.safeParse(value);
  if (!parsed.success) {
    throw new ReportFormatError(`Invalid execution report: ${formatIssues(parsed.error.issues).join('; ')}`);
  }
  return parsed.data;
}
