/**
 * StandardsEvaluator: the five quality standards and the hybrid-pass rule.
 *
 * Which standards may be waived is data (`STANDARD_POLICY` plus the
 * configured hard gates), not branching scattered through the controller.
 */

import type { FrozenRefinementConfig } from './config.js';
import {
  STANDARD_NAMES,
  type ComplianceReport,
  type RankedTerm,
  type StandardName,
  type StandardsChecklist,
  type StandardsOutcome,
  type StructureReport,
} from './types.js';

export type StandardsPolicy = Pick<
  FrozenRefinementConfig,
  'ats_score_threshold' | 'pdf_quality_threshold' | 'hybrid_policy' | 'keyword_match' | 'high_importance_threshold'
>;

export interface StandardsInput {
  compliance: ComplianceReport;
  structure: StructureReport;
  terms: readonly RankedTerm[];
}

interface StandardRule {
  label: string;
  /** Never waivable, whatever the configuration says. */
  hard_gate: boolean;
  check(input: StandardsInput, policy: StandardsPolicy): boolean;
  measure(input: StandardsInput, policy: StandardsPolicy): string;
}

function missingKeywords(input: StandardsInput, policy: StandardsPolicy): string[] {
  if (policy.keyword_match === 'all') return input.compliance.missing_terms;
  const importance = new Map(input.terms.map((t) => [t.text, t.importance]));
  return input.compliance.missing_terms.filter(
    (term) => (importance.get(term) ?? 0) >= policy.high_importance_threshold,
  );
}

export const STANDARD_POLICY: Readonly<Record<StandardName, StandardRule>> = {
  ats_score_met: {
    label: 'ATS score',
    hard_gate: true,
    check: (input, policy) => input.compliance.overall_score >= policy.ats_score_threshold,
    measure: (input, policy) => `${input.compliance.overall_score} (required ≥ ${policy.ats_score_threshold})`,
  },
  keywords_complete: {
    label: 'Keywords complete',
    hard_gate: false,
    check: (input, policy) => missingKeywords(input, policy).length === 0,
    measure: (input, policy) => {
      const missing = missingKeywords(input, policy);
      const scope = policy.keyword_match === 'all' ? 'terms' : 'high-importance terms';
      return `${missing.length} ${scope} missing (${missing.join(', ')})`;
    },
  },
  latex_valid: {
    label: 'LaTeX valid',
    hard_gate: true,
    check: (input) => input.structure.is_valid,
    measure: (input) => `${input.structure.syntax_errors.length} syntax error(s)`,
  },
  pdf_quality_met: {
    label: 'PDF quality',
    hard_gate: false,
    check: (input, policy) => input.structure.quality_score >= policy.pdf_quality_threshold,
    measure: (input, policy) => `${input.structure.quality_score} (required ≥ ${policy.pdf_quality_threshold})`,
  },
  no_blocking_issues: {
    label: 'No blocking issues',
    hard_gate: false,
    check: (input) => input.compliance.blocking_issues.length === 0,
    measure: (input) => `${input.compliance.blocking_issues.length} blocking issue(s)`,
  },
};

export function hardGates(policy: StandardsPolicy): Set<StandardName> {
  const gates = new Set<StandardName>(policy.hybrid_policy.hard_gates);
  for (const name of STANDARD_NAMES) {
    if (STANDARD_POLICY[name].hard_gate) gates.add(name);
  }
  return gates;
}

export function buildChecklist(input: StandardsInput, policy: StandardsPolicy): StandardsChecklist {
  return {
    ats_score_met: STANDARD_POLICY.ats_score_met.check(input, policy),
    keywords_complete: STANDARD_POLICY.keywords_complete.check(input, policy),
    latex_valid: STANDARD_POLICY.latex_valid.check(input, policy),
    pdf_quality_met: STANDARD_POLICY.pdf_quality_met.check(input, policy),
    no_blocking_issues: STANDARD_POLICY.no_blocking_issues.check(input, policy),
  };
}

export function buildFeedback(
  failed: readonly StandardName[],
  input: StandardsInput,
  policy: StandardsPolicy,
): string {
  const lines = ['The previous draft did not meet these standards:'];
  for (const name of failed) {
    const rule = STANDARD_POLICY[name];
    lines.push(`- ${rule.label}: ${rule.measure(input, policy)}`);
  }
  if (input.compliance.missing_terms.length > 0) {
    lines.push('', `Missing terms: ${input.compliance.missing_terms.join(', ')}`);
  }
  if (input.structure.syntax_errors.length > 0) {
    lines.push('', 'Syntax errors:', ...input.structure.syntax_errors.map((e) => `- ${e}`));
  }
  if (input.compliance.blocking_issues.length > 0) {
    lines.push('', 'Blocking issues:', ...input.compliance.blocking_issues.map((b) => `- ${b}`));
  }
  return lines.join('\n');
}

export function evaluateStandards(input: StandardsInput, policy: StandardsPolicy): StandardsOutcome {
  const checklist = buildChecklist(input, policy);
  const failed = STANDARD_NAMES.filter((name) => !checklist[name]);

  if (failed.length === 0) {
    return { decision: 'PASS', checklist, waived_standards: [] };
  }

  const gates = hardGates(policy);
  const { enabled, allowed_failures } = policy.hybrid_policy;
  if (enabled && failed.length <= allowed_failures && failed.every((name) => !gates.has(name))) {
    return { decision: 'PASS', checklist, waived_standards: failed };
  }

  return {
    decision: 'CONTINUE',
    checklist,
    failed_standards: failed,
    feedback_text: buildFeedback(failed, input, policy),
  };
}
