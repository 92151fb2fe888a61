import { describe, it, expect } from 'vitest';
import { evaluateStandards, hardGates, STANDARD_POLICY, type StandardsInput } from '../engine/standards-evaluator.js';
import { createConfig, type RefinementConfigInput } from '../engine/config.js';
import type { ComplianceReport, RankedTerm, StructureReport } from '../engine/types.js';

const terms: RankedTerm[] = [
  { text: 'python', category: 'skill', importance: 1 },
  { text: 'teamwork', category: 'soft', importance: 0.42 },
];

function makeInput(
  compliance: Partial<ComplianceReport> = {},
  structure: Partial<StructureReport> = {},
): StandardsInput {
  return {
    terms,
    compliance: {
      overall_score: 95,
      section_scores: { skills: 100, experience: 90, projects: 95 },
      present_terms: ['python', 'teamwork'],
      missing_terms: [],
      blocking_issues: [],
      ...compliance,
    },
    structure: {
      is_valid: true,
      syntax_errors: [],
      quality_score: 90,
      section_count: 5,
      bullet_count: 12,
      ...structure,
    },
  };
}

function policy(overrides: RefinementConfigInput = {}) {
  return createConfig(overrides);
}

const strict = policy({ hybrid_policy: { enabled: false } });

describe('evaluateStandards', () => {
  it('passes when every standard holds', () => {
    const outcome = evaluateStandards(makeInput(), strict);
    expect(outcome).toEqual({
      decision: 'PASS',
      checklist: {
        ats_score_met: true,
        keywords_complete: true,
        latex_valid: true,
        pdf_quality_met: true,
        no_blocking_issues: true,
      },
      waived_standards: [],
    });
  });

  it('treats a score exactly at the threshold as met', () => {
    expect(evaluateStandards(makeInput({ overall_score: 90 }), strict).decision).toBe('PASS');
  });

  it('continues at 89.99 when the hybrid policy is disabled', () => {
    const outcome = evaluateStandards(makeInput({ overall_score: 89.99 }), strict);
    expect(outcome.decision).toBe('CONTINUE');
    if (outcome.decision === 'CONTINUE') {
      expect(outcome.failed_standards).toEqual(['ats_score_met']);
    }
  });

  it('waives exactly one secondary standard under the hybrid policy', () => {
    const outcome = evaluateStandards(makeInput({}, { quality_score: 80 }), policy());
    expect(outcome.decision).toBe('PASS');
    if (outcome.decision === 'PASS') {
      expect(outcome.waived_standards).toEqual(['pdf_quality_met']);
      expect(outcome.checklist.pdf_quality_met).toBe(false);
    }
  });

  it('never waives a hard gate', () => {
    expect(evaluateStandards(makeInput({ overall_score: 89.99 }), policy()).decision).toBe('CONTINUE');
    expect(evaluateStandards(makeInput({}, { is_valid: false, syntax_errors: ['x'] }), policy()).decision)
      .toBe('CONTINUE');
  });

  it('continues when more standards fail than the hybrid policy allows', () => {
    const outcome = evaluateStandards(
      makeInput({ blocking_issues: ['Missing required section: projects'] }, { quality_score: 80 }),
      policy(),
    );
    expect(outcome.decision).toBe('CONTINUE');
  });

  it('respects hard gates added through configuration', () => {
    const gated = policy({ hybrid_policy: { hard_gates: ['pdf_quality_met'] } });
    expect(evaluateStandards(makeInput({}, { quality_score: 80 }), gated).decision).toBe('CONTINUE');
  });

  it('only requires high-importance terms unless configured for the full set', () => {
    const input = makeInput({ present_terms: ['python'], missing_terms: ['teamwork'] });
    expect(evaluateStandards(input, strict).checklist.keywords_complete).toBe(true);

    const all = policy({ hybrid_policy: { enabled: false }, keyword_match: 'all' });
    expect(evaluateStandards(input, all).checklist.keywords_complete).toBe(false);
  });

  it('writes feedback listing every failure with its measured value', () => {
    const outcome = evaluateStandards(
      makeInput(
        {
          overall_score: 72.5,
          present_terms: ['teamwork'],
          missing_terms: ['python'],
          blocking_issues: ['Missing required section: skills'],
        },
        { is_valid: false, syntax_errors: ['Missing \\end{document}'], quality_score: 70 },
      ),
      policy(),
    );

    expect(outcome.decision).toBe('CONTINUE');
    if (outcome.decision !== 'CONTINUE') return;
    expect(outcome.failed_standards).toEqual([
      'ats_score_met',
      'keywords_complete',
      'latex_valid',
      'pdf_quality_met',
      'no_blocking_issues',
    ]);
    expect(outcome.feedback_text).toBe([
      'The previous draft did not meet these standards:',
      '- ATS score: 72.5 (required ≥ 90)',
      '- Keywords complete: 1 high-importance terms missing (python)',
      '- LaTeX valid: 1 syntax error(s)',
      '- PDF quality: 70 (required ≥ 85)',
      '- No blocking issues: 1 blocking issue(s)',
      '',
      'Missing terms: python',
      '',
      'Syntax errors:',
      '- Missing \\end{document}',
      '',
      'Blocking issues:',
      '- Missing required section: skills',
    ].join('\n'));
  });
});

describe('STANDARD_POLICY', () => {
  it('marks the ATS score and LaTeX validity as the only built-in hard gates', () => {
    const builtIn = Object.entries(STANDARD_POLICY).filter(([, rule]) => rule.hard_gate).map(([name]) => name);
    expect(builtIn).toEqual(['ats_score_met', 'latex_valid']);
    expect([...hardGates(policy())]).toEqual(['ats_score_met', 'latex_valid']);
  });
});
