/**
 * One-shot scoring of an already rendered document: rank, scan, score,
 * validate and decide, without any generation.
 */

import { runAtsHazardCheck, type AtsFinding } from './ats-rules.js';
import { scoreCompliance } from './compliance-scorer.js';
import type { FrozenRefinementConfig } from './config.js';
import { scanDocument } from './document-scanner.js';
import { evaluateStandards } from './standards-evaluator.js';
import { validateStructure } from './structure-validator.js';
import { rankTerms } from './term-ranker.js';
import type { ComplianceReport, RankedTerm, StandardsOutcome, StructureReport } from './types.js';

export interface DocumentScore {
  terms: RankedTerm[];
  compliance_report: ComplianceReport;
  structure_report: StructureReport;
  ats_findings: AtsFinding[];
  outcome: StandardsOutcome;
}

export function scoreDocument(
  specificationText: string,
  markup: string,
  config: FrozenRefinementConfig,
): DocumentScore {
  const terms = rankTerms(specificationText, { max_terms: config.max_terms });
  const scan = scanDocument(markup);
  const hazards = runAtsHazardCheck(markup);
  const compliance = scoreCompliance(scan, terms, config, hazards);
  const structure = validateStructure(markup, scan, config.structure, hazards);
  return {
    terms,
    compliance_report: compliance,
    structure_report: structure,
    ats_findings: hazards,
    outcome: evaluateStandards({ compliance, structure, terms }, config),
  };
}
