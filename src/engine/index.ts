export * from './types.js';
export * from './errors.js';
export * from './schemas.js';
export * from './config.js';
export { rankTerms, compileVocabulary, VocabularySchema, CATEGORY_WEIGHTS, DEFAULT_MAX_TERMS } from './term-ranker.js';
export type { RankTermsOptions, Vocabulary } from './term-ranker.js';
export { scanDocument } from './document-scanner.js';
export { runAtsHazardCheck, ATS_RULEBOOK_SNIPPET } from './ats-rules.js';
export type { AtsFinding } from './ats-rules.js';
export { scoreCompliance, canonicalSection, SECTION_ALIASES } from './compliance-scorer.js';
export type { CompliancePolicy } from './compliance-scorer.js';
export { validateStructure, scoreQuality } from './structure-validator.js';
export { evaluateStandards, STANDARD_POLICY, hardGates } from './standards-evaluator.js';
export type { StandardsInput, StandardsPolicy } from './standards-evaluator.js';
export {
  IterationController,
  TRANSITIONS,
  TERMINAL_STATES,
  assertTransition,
  GENERIC_RETRY_FEEDBACK,
} from './iteration-controller.js';
export type { ControllerEvent, ControllerState, IterationControllerOptions, RunInput } from './iteration-controller.js';
export { renderLatex, escapeLatex, latexRenderer } from './latex-renderer.js';
export { createLlmGenerator } from './generators/llm-generator.js';
export type { LlmGeneratorOptions } from './generators/llm-generator.js';
export { createProfileGenerator, buildProfileContent } from './generators/profile-generator.js';
export { scoreDocument } from './score-document.js';
export type { DocumentScore } from './score-document.js';
export { toExecutionReport, parseExecutionReport, ExecutionReportSchema, REPORT_SCHEMA_VERSION } from './execution-report.js';
export type { ExecutionReport } from './execution-report.js';
