/**
 * IterationController: drives generate → score → decide rounds until a draft
 * passes, the round budget runs out, or the caller cancels.
 *
 * Every move goes through `assertTransition` against `TRANSITIONS`, so the
 * reachable graph is exactly the table below.
 */

import { randomUUID } from 'node:crypto';
import { createCombinedAbortSignal, raceWithSignal, TimeoutError } from '../lib/abort.js';
import { createRunLogger, type Logger } from '../lib/logger.js';
import { captureError } from '../lib/sentry.js';
import { formatIssues } from '../lib/validate.js';
import { runAtsHazardCheck } from './ats-rules.js';
import { scoreCompliance } from './compliance-scorer.js';
import { createConfig, type FrozenRefinementConfig } from './config.js';
import { scanDocument } from './document-scanner.js';
import {
  EmptyInputError,
  errorMessage,
  GenerationError,
  InputError,
  ScoringFailure,
  TransitionError,
  type ScoringComponent,
} from './errors.js';
import { latexRenderer } from './latex-renderer.js';
import {
  CandidateProfileSchema,
  ResumeContentSchema,
  type CandidateProfile,
  type CandidateProfileInput,
} from './schemas.js';
import { evaluateStandards } from './standards-evaluator.js';
import { validateStructure } from './structure-validator.js';
import { rankTerms } from './term-ranker.js';
import type {
  ComplianceReport,
  ContentGenerator,
  Draft,
  ExecutionResult,
  IterationRecord,
  RankedTerm,
  Renderer,
  StructureReport,
  TerminationReason,
} from './types.js';

// ─── State machine ───────────────────────────────────────────────────

export type ControllerState =
  | 'GENERATE'
  | 'SCORE'
  | 'DECIDE'
  | 'PASS'
  | 'CONTINUE'
  | 'FAIL_MAX_ITER'
  | 'CANCELLED';

export const TRANSITIONS: Readonly<Record<ControllerState, readonly ControllerState[]>> = {
  GENERATE: ['SCORE', 'DECIDE', 'CANCELLED'],
  SCORE: ['DECIDE'],
  DECIDE: ['PASS', 'CONTINUE', 'FAIL_MAX_ITER'],
  CONTINUE: ['GENERATE'],
  PASS: [],
  FAIL_MAX_ITER: [],
  CANCELLED: [],
};

export const TERMINAL_STATES: ReadonlySet<ControllerState> = new Set<ControllerState>(['PASS', 'FAIL_MAX_ITER', 'CANCELLED']);

export function assertTransition(from: ControllerState, to: ControllerState): void {
  if (!TRANSITIONS[from].includes(to)) {
    throw new TransitionError(from, to);
  }
}

export const GENERIC_RETRY_FEEDBACK =
  'The previous attempt did not produce a usable draft. Produce a complete resume draft with '
  + 'Professional Summary, Professional Experience, Projects, Skills and Education sections.';

// ─── Worst-case reports ──────────────────────────────────────────────

export function worstComplianceReport(
  terms: readonly RankedTerm[],
  sectionKeys: readonly string[],
  reason: string,
): ComplianceReport {
  return {
    overall_score: 0,
    section_scores: Object.fromEntries(sectionKeys.map((key) => [key, 0])),
    present_terms: [],
    missing_terms: terms.map((t) => t.text),
    blocking_issues: [reason],
  };
}

export function worstStructureReport(reason: string): StructureReport {
  return {
    is_valid: false,
    syntax_errors: [reason],
    quality_score: 0,
    section_count: 0,
    bullet_count: 0,
  };
}

// ─── Controller ──────────────────────────────────────────────────────

export type ControllerEvent =
  | { type: 'state'; state: ControllerState; round_index: number }
  | { type: 'round_complete'; record: IterationRecord }
  | { type: 'complete'; result: ExecutionResult };

export interface IterationControllerOptions {
  generator: ContentGenerator;
  renderer?: Renderer;
  config?: FrozenRefinementConfig;
  logger?: Logger;
  onEvent?: (event: ControllerEvent) => void;
}

export interface RunInput {
  specification_text: string;
  candidate: CandidateProfileInput;
}

interface RoundScores {
  compliance: ComplianceReport;
  structure: StructureReport;
  scoring_errors: string[];
}

interface RunState {
  readonly runId: string;
  readonly log: Logger;
  state: ControllerState;
  round: number;
}

export class IterationController {
  private readonly generator: ContentGenerator;
  private readonly renderer: Renderer;
  private readonly config: FrozenRefinementConfig;
  private readonly baseLogger: Logger | undefined;
  private readonly onEvent: ((event: ControllerEvent) => void) | undefined;

  constructor(options: IterationControllerOptions) {
    this.generator = options.generator;
    this.renderer = options.renderer ?? latexRenderer;
    this.config = options.config ?? createConfig();
    this.baseLogger = options.logger;
    this.onEvent = options.onEvent;
  }

  /**
   * Runs rounds until PASS, the round budget is spent, or `signal` aborts.
   * Only `InputError` is thrown; every other failure is recorded on its round.
   */
  async run(input: RunInput, signal?: AbortSignal): Promise<ExecutionResult> {
    const specification = input.specification_text;
    if (!specification.trim()) {
      throw new EmptyInputError();
    }
    const candidate = this.parseCandidate(input.candidate);

    const runId = randomUUID();
    const log = this.baseLogger ? this.baseLogger.child({ run_id: runId }) : createRunLogger(runId);
    const startedAt = Date.now();
    let terms = rankTerms(specification, { max_terms: this.config.max_terms });
    log.info({ term_count: terms.length, max_iterations: this.config.max_iterations }, 'Refinement run started');

    const run: RunState = { runId, log, state: 'GENERATE', round: 0 };
    const iterations: IterationRecord[] = [];
    let feedback: string | null = null;
    let finalDraft: Draft | null = null;
    this.emit(log, { type: 'state', state: 'GENERATE', round_index: 0 });

    while (!TERMINAL_STATES.has(run.state)) {
      if (signal?.aborted) {
        this.move(run, 'CANCELLED');
        break;
      }

      const roundStart = Date.now();
      if (this.config.rerank_each_round && run.round > 0) {
        terms = rankTerms(specification, { max_terms: this.config.max_terms });
      }

      let draft: Draft | null = null;
      let generationError: string | null = null;
      try {
        draft = await this.generateDraft(specification, candidate, feedback, run.round, signal);
        finalDraft = draft;
      } catch (err) {
        generationError = errorMessage(err);
        log.warn({ round: run.round, err: generationError }, 'Draft generation failed');
        captureError(err, { run_id: runId, round: run.round, stage: 'generate' });
      }

      let scores: RoundScores;
      if (draft) {
        this.move(run, 'SCORE');
        scores = await this.scoreDraft(draft, terms, log, runId, run.round);
      } else {
        const reason = `Draft unavailable: ${generationError ?? 'generation failed'}`;
        scores = {
          compliance: worstComplianceReport(terms, Object.keys(this.config.section_weights), reason),
          structure: worstStructureReport(reason),
          scoring_errors: [],
        };
      }

      this.move(run, 'DECIDE');
      const outcome = evaluateStandards(
        { compliance: scores.compliance, structure: scores.structure, terms },
        this.config,
      );
      const feedbackText = outcome.decision === 'PASS'
        ? null
        : draft ? outcome.feedback_text : GENERIC_RETRY_FEEDBACK;

      const record: IterationRecord = {
        index: run.round,
        compliance_report: scores.compliance,
        structure_report: scores.structure,
        checklist: outcome.checklist,
        decision: outcome.decision,
        feedback_text: feedbackText,
        waived_standards: outcome.decision === 'PASS' ? outcome.waived_standards : [],
        generation_error: generationError,
        scoring_errors: scores.scoring_errors,
        duration_ms: Date.now() - roundStart,
      };
      iterations.push(record);
      log.info({
        round: run.round,
        decision: record.decision,
        ats_score: record.compliance_report.overall_score,
        quality_score: record.structure_report.quality_score,
        waived: record.waived_standards,
      }, 'Round complete');
      this.emit(log, { type: 'round_complete', record });

      if (outcome.decision === 'PASS') {
        this.move(run, 'PASS');
      } else if (run.round + 1 >= this.config.max_iterations) {
        this.move(run, 'FAIL_MAX_ITER');
      } else {
        this.move(run, 'CONTINUE');
        feedback = feedbackText;
        run.round += 1;
        this.move(run, 'GENERATE');
      }
    }

    const terminationReason: TerminationReason = run.state === 'PASS'
      ? 'pass'
      : run.state === 'CANCELLED' ? 'cancelled' : 'max_iterations';
    const result: ExecutionResult = {
      final_status: run.state === 'PASS' ? 'pass' : 'fail',
      termination_reason: terminationReason,
      total_iterations: iterations.length,
      iterations,
      elapsed_time_ms: Date.now() - startedAt,
      final_draft: finalDraft,
    };
    log.info({
      final_status: result.final_status,
      termination_reason: result.termination_reason,
      total_iterations: result.total_iterations,
      elapsed_time_ms: result.elapsed_time_ms,
    }, 'Refinement run finished');
    this.emit(log, { type: 'complete', result });
    return result;
  }

  private parseCandidate(candidate: CandidateProfileInput): CandidateProfile {
    const parsed = CandidateProfileSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new InputError(`Invalid candidate profile: ${formatIssues(parsed.error.issues).join('; ')}`);
    }
    return parsed.data;
  }

  private async generateDraft(
    specification: string,
    candidate: CandidateProfile,
    previousFeedback: string | null,
    roundIndex: number,
    signal: AbortSignal | undefined,
  ): Promise<Draft> {
    const timeoutMs = this.config.round_timeout_ms;
    const { signal: roundSignal, cleanup } = createCombinedAbortSignal(signal, timeoutMs);
    try {
      const raw = await raceWithSignal(
        this.generator.generate({
          specification_text: specification,
          candidate,
          previous_feedback: previousFeedback,
          round_index: roundIndex,
          signal: roundSignal,
        }),
        roundSignal,
      );
      const content = ResumeContentSchema.safeParse(raw);
      if (!content.success) {
        throw new GenerationError(`Generator returned malformed content: ${formatIssues(content.error.issues).join('; ')}`);
      }
      return { content: content.data, markup: this.renderer.render(content.data) };
    } catch (err) {
      if (err instanceof GenerationError) throw err;
      if (err instanceof TimeoutError) {
        throw new GenerationError(`Generation timed out after ${timeoutMs}ms`, { cause: err });
      }
      throw new GenerationError(`Generation failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      cleanup();
    }
  }

  /** Compliance and structure scoring share nothing but the scan, so they run side by side. */
  private async scoreDraft(
    draft: Draft,
    terms: readonly RankedTerm[],
    log: Logger,
    runId: string,
    roundIndex: number,
  ): Promise<RoundScores> {
    const scanTask = Promise.resolve().then(() => ({
      scan: scanDocument(draft.markup),
      hazards: runAtsHazardCheck(draft.markup),
    }));
    const scoringErrors: string[] = [];

    const guard = async <T>(component: ScoringComponent, task: Promise<T>, fallback: (reason: string) => T): Promise<T> => {
      try {
        return await task;
      } catch (err) {
        const failure = new ScoringFailure(component, { cause: err });
        scoringErrors.push(failure.message);
        log.error({ round: roundIndex, component, err: errorMessage(err) }, 'Scoring failed; substituting worst-case report');
        captureError(failure, { run_id: runId, round: roundIndex, stage: 'score', component });
        return fallback(failure.message);
      }
    };

    const [compliance, structure] = await Promise.all([
      guard(
        'compliance',
        scanTask.then(({ scan, hazards }) => scoreCompliance(scan, terms, this.config, hazards)),
        (reason) => worstComplianceReport(terms, Object.keys(this.config.section_weights), reason),
      ),
      guard(
        'structure',
        scanTask.then(({ scan, hazards }) => validateStructure(draft.markup, scan, this.config.structure, hazards)),
        (reason) => worstStructureReport(reason),
      ),
    ]);

    return { compliance, structure, scoring_errors: scoringErrors };
  }

  private move(run: RunState, to: ControllerState): void {
    assertTransition(run.state, to);
    run.log.debug({ from: run.state, to, round: run.round }, 'State transition');
    run.state = to;
    this.emit(run.log, { type: 'state', state: to, round_index: run.round });
  }

  private emit(log: Logger, event: ControllerEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (err) {
      log.warn({ event: event.type, err: errorMessage(err) }, 'onEvent listener threw');
    }
  }
}
