/**
 * Error kinds surfaced by the refinement engine.
 *
 * Only `InputError` ever reaches the caller of `IterationController.run`;
 * the others are recorded on the round they happened in.
 */

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export class EmptyInputError extends InputError {
  constructor(what = 'Specification text') {
    super(`${what} must not be blank`);
    this.name = 'EmptyInputError';
  }
}

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export type ScoringComponent = 'compliance' | 'structure';

export class ScoringFailure extends Error {
  constructor(readonly component: ScoringComponent, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`${component} scoring failed${detail}`, options);
    this.name = 'ScoringFailure';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TransitionError extends Error {
  constructor(readonly from: string, readonly to: string) {
    super(`Illegal state transition: ${from} -> ${to}`);
    this.name = 'TransitionError';
  }
}

export class ReportFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportFormatError';
  }
}
