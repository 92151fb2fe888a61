/**
 * Refinement configuration.
 *
 * One immutable value, validated once and passed into the controller at
 * construction. Nothing in the engine reads thresholds from ambient state.
 */

import { z } from 'zod';
import { formatIssues } from '../lib/validate.js';
import { ConfigError } from './errors.js';
import { STANDARD_NAMES, type StandardName } from './types.js';

/** Standards the hybrid policy may never waive. */
export const MANDATORY_HARD_GATES: readonly StandardName[] = ['ats_score_met', 'latex_valid'];

const StandardNameSchema = z.enum(STANDARD_NAMES);

const WeightMapSchema = z.record(z.string().min(1), z.number().min(0));

export const HybridPolicySchema = z.object({
  enabled: z.boolean().default(true),
  allowed_failures: z.number().int().min(0).max(STANDARD_NAMES.length - 1).default(1),
  hard_gates: z.array(StandardNameSchema).default([])
    .transform((gates) => [...new Set([...MANDATORY_HARD_GATES, ...gates])]),
});

export const StructurePolicySchema = z.object({
  min_sections: z.number().int().min(0).default(4),
  max_sections: z.number().int().min(1).default(7),
  min_bullets_per_section: z.number().min(0).default(2),
  max_bullets_per_section: z.number().min(0).default(8),
}).refine((p) => p.min_sections <= p.max_sections, {
  message: 'min_sections must not exceed max_sections',
}).refine((p) => p.min_bullets_per_section <= p.max_bullets_per_section, {
  message: 'min_bullets_per_section must not exceed max_bullets_per_section',
});

export const RefinementConfigSchema = z.object({
  ats_score_threshold: z.number().min(0).max(100).default(90),
  pdf_quality_threshold: z.number().min(0).max(100).default(85),
  max_iterations: z.number().int().min(1).max(10).default(3),
  hybrid_policy: HybridPolicySchema.default({}),
  section_weights: WeightMapSchema
    .default({ skills: 0.4, experience: 0.35, projects: 0.25 })
    .refine((weights) => Object.values(weights).some((w) => w > 0), {
      message: 'At least one section weight must be positive',
    }),
  /** Importance-weighted coverage at which a section earns full marks */
  section_coverage_targets: WeightMapSchema
    .default({ skills: 0.8, experience: 0.6, projects: 0.5 }),
  required_sections: z.array(z.string().min(1)).default(['skills', 'experience']),
  keyword_match: z.enum(['high_importance', 'all']).default('high_importance'),
  high_importance_threshold: z.number().min(0).max(1).default(0.8),
  high_importance_coverage_floor: z.number().min(0).max(1).default(0.8),
  structure: StructurePolicySchema.default({}),
  round_timeout_ms: z.number().int().positive().default(120_000),
  rerank_each_round: z.boolean().default(false),
  max_terms: z.number().int().min(1).max(500).default(50),
});

export type RefinementConfigInput = z.input<typeof RefinementConfigSchema>;
export type RefinementConfig = z.infer<typeof RefinementConfigSchema>;
export type KeywordMatch = RefinementConfig['keyword_match'];
export type StructurePolicy = z.infer<typeof StructurePolicySchema>;
export type HybridPolicy = z.infer<typeof HybridPolicySchema>;

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type FrozenRefinementConfig = DeepReadonly<RefinementConfig>;

function deepFreeze<T>(value: T): DeepReadonly<T>;
function deepFreeze(value: unknown): unknown {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validates an untrusted configuration object (e.g. from a request body),
 * fills defaults and freezes the result. Throws `ConfigError` listing every
 * invalid field.
 */
export function parseConfig(value: unknown): FrozenRefinementConfig {
  const result = RefinementConfigSchema.safeParse(value ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid refinement configuration: ${formatIssues(result.error.issues).join('; ')}`);
  }
  return deepFreeze(result.data);
}

export function createConfig(overrides: RefinementConfigInput = {}): FrozenRefinementConfig {
  return parseConfig(overrides);
}

// ─── Environment loading ─────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a number, got: ${raw}`);
  }
  return parsed;
}

function envBool(env: Env, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const normalized = raw.toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  throw new ConfigError(`Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${raw}`);
}

function isKeywordMatch(value: string): value is KeywordMatch {
  return value === 'high_importance' || value === 'all';
}

/**
 * Parses `skills:0.4,experience:0.35` into a weight map.
 */
export function parseWeightList(raw: string, key = 'SECTION_WEIGHTS'): Record<string, number> {
  const weights: Record<string, number> = {};
  for (const pair of raw.split(',')) {
    const [name, value] = pair.split(':').map((part) => part.trim());
    const weight = Number(value);
    if (!name || value === undefined || value === '' || !Number.isFinite(weight)) {
      throw new ConfigError(`${key} entries must look like "section:weight", got: ${pair.trim()}`);
    }
    weights[name.toLowerCase()] = weight;
  }
  return weights;
}

/**
 * Builds the configuration from environment variables. Unset variables keep
 * their defaults.
 */
export function loadConfigFromEnv(env: Env = process.env): FrozenRefinementConfig {
  const keywordMatch = env.KEYWORD_MATCH || undefined;
  if (keywordMatch !== undefined && !isKeywordMatch(keywordMatch)) {
    throw new ConfigError(`KEYWORD_MATCH must be "high_importance" or "all", got: ${keywordMatch}`);
  }

  return createConfig({
    ats_score_threshold: envNumber(env, 'ATS_SCORE_THRESHOLD'),
    pdf_quality_threshold: envNumber(env, 'PDF_QUALITY_THRESHOLD'),
    max_iterations: envNumber(env, 'MAX_ITERATIONS'),
    hybrid_policy: {
      enabled: envBool(env, 'ENABLE_HYBRID_POLICY'),
      allowed_failures: envNumber(env, 'HYBRID_ALLOWED_FAILURES'),
    },
    section_weights: env.SECTION_WEIGHTS ? parseWeightList(env.SECTION_WEIGHTS) : undefined,
    keyword_match: keywordMatch,
    round_timeout_ms: envNumber(env, 'ROUND_TIMEOUT_MS'),
    rerank_each_round: envBool(env, 'RERANK_EACH_ROUND'),
  });
}
