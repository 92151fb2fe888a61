import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { parseJsonBodyWithLimit, parsePositiveInt } from '../lib/http-body-guard.js';
import { createProviderFromEnv } from '../lib/llm.js';
import { formatIssues, validateBody } from '../lib/validate.js';
import { parseConfig } from '../engine/config.js';
import { ConfigError, InputError } from '../engine/errors.js';
import { toExecutionReport } from '../engine/execution-report.js';
import { createLlmGenerator } from '../engine/generators/llm-generator.js';
import { createProfileGenerator } from '../engine/generators/profile-generator.js';
import { IterationController } from '../engine/iteration-controller.js';
import { CandidateProfileSchema } from '../engine/schemas.js';
import { scoreDocument } from '../engine/score-document.js';
import type { ContentGenerator } from '../engine/types.js';

export type GeneratorMode = 'auto' | 'llm' | 'offline';

export interface RefinementRouteOptions {
  /** Returns null when the requested mode cannot be served. */
  resolveGenerator?: (mode: GeneratorMode) => ContentGenerator | null;
  maxBodyBytes?: number;
}

const DEFAULT_MAX_BODY_BYTES = parsePositiveInt(process.env.MAX_REQUEST_BODY_BYTES, 256_000);

const ScoreRequestSchema = z.object({
  specification_text: z.string(),
  markup: z.string(),
  config: z.unknown().optional(),
});

const RefineRequestSchema = z.object({
  specification_text: z.string(),
  candidate: CandidateProfileSchema,
  config: z.unknown().optional(),
  generator: z.enum(['auto', 'llm', 'offline']).default('auto'),
});

export function resolveGeneratorFromEnv(mode: GeneratorMode): ContentGenerator | null {
  if (mode === 'offline') return createProfileGenerator();
  const selection = createProviderFromEnv();
  if (selection) return createLlmGenerator(selection);
  return mode === 'auto' ? createProfileGenerator() : null;
}

function clientError(c: Context, err: unknown): Response | null {
  if (err instanceof InputError || err instanceof ConfigError) {
    c.get('log').info({ error: err.message, kind: err.name }, 'Rejected refinement request');
    return c.json({ error: err.message, code: err.name }, 400);
  }
  return null;
}

export function createRefinementRoutes(options: RefinementRouteOptions = {}): Hono {
  const resolveGenerator = options.resolveGenerator ?? resolveGeneratorFromEnv;
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const routes = new Hono();

  routes.post('/score', async (c) => {
    const body = await parseJsonBodyWithLimit(c, maxBodyBytes);
    if (!body.ok) return body.response;
    const parsed = validateBody(ScoreRequestSchema, body.data);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: formatIssues(parsed.issues) }, 400);
    }

    try {
      const config = parseConfig(parsed.data.config);
      const score = scoreDocument(parsed.data.specification_text, parsed.data.markup, config);
      return c.json(score);
    } catch (err) {
      const rejected = clientError(c, err);
      if (rejected) return rejected;
      throw err;
    }
  });

  routes.post('/refine', async (c) => {
    const body = await parseJsonBodyWithLimit(c, maxBodyBytes);
    if (!body.ok) return body.response;
    const parsed = validateBody(RefineRequestSchema, body.data);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: formatIssues(parsed.issues) }, 400);
    }

    const generator = resolveGenerator(parsed.data.generator);
    if (!generator) {
      return c.json({ error: 'No LLM provider is configured on this server' }, 503);
    }

    try {
      const controller = new IterationController({
        generator,
        config: parseConfig(parsed.data.config),
        logger: c.get('log'),
      });
      const result = await controller.run(
        { specification_text: parsed.data.specification_text, candidate: parsed.data.candidate },
        c.req.raw.signal,
      );
      return c.json(toExecutionReport(result));
    } catch (err) {
      const rejected = clientError(c, err);
      if (rejected) return rejected;
      throw err;
    }
  });

  return routes;
}
