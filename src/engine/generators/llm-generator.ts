/**
 * Content generator backed by an LLM provider. The model's JSON is repaired,
 * then validated against `ResumeContentSchema` before it reaches the renderer.
 */

import type { LLMProvider } from '../../lib/llm-provider.js';
import { repairJSON } from '../../lib/json-repair.js';
import logger, { type Logger } from '../../lib/logger.js';
import { withRetry } from '../../lib/retry.js';
import { formatIssues } from '../../lib/validate.js';
import { GenerationError } from '../errors.js';
import { ResumeContentSchema, type ResumeContent } from '../schemas.js';
import type { ContentGenerator, GenerationRequest } from '../types.js';
import { buildResumeUserPrompt, RESUME_SYSTEM_PROMPT } from './prompts.js';

export interface LlmGeneratorOptions {
  provider: LLMProvider;
  model: string;
  max_tokens?: number;
  temperature?: number;
  /** Attempts per generation call, transient failures only */
  max_attempts?: number;
  retry_base_delay_ms?: number;
  logger?: Logger;
}

export function createLlmGenerator(options: LlmGeneratorOptions): ContentGenerator {
  const log = options.logger ?? logger.child({ component: 'llm-generator' });

  return {
    async generate(request: GenerationRequest): Promise<ResumeContent> {
      const response = await withRetry(
        () => options.provider.chat({
          model: options.model,
          system: RESUME_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildResumeUserPrompt(request) }],
          max_tokens: options.max_tokens ?? 4096,
          temperature: options.temperature ?? 0.4,
          signal: request.signal,
        }),
        {
          maxAttempts: options.max_attempts ?? 3,
          baseDelay: options.retry_base_delay_ms ?? 1000,
          signal: request.signal,
          onRetry: (attempt, error) => {
            log.warn({ attempt, round: request.round_index, error: error.message }, 'LLM call failed, retrying');
          },
        },
      );

      log.debug({
        round: request.round_index,
        provider: options.provider.name,
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
      }, 'LLM draft received');

      const parsed = repairJSON(response.text);
      if (parsed === undefined) {
        throw new GenerationError('Model response was not valid JSON');
      }
      const content = ResumeContentSchema.safeParse(parsed);
      if (!content.success) {
        throw new GenerationError(
          `Model response did not match the resume schema: ${formatIssues(content.error.issues).join('; ')}`,
        );
      }
      return content.data;
    },
  };
}
