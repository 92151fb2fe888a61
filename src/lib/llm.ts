import { AnthropicProvider, OpenAICompatibleProvider, type LLMProvider } from './llm-provider.js';

export type ProviderName = 'anthropic' | 'groq';

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-3-5-haiku-latest',
  groq: 'llama-3.3-70b-versatile',
};

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export interface ProviderSelection {
  provider: LLMProvider;
  model: string;
}

/**
 * Picks the LLM provider from the environment. `LLM_PROVIDER` wins when set;
 * otherwise whichever API key is present decides. Returns null when no key
 * is configured, in which case callers fall back to offline generation.
 */
export function createProviderFromEnv(
  env: Record<string, string | undefined> = process.env,
): ProviderSelection | null {
  const configured = env.LLM_PROVIDER?.toLowerCase();
  const providerName: ProviderName | null = configured === 'anthropic' || configured === 'groq'
    ? configured
    : env.GROQ_API_KEY
      ? 'groq'
      : env.ANTHROPIC_API_KEY
        ? 'anthropic'
        : null;

  if (providerName === 'groq') {
    const apiKey = env.GROQ_API_KEY;
    if (!apiKey) return null;
    return {
      provider: new OpenAICompatibleProvider({
        name: 'groq',
        apiKey,
        baseUrl: env.GROQ_BASE_URL ?? GROQ_BASE_URL,
      }),
      model: env.LLM_MODEL ?? DEFAULT_MODELS.groq,
    };
  }

  if (providerName === 'anthropic') {
    const apiKey = env.ANTHROPIC_API_KEY;
    if (!apiKey) return null;
    return {
      provider: new AnthropicProvider(apiKey),
      model: env.LLM_MODEL ?? DEFAULT_MODELS.anthropic,
    };
  }

  return null;
}
