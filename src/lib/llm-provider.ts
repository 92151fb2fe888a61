import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { createCombinedAbortSignal } from './abort.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

const REQUEST_TIMEOUT_MS = 180_000;

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;

  constructor(private readonly apiKey: string) {}

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, REQUEST_TIMEOUT_MS);
    try {
      const response = await this.getClient().messages.create(
        {
          model: params.model,
          max_tokens: params.max_tokens,
          system: params.system,
          messages: params.messages,
          ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
        },
        { signal },
      );

      let text = '';
      for (const block of response.content) {
        if (block.type === 'text') {
          text += block.text;
        }
      }

      return {
        text,
        usage: {
          input_tokens: response.usage?.input_tokens ?? 0,
          output_tokens: response.usage?.output_tokens ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }
}

// ─── OpenAI-compatible provider (Groq by default) ────────────────────

interface OpenAICompatibleConfig {
  name?: string;
  apiKey: string;
  baseUrl: string;
}

const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullish() }).optional(),
  })).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: string;
  private apiKey: string;
  private baseUrl: string;

  constructor(config: OpenAICompatibleConfig) {
    this.name = config.name ?? 'groq';
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, REQUEST_TIMEOUT_MS);
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: params.model,
          max_tokens: params.max_tokens,
          temperature: params.temperature,
          messages: [
            { role: 'system', content: params.system },
            ...params.messages,
          ],
        }),
        signal,
      });

      if (!response.ok) {
        const errText = await response.text().catch((err: unknown) => String(err));
        const error = new Error(`${this.name} API error ${response.status}: ${errText}`);
        throw Object.assign(error, { status: response.status });
      }

      const parsed = OpenAIChatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`${this.name} API returned an unexpected response shape`);
      }
      const data = parsed.data;
      return {
        text: data.choices?.[0]?.message?.content ?? '',
        usage: {
          input_tokens: data.usage?.prompt_tokens ?? 0,
          output_tokens: data.usage?.completion_tokens ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }
}
