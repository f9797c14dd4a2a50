import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { httpStatusError } from './retry.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface CompletionParams {
  model: string;
  prompt: string;
  max_tokens: number;
  temperature: number;
  top_p: number;
  stop: string[];
}

export interface CompletionResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  complete(params: CompletionParams): Promise<CompletionResponse>;
}

type FetchLike = typeof fetch;

async function postJSON(
  fetchImpl: FetchLike,
  provider: string,
  url: string,
  headers: Record<string, string>,
  body: Record<string, unknown>,
  timeoutMs: number,
): Promise<unknown> {
  const signal = AbortSignal.timeout(timeoutMs);
  try {
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw httpStatusError(provider, response.status, errText);
    }

    try {
      return await response.json();
    } catch {
      throw new Error(`${provider} returned a response that is not valid JSON`);
    }
  } catch (err) {
    if (signal.aborted && !(err instanceof Error && 'status' in err)) {
      throw new Error(`${provider} request timed out after ${timeoutMs}ms`, { cause: err });
    }
    throw err;
  }
}

// ─── Ollama provider ─────────────────────────────────────────────────

const OllamaGenerateResponseSchema = z.object({
  response: z.string(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

interface HttpProviderConfig {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export class OllamaProvider implements LLMProvider {
  readonly name = 'ollama';
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(config: HttpProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async complete(params: CompletionParams): Promise<CompletionResponse> {
    const data = await postJSON(
      this.fetchImpl,
      'Ollama',
      `${this.baseUrl}/api/generate`,
      {},
      {
        model: params.model,
        prompt: params.prompt,
        stream: false,
        options: {
          num_predict: params.max_tokens,
          temperature: params.temperature,
          top_p: params.top_p,
          stop: params.stop,
        },
      },
      this.timeoutMs,
    );

    const parsed = OllamaGenerateResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error('Invalid response format from Ollama: missing "response" field');
    }

    return {
      text: parsed.data.response,
      usage: {
        input_tokens: parsed.data.prompt_eval_count ?? 0,
        output_tokens: parsed.data.eval_count ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
    }),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openai';
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(config: HttpProviderConfig & { apiKey: string }) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async complete(params: CompletionParams): Promise<CompletionResponse> {
    const data = await postJSON(
      this.fetchImpl,
      'OpenAI-compatible',
      `${this.baseUrl}/chat/completions`,
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: params.model,
        messages: [{ role: 'user', content: params.prompt }],
        max_tokens: params.max_tokens,
        temperature: params.temperature,
        top_p: params.top_p,
        ...(params.stop.length > 0 ? { stop: params.stop.slice(0, 4) } : {}),
      },
      this.timeoutMs,
    );

    const parsed = OpenAIChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error('Invalid response format from OpenAI-compatible backend: missing choices');
    }

    return {
      text: parsed.data.choices[0]?.message.content ?? '',
      usage: {
        input_tokens: parsed.data.usage?.prompt_tokens ?? 0,
        output_tokens: parsed.data.usage?.completion_tokens ?? 0,
      },
    };
  }
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;
  private apiKey: string;
  private timeoutMs: number;

  constructor(config: { apiKey: string; timeoutMs: number }) {
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs;
  }

  /** Lazily created so the module can load without network setup. */
  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.apiKey, timeout: this.timeoutMs, maxRetries: 0 });
    }
    return this.client;
  }

  async complete(params: CompletionParams): Promise<CompletionResponse> {
    // The Messages API rejects whitespace-only stop sequences
    const stopSequences = params.stop.filter((s) => s.trim().length > 0);

    const response = await this.getClient().messages.create({
      model: params.model,
      max_tokens: params.max_tokens,
      messages: [{ role: 'user', content: params.prompt }],
      temperature: params.temperature,
      ...(stopSequences.length > 0 ? { stop_sequences: stopSequences } : {}),
    });

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
  }
}
