import {
  AnthropicProvider,
  OllamaProvider,
  OpenAICompatibleProvider,
  type LLMProvider,
} from './llm-provider.js';
import type { LLMConfig } from './config.js';

// ─── Provider factory ────────────────────────────────────────────────

/**
 * Build the inference backend selected by LLM_PROVIDER. Ollama is the
 * default; it is what the worker runs against on a developer machine.
 */
export function createProvider(config: LLMConfig): LLMProvider {
  switch (config.provider) {
    case 'openai': {
      if (!config.openaiApiKey) {
        throw new Error('OPENAI_API_KEY environment variable is required when LLM_PROVIDER=openai');
      }
      return new OpenAICompatibleProvider({
        apiKey: config.openaiApiKey,
        baseUrl: config.openaiBaseUrl,
        timeoutMs: config.timeoutMs,
      });
    }
    case 'anthropic': {
      if (!config.anthropicApiKey) {
        throw new Error('ANTHROPIC_API_KEY environment variable is required when LLM_PROVIDER=anthropic');
      }
      return new AnthropicProvider({ apiKey: config.anthropicApiKey, timeoutMs: config.timeoutMs });
    }
    case 'ollama':
      return new OllamaProvider({ baseUrl: config.ollamaBaseUrl, timeoutMs: config.timeoutMs });
  }
}
