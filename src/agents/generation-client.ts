/**
 * TextGenerationClient
 *
 * One prompt in, one GenerationResult out. Transient backend faults are
 * retried with backoff; anything left over comes back as `{ ok: false }`
 * so a flaky backend ends one vacancy, never the batch.
 */

import { cleanCompletion } from '../lib/clean-text.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import type { LLMConfig } from '../lib/config.js';
import logger, { type Logger } from '../lib/logger.js';
import { withRetry, type Sleep } from '../lib/retry.js';
import type { GenerationRequest, GenerationResult } from './types.js';

export type GenerationOptions = Pick<
  LLMConfig,
  'maxTokens' | 'temperature' | 'topP' | 'stop' | 'maxAttempts' | 'retryBaseDelayMs'
>;

export interface TextGenerationClientDeps {
  provider: LLMProvider;
  options: GenerationOptions;
  sleep?: Sleep;
  random?: () => number;
  log?: Logger;
}

export class TextGenerationClient {
  private readonly provider: LLMProvider;
  private readonly options: GenerationOptions;
  private readonly sleep?: Sleep;
  private readonly random?: () => number;
  private readonly log: Logger;

  constructor(deps: TextGenerationClientDeps) {
    this.provider = deps.provider;
    this.options = deps.options;
    this.sleep = deps.sleep;
    this.random = deps.random;
    this.log = deps.log ?? logger;
  }

  async generate(request: GenerationRequest, log: Logger = this.log): Promise<GenerationResult> {
    let attempts = 0;

    try {
      const response = await withRetry(
        (attempt) => {
          attempts = attempt;
          return this.provider.complete({
            model: request.model,
            prompt: request.prompt,
            max_tokens: this.options.maxTokens,
            temperature: this.options.temperature,
            top_p: this.options.topP,
            stop: this.options.stop,
          });
        },
        {
          maxAttempts: this.options.maxAttempts,
          baseDelay: this.options.retryBaseDelayMs,
          sleep: this.sleep,
          random: this.random,
          onRetry: (attempt, error, delayMs) => {
            log.warn(
              { provider: this.provider.name, model: request.model, attempt, delayMs: Math.round(delayMs), err: error.message },
              'Transient backend error, retrying',
            );
          },
        },
      );

      const text = cleanCompletion(response.text);
      if (!text) {
        log.warn({ provider: this.provider.name, model: request.model, attempts }, 'Backend returned an empty completion');
        return { ok: false, error: 'Backend returned an empty completion', model: request.model, attempts };
      }

      return { ok: true, text, model: request.model, attempts, usage: response.usage };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error({ provider: this.provider.name, model: request.model, attempts, err: message }, 'Backend request failed');
      return { ok: false, error: message, model: request.model, attempts };
    }
  }
}
