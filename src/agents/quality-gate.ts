/**
 * QualityGate
 *
 * A gate is one constrained generation call whose reply starts with a
 * PASS/FAIL line followed by free-text remarks. Two instances exist:
 *
 * - adequacy: does the letter answer the vacancy with the candidate's real skills
 * - punctuation: grammar, spelling and style only; runs after adequacy passes
 *
 * A reply without a clear marker is resolved by the configured policy
 * (fail unless told otherwise). An unreachable backend is reported as
 * `backend_failure`, never as a content fail.
 */

import type { AmbiguousVerdictPolicy } from '../lib/config.js';
import logger, { type Logger } from '../lib/logger.js';
import type { TextGenerationClient } from './generation-client.js';
import type { PromptBuilder } from './prompt-builder.js';
import type { GateName, GateVerdict, VacancyRecord } from './types.js';

const PASS_MARKERS = new Set(['pass', 'passed', 'yes', 'да']);
const FAIL_MARKERS = new Set(['fail', 'failed', 'no', 'нет']);

export interface ParsedVerdict {
  verdict: 'pass' | 'fail' | 'ambiguous';
  critique: string;
}

/**
 * Read the verdict from the first word of the first non-empty line of a
 * reviewer reply, case-insensitively. Whatever follows the marker on that
 * line, and every later line, is the critique.
 */
export function parseVerdict(raw: string): ParsedVerdict {
  const lines = raw.split('\n').map((line) => line.trim());
  const firstIndex = lines.findIndex((line) => line.length > 0);
  if (firstIndex < 0) {
    return { verdict: 'ambiguous', critique: raw.trim() };
  }

  const firstLine = lines[firstIndex] ?? '';
  const firstWord = firstLine.toLowerCase().split(/[^\p{L}]+/u).find(Boolean) ?? '';
  const verdict = PASS_MARKERS.has(firstWord) ? 'pass' : FAIL_MARKERS.has(firstWord) ? 'fail' : 'ambiguous';
  if (verdict === 'ambiguous') {
    return { verdict, critique: raw.trim() };
  }

  const remark = firstLine.replace(/^[^\p{L}]*\p{L}+/u, '').replace(/^[^\p{L}\p{N}]+/u, '');
  const rest = lines.slice(firstIndex + 1).join('\n').trim();
  return {
    verdict,
    critique: [remark, rest].filter(Boolean).join('\n') || firstLine,
  };
}

export interface QualityGateDeps {
  gate: GateName;
  client: Pick<TextGenerationClient, 'generate'>;
  prompts: PromptBuilder;
  model: string;
  ambiguousVerdict: AmbiguousVerdictPolicy;
}

export class QualityGate {
  readonly gate: GateName;
  private readonly client: Pick<TextGenerationClient, 'generate'>;
  private readonly prompts: PromptBuilder;
  private readonly model: string;
  private readonly ambiguousVerdict: AmbiguousVerdictPolicy;

  constructor(deps: QualityGateDeps) {
    this.gate = deps.gate;
    this.client = deps.client;
    this.prompts = deps.prompts;
    this.model = deps.model;
    this.ambiguousVerdict = deps.ambiguousVerdict;
  }

  async check(candidateText: string, vacancy: VacancyRecord, log: Logger = logger): Promise<GateVerdict> {
    const prompt = this.prompts.build(
      this.gate === 'adequacy'
        ? { intent: 'review_adequacy', vacancy, text: candidateText }
        : { intent: 'review_punctuation', vacancy, text: candidateText },
    );

    const result = await this.client.generate({ prompt, model: this.model }, log);
    if (!result.ok) {
      return {
        gate: this.gate,
        status: 'backend_failure',
        critique: result.error,
        raw: '',
        ambiguous: false,
        usage: { input_tokens: 0, output_tokens: 0 },
      };
    }

    const parsed = parseVerdict(result.text);
    if (parsed.verdict === 'ambiguous') {
      log.warn(
        { gate: this.gate, policy: this.ambiguousVerdict, reply: result.text.slice(0, 200) },
        'Gate reply has no clear verdict, applying policy',
      );
      return {
        gate: this.gate,
        status: this.ambiguousVerdict,
        critique: parsed.critique,
        raw: result.text,
        ambiguous: true,
        usage: result.usage,
      };
    }

    return {
      gate: this.gate,
      status: parsed.verdict,
      critique: parsed.critique,
      raw: result.text,
      ambiguous: false,
      usage: result.usage,
    };
  }
}

type GateFactoryDeps = Omit<QualityGateDeps, 'gate'>;

export function createAdequacyGate(deps: GateFactoryDeps): QualityGate {
  return new QualityGate({ ...deps, gate: 'adequacy' });
}

export function createPunctuationGate(deps: GateFactoryDeps): QualityGate {
  return new QualityGate({ ...deps, gate: 'punctuation' });
}
