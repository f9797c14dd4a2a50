import { vi } from 'vitest';
import type { PromptTemplates } from '../agents/prompt-builder.js';
import type {
  CandidateProfile,
  GenerationRequest,
  GenerationResult,
  LoopOutcome,
  LoopStats,
  VacancyRecord,
} from '../agents/types.js';

// ─── Fixture Factories ────────────────────────────────────────────────────────

export function makeVacancy(overrides?: Partial<VacancyRecord>): VacancyRecord {
  return {
    id: '101',
    title: 'Backend Developer (Node.js)',
    employer: 'Acme',
    description: 'Build APIs.',
    requirements: 'TypeScript',
    responsibility: 'Maintain services',
    salary: { from: 150000, to: 200000, currency: 'RUR', gross: false },
    experience: 'between1And3',
    published_at: '2026-10-01T10:00:00+0300',
    url: 'https://hh.ru/vacancy/101',
    ...overrides,
  };
}

export const PROFILE: CandidateProfile = {
  personal_data: 'Ivan Petrov, ivan@example.com',
  skills: 'TypeScript, Node.js, PostgreSQL',
};

/** First line of every template names the intent, so fakes can route on it. */
export const TEMPLATES: PromptTemplates = {
  draft: 'DRAFT\n{personal_data}\n{skills}\n{vacancy}',
  fix_adequacy: 'FIX_ADEQUACY\n{text}\n{critique}\n{skills}\n{vacancy}',
  fix_punctuation: 'FIX_PUNCTUATION\n{text}\n{critique}',
  review_adequacy: 'REVIEW_ADEQUACY\n{text}\n{skills}\n{vacancy}',
  review_punctuation: 'REVIEW_PUNCTUATION\n{text}',
};

export function ok(text: string): GenerationResult {
  return { ok: true, text, model: 'test-model', attempts: 1, usage: { input_tokens: 10, output_tokens: 5 } };
}

export function failed(error: string): GenerationResult {
  return { ok: false, error, model: 'test-model', attempts: 3 };
}

/**
 * Generation client that answers from a per-intent queue. Throws when a
 * call arrives that the test did not script.
 */
export function scriptedClient(script: Record<string, GenerationResult[]>) {
  const calls: string[] = [];
  const generate = vi.fn(async (request: GenerationRequest): Promise<GenerationResult> => {
    const kind = request.prompt.split('\n', 1)[0] ?? '';
    calls.push(kind);
    const next = script[kind]?.shift();
    if (!next) throw new Error(`Unscripted ${kind} call`);
    return next;
  });
  return { generate, calls };
}

export function makeStats(overrides?: Partial<LoopStats>): LoopStats {
  return {
    generation_calls: 1,
    gate_calls: 2,
    adequacy_rounds_used: 0,
    punctuation_rounds_used: 0,
    usage: { input_tokens: 0, output_tokens: 0 },
    ...overrides,
  };
}

export function acceptedOutcome(letter: string): LoopOutcome {
  return { status: 'accepted', letter, stats: makeStats() };
}
