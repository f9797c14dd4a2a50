/**
 * SelfCorrectionLoop
 *
 * Turns one vacancy into a LoopOutcome:
 *
 *   drafting → adequacy_review → punctuation_review → accepted
 *
 * Each review stage runs its gate, and on a fail regenerates the letter
 * with the gate's critique until the stage's round budget is spent. A
 * budget of 0 still runs the gate once. Content is settled before style,
 * so punctuation rounds are never spent on a letter that gets discarded.
 *
 * The loop keeps no state between vacancies; only the read-only profile,
 * templates and config are shared.
 */

import type { LoopConfig } from '../lib/config.js';
import { createVacancyLogger, type Logger } from '../lib/logger.js';
import type { TextGenerationClient } from './generation-client.js';
import type { PromptBuilder } from './prompt-builder.js';
import type { QualityGate } from './quality-gate.js';
import type {
  GenerationResult,
  LoopOutcome,
  LoopStage,
  LoopStats,
  VacancyProcessor,
  VacancyRecord,
} from './types.js';

export type LetterGenerator = Pick<TextGenerationClient, 'generate'>;
export type Reviewer = Pick<QualityGate, 'gate' | 'check'>;

export interface SelfCorrectionLoopDeps {
  client: LetterGenerator;
  prompts: PromptBuilder;
  adequacyGate: Reviewer;
  punctuationGate: Reviewer;
  model: string;
  rounds: Pick<LoopConfig, 'adequacyRounds' | 'punctuationRounds'>;
}

type ReviewStage = Exclude<LoopStage, 'drafting'>;

type StageResult =
  | { kind: 'passed'; text: string }
  | { kind: 'rejected'; text: string; critique: string }
  | { kind: 'backend_failure'; text: string; reason: string };

interface StagePlan {
  stage: ReviewStage;
  gate: Reviewer;
  fixIntent: 'fix_adequacy' | 'fix_punctuation';
  maxRounds: number;
}

export class SelfCorrectionLoop implements VacancyProcessor {
  readonly name = 'cover_letter';
  private readonly deps: SelfCorrectionLoopDeps;

  constructor(deps: SelfCorrectionLoopDeps) {
    if (deps.adequacyGate.gate !== 'adequacy' || deps.punctuationGate.gate !== 'punctuation') {
      throw new Error('SelfCorrectionLoop needs an adequacy gate and a punctuation gate, in that order');
    }
    this.deps = deps;
  }

  async process(vacancy: VacancyRecord): Promise<LoopOutcome> {
    const log = createVacancyLogger(vacancy.id, { processor: this.name });
    const stats: LoopStats = {
      generation_calls: 0,
      gate_calls: 0,
      adequacy_rounds_used: 0,
      punctuation_rounds_used: 0,
      usage: { input_tokens: 0, output_tokens: 0 },
    };

    log.debug({ stage: 'drafting' }, 'Generating first draft');
    const draft = await this.generate(this.deps.prompts.build({ intent: 'draft', vacancy }), stats, log);
    if (!draft.ok) {
      return finish({ status: 'backend_failure', stage: 'drafting', reason: draft.error, last_text: null }, stats, log);
    }

    const adequacy = await this.runStage(
      {
        stage: 'adequacy_review',
        gate: this.deps.adequacyGate,
        fixIntent: 'fix_adequacy',
        maxRounds: this.deps.rounds.adequacyRounds,
      },
      draft.text,
      vacancy,
      stats,
      log,
    );
    if (adequacy.kind === 'backend_failure') {
      return finish(
        { status: 'backend_failure', stage: 'adequacy_review', reason: adequacy.reason, last_text: adequacy.text },
        stats,
        log,
      );
    }
    if (adequacy.kind === 'rejected') {
      return finish(
        { status: 'rejected_adequacy', last_text: adequacy.text, last_critique: adequacy.critique },
        stats,
        log,
      );
    }

    const punctuation = await this.runStage(
      {
        stage: 'punctuation_review',
        gate: this.deps.punctuationGate,
        fixIntent: 'fix_punctuation',
        maxRounds: this.deps.rounds.punctuationRounds,
      },
      adequacy.text,
      vacancy,
      stats,
      log,
    );
    if (punctuation.kind === 'backend_failure') {
      return finish(
        { status: 'backend_failure', stage: 'punctuation_review', reason: punctuation.reason, last_text: punctuation.text },
        stats,
        log,
      );
    }
    if (punctuation.kind === 'rejected') {
      return finish(
        { status: 'rejected_punctuation', last_text: punctuation.text, last_critique: punctuation.critique },
        stats,
        log,
      );
    }

    return finish({ status: 'accepted', letter: punctuation.text }, stats, log);
  }

  private async runStage(
    plan: StagePlan,
    initialText: string,
    vacancy: VacancyRecord,
    stats: LoopStats,
    log: Logger,
  ): Promise<StageResult> {
    let text = initialText;
    let round = 0;

    for (;;) {
      stats.gate_calls += 1;
      const verdict = await plan.gate.check(text, vacancy, log);
      addUsage(stats, verdict.usage);

      if (verdict.status === 'backend_failure') {
        return { kind: 'backend_failure', text, reason: verdict.critique };
      }
      if (verdict.status === 'pass') {
        log.debug({ stage: plan.stage, round }, 'Gate passed');
        return { kind: 'passed', text };
      }
      if (round >= plan.maxRounds) {
        log.debug({ stage: plan.stage, round, maxRounds: plan.maxRounds }, 'Gate failed, round budget spent');
        return { kind: 'rejected', text, critique: verdict.critique };
      }

      round += 1;
      if (plan.stage === 'adequacy_review') {
        stats.adequacy_rounds_used = round;
      } else {
        stats.punctuation_rounds_used = round;
      }
      log.info(
        { stage: plan.stage, round, maxRounds: plan.maxRounds, ambiguous: verdict.ambiguous },
        'Gate failed, regenerating with critique',
      );

      const prompt = this.deps.prompts.build({
        intent: plan.fixIntent,
        vacancy,
        text,
        critique: verdict.critique,
      });
      const fixed = await this.generate(prompt, stats, log);
      if (!fixed.ok) {
        return { kind: 'backend_failure', text, reason: fixed.error };
      }
      text = fixed.text;
    }
  }

  private async generate(prompt: string, stats: LoopStats, log: Logger): Promise<GenerationResult> {
    stats.generation_calls += 1;
    const result = await this.deps.client.generate({ prompt, model: this.deps.model }, log);
    if (result.ok) addUsage(stats, result.usage);
    return result;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type OutcomeBody = DistributiveOmit<LoopOutcome, 'stats'>;

function addUsage(stats: LoopStats, usage: { input_tokens: number; output_tokens: number }): void {
  stats.usage.input_tokens += usage.input_tokens;
  stats.usage.output_tokens += usage.output_tokens;
}

function finish(body: OutcomeBody, stats: LoopStats, log: Logger): LoopOutcome {
  const frozenStats: LoopStats = Object.freeze({ ...stats, usage: Object.freeze({ ...stats.usage }) });
  const outcome: LoopOutcome = Object.freeze({ ...body, stats: frozenStats });
  log.info(
    {
      status: outcome.status,
      generationCalls: frozenStats.generation_calls,
      gateCalls: frozenStats.gate_calls,
      adequacyRounds: frozenStats.adequacy_rounds_used,
      punctuationRounds: frozenStats.punctuation_rounds_used,
    },
    'Self-correction loop finished',
  );
  return outcome;
}
