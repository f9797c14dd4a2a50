/**
 * Shared type definitions for the cover letter pipeline.
 *
 * Records flow one way: VacancyHandler → SelfCorrectionLoop →
 * (PromptBuilder → TextGenerationClient → QualityGate)* → LoopOutcome.
 * Nothing here is mutated after construction.
 */

// ─── Inputs ──────────────────────────────────────────────────────────

export interface VacancySalary {
  from: number | null;
  to: number | null;
  currency: string | null;
  gross: boolean | null;
}

export interface VacancyRecord {
  id: string;
  title: string;
  employer: string;
  /** Full description, already reduced to plain text */
  description: string;
  requirements: string;
  responsibility: string;
  salary: VacancySalary | null;
  /** hh.ru experience id, e.g. "between1And3" */
  experience: string | null;
  published_at: string;
  url: string;
}

export interface CandidateProfile {
  personal_data: string;
  skills: string;
}

// ─── Generation ──────────────────────────────────────────────────────

export interface GenerationRequest {
  prompt: string;
  model: string;
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

export type GenerationResult =
  | { ok: true; text: string; model: string; attempts: number; usage: TokenUsage }
  | { ok: false; error: string; model: string; attempts: number };

// ─── Gates ───────────────────────────────────────────────────────────

export type GateName = 'adequacy' | 'punctuation';

export interface GateVerdict {
  gate: GateName;
  status: 'pass' | 'fail' | 'backend_failure';
  /** Reasoning from the reviewer, the raw response when the verdict was ambiguous, or the backend error */
  critique: string;
  raw: string;
  /** True when no clear pass/fail marker was found and the configured policy decided */
  ambiguous: boolean;
  usage: TokenUsage;
}

// ─── Loop ────────────────────────────────────────────────────────────

export type LoopStage = 'drafting' | 'adequacy_review' | 'punctuation_review';

export interface LoopStats {
  generation_calls: number;
  gate_calls: number;
  adequacy_rounds_used: number;
  punctuation_rounds_used: number;
  usage: TokenUsage;
}

export type LoopOutcome =
  | { status: 'accepted'; letter: string; stats: LoopStats }
  | { status: 'rejected_adequacy'; last_text: string; last_critique: string; stats: LoopStats }
  | { status: 'rejected_punctuation'; last_text: string; last_critique: string; stats: LoopStats }
  | { status: 'backend_failure'; stage: LoopStage; reason: string; last_text: string | null; stats: LoopStats };

export type LoopStatus = LoopOutcome['status'];

/**
 * Pluggable per-vacancy processing. The letter loop is one variant; others
 * (auto-apply, summarising) implement the same contract.
 */
export interface VacancyProcessor {
  readonly name: string;
  process(vacancy: VacancyRecord): Promise<LoopOutcome>;
}
