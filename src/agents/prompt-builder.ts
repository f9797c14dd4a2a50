/**
 * PromptBuilder
 *
 * Fills the letter templates from `PROMPTS_DIR`. Templates use `{name}`
 * placeholders; any other braces are left as written. Every template is
 * checked once at construction, so a broken prompts directory stops the
 * run before the first vacancy instead of failing each one.
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { CandidateProfile, VacancyRecord } from './types.js';

export type PromptIntent =
  | 'draft'
  | 'fix_adequacy'
  | 'fix_punctuation'
  | 'review_adequacy'
  | 'review_punctuation';

export type PromptRequest =
  | { intent: 'draft'; vacancy: VacancyRecord }
  | { intent: 'fix_adequacy'; vacancy: VacancyRecord; text: string; critique: string }
  | { intent: 'fix_punctuation'; vacancy: VacancyRecord; text: string; critique: string }
  | { intent: 'review_adequacy'; vacancy: VacancyRecord; text: string }
  | { intent: 'review_punctuation'; vacancy: VacancyRecord; text: string };

export type PromptTemplates = Record<PromptIntent, string>;

type Placeholder = 'personal_data' | 'skills' | 'vacancy' | 'text' | 'critique';

const PLACEHOLDERS: readonly Placeholder[] = ['personal_data', 'skills', 'vacancy', 'text', 'critique'];

const INTENTS: readonly PromptIntent[] = [
  'draft',
  'fix_adequacy',
  'fix_punctuation',
  'review_adequacy',
  'review_punctuation',
];

export const TEMPLATE_FILES: Readonly<Record<PromptIntent, string>> = {
  draft: 'generate_letter.txt',
  fix_adequacy: 'fix_adequacy.txt',
  fix_punctuation: 'fix_punctuation.txt',
  review_adequacy: 'is_require_adequacy.txt',
  review_punctuation: 'is_require_punctuation.txt',
};

const REQUIRED: Readonly<Record<PromptIntent, readonly Placeholder[]>> = {
  draft: ['personal_data', 'skills', 'vacancy'],
  fix_adequacy: ['text', 'critique', 'skills', 'vacancy'],
  fix_punctuation: ['text', 'critique'],
  review_adequacy: ['text', 'skills', 'vacancy'],
  review_punctuation: ['text'],
};

const ALLOWED: Readonly<Record<PromptIntent, readonly Placeholder[]>> = {
  draft: ['personal_data', 'skills', 'vacancy'],
  fix_adequacy: ['text', 'critique', 'skills', 'vacancy', 'personal_data'],
  fix_punctuation: ['text', 'critique'],
  review_adequacy: ['text', 'skills', 'vacancy'],
  review_punctuation: ['text'],
};

const PLACEHOLDER_PATTERN = /\{([a-z_]+)\}/g;

function isPlaceholder(name: string): name is Placeholder {
  return PLACEHOLDERS.some((p) => p === name);
}

function placeholdersIn(template: string): Placeholder[] {
  const found = new Set<Placeholder>();
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined && isPlaceholder(name)) found.add(name);
  }
  return [...found];
}

/**
 * Check every template. Returns a list of problems, empty when all are usable.
 */
export function validateTemplates(templates: Partial<PromptTemplates>): string[] {
  const problems: string[] = [];
  for (const intent of INTENTS) {
    const template = templates[intent];
    if (template === undefined || template.trim() === '') {
      problems.push(`${TEMPLATE_FILES[intent]}: template is missing or empty`);
      continue;
    }
    const present = placeholdersIn(template);
    for (const required of REQUIRED[intent]) {
      if (!present.includes(required)) {
        problems.push(`${TEMPLATE_FILES[intent]}: missing required placeholder {${required}}`);
      }
    }
    for (const used of present) {
      if (!ALLOWED[intent].includes(used)) {
        problems.push(`${TEMPLATE_FILES[intent]}: placeholder {${used}} is not available for this prompt`);
      }
    }
  }
  return problems;
}

/**
 * Read all templates from a directory. Missing files are reported by
 * validateTemplates, not here.
 */
export function loadPromptTemplates(dir: string): Partial<PromptTemplates> {
  const templates: Partial<PromptTemplates> = {};
  for (const intent of INTENTS) {
    try {
      templates[intent] = readFileSync(path.join(dir, TEMPLATE_FILES[intent]), 'utf8');
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
    }
  }
  return templates;
}

/**
 * Render the vacancy as a labelled plain-text block. Empty fields are left out.
 */
export function formatVacancy(vacancy: VacancyRecord): string {
  const lines = [
    ['Position', vacancy.title],
    ['Company', vacancy.employer],
    ['Requirements', vacancy.requirements],
    ['Responsibilities', vacancy.responsibility],
  ]
    .filter(([, value]) => value && value.trim())
    .map(([label, value]) => `${label}: ${value.trim()}`);

  if (vacancy.description.trim()) {
    lines.push(`Description:\n${vacancy.description.trim()}`);
  }
  return lines.join('\n');
}

export class PromptBuilder {
  private readonly templates: PromptTemplates;
  private readonly profile: CandidateProfile;

  constructor(templates: Partial<PromptTemplates>, profile: CandidateProfile) {
    const problems = validateTemplates(templates);
    if (problems.length > 0) {
      throw new Error(`Invalid prompt templates:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    }
    this.templates = {
      draft: templates.draft ?? '',
      fix_adequacy: templates.fix_adequacy ?? '',
      fix_punctuation: templates.fix_punctuation ?? '',
      review_adequacy: templates.review_adequacy ?? '',
      review_punctuation: templates.review_punctuation ?? '',
    };
    this.profile = profile;
  }

  static fromDirectory(dir: string, profile: CandidateProfile): PromptBuilder {
    return new PromptBuilder(loadPromptTemplates(dir), profile);
  }

  build(request: PromptRequest): string {
    const values: Partial<Record<Placeholder, string>> = {
      personal_data: this.profile.personal_data,
      skills: this.profile.skills,
      vacancy: formatVacancy(request.vacancy),
    };
    if (request.intent !== 'draft') {
      values.text = request.text;
    }
    if (request.intent === 'fix_adequacy' || request.intent === 'fix_punctuation') {
      values.critique = request.critique.trim() || 'No specific remarks were given; review the whole text.';
    }

    const allowed = ALLOWED[request.intent];
    // Single pass, so placeholder-like text inside values is never expanded
    return this.templates[request.intent]
      .replace(PLACEHOLDER_PATTERN, (match, name: string) => {
        if (!isPlaceholder(name) || !allowed.includes(name)) return match;
        return values[name] ?? match;
      })
      .trim();
  }
}
