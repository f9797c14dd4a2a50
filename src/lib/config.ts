import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { CandidateProfile } from '../agents/types.js';

// ─── Env parsing helpers ─────────────────────────────────────────────

const csv = z
  .string()
  .optional()
  .transform((value) => (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0));

const envBool = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => (value === undefined ? undefined : value === 'true' || value === '1'));

const nonEmpty = (name: string) => z
  .string({ required_error: `${name} is required` })
  .trim()
  .min(1, `${name} must not be empty`);

const roundBudget = (name: string) => z
  .string({ required_error: `${name} is required` })
  .trim()
  .regex(/^\d+$/, `${name} must be a non-negative integer`)
  .transform(Number)
  .pipe(z.number().max(20, `${name} must be at most 20`));

/** "\n" written literally in .env files becomes a real newline. */
function decodeEscapes(value: string): string {
  return value.replace(/\\n/g, '\n').replace(/\\t/g, '\t');
}

const envSchema = z.object({
  LLM_PROVIDER: z.enum(['ollama', 'openai', 'anthropic']).default('ollama'),
  LLM_MODEL: nonEmpty('LLM_MODEL'),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(350),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.5),
  LLM_TOP_P: z.coerce.number().gt(0).max(1).default(0.85),
  LLM_STOP: z.string().default('\\n\\n\\n'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  ADEQUACY_ROUNDS: roundBudget('ADEQUACY_ROUNDS'),
  PUNCTUATION_ROUNDS: roundBudget('PUNCTUATION_ROUNDS'),
  GATE_AMBIGUOUS_VERDICT: z.enum(['fail', 'pass']).default('fail'),

  PERSONAL_DATA: nonEmpty('PERSONAL_DATA'),
  SKILLS_FILE: z.string().default('prompts/data/skills.txt'),
  PROMPTS_DIR: z.string().default('prompts'),
  LETTERS_DIR: z.string().default('letters'),

  PROG_LANGUAGE: nonEmpty('PROG_LANGUAGE'),
  FRAMEWORKS: csv,
  EXPERIENCE: csv,
  SALARY: z.coerce.number().int().min(0).optional(),
  HAS_TEST: envBool,
  PER_PARAMS: z.coerce.number().int().min(1).max(100).default(100),
  HH_API_URL: z.string().url().default('https://api.hh.ru/vacancies'),
  HH_USER_AGENT: z.string().default('cover-letter-triage/0.1'),
  EXCLUDE_KEYWORDS: csv,

  CACHE_BACKEND: z.enum(['file', 'redis']).default('file'),
  REDIS_URL: z.string().optional(),
  REDIS_CACHE_KEY: z.string().default('cover-letters:processed'),
}).superRefine((env, ctx) => {
  if (env.LLM_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['OPENAI_API_KEY'], message: 'OPENAI_API_KEY is required when LLM_PROVIDER=openai' });
  }
  if (env.LLM_PROVIDER === 'anthropic' && !env.ANTHROPIC_API_KEY) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['ANTHROPIC_API_KEY'], message: 'ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic' });
  }
  if (env.CACHE_BACKEND === 'redis' && !env.REDIS_URL) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REDIS_URL'], message: 'REDIS_URL is required when CACHE_BACKEND=redis' });
  }
});

// ─── Public config shape ─────────────────────────────────────────────

export type LLMProviderName = 'ollama' | 'openai' | 'anthropic';
export type AmbiguousVerdictPolicy = 'fail' | 'pass';

export interface LLMConfig {
  provider: LLMProviderName;
  model: string;
  ollamaBaseUrl: string;
  openaiBaseUrl: string;
  openaiApiKey?: string;
  anthropicApiKey?: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  stop: string[];
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
}

export interface LoopConfig {
  adequacyRounds: number;
  punctuationRounds: number;
  ambiguousVerdict: AmbiguousVerdictPolicy;
}

export interface SearchConfig {
  apiUrl: string;
  userAgent: string;
  progLanguage: string;
  frameworks: string[];
  experience: string[];
  salary?: number;
  hasTest?: boolean;
  perPage: number;
}

export interface VacancyCriteria {
  minSalary?: number;
  excludeKeywords: string[];
  experience: string[];
}

export interface CacheConfig {
  backend: 'file' | 'redis';
  redisUrl?: string;
  redisKey: string;
}

export interface AppConfig {
  llm: LLMConfig;
  loop: LoopConfig;
  personalData: string;
  skillsFile: string;
  promptsDir: string;
  lettersDir: string;
  search: SearchConfig;
  criteria: VacancyCriteria;
  cache: CacheConfig;
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Parse the process environment into an immutable AppConfig.
 * Throws once with every problem listed, before any vacancy is touched.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(parsed.error.issues)}`);
  }
  const e = parsed.data;

  return deepFreeze<AppConfig>({
    llm: {
      provider: e.LLM_PROVIDER,
      model: e.LLM_MODEL,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
      openaiBaseUrl: e.OPENAI_BASE_URL,
      openaiApiKey: e.OPENAI_API_KEY,
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      maxTokens: e.LLM_MAX_TOKENS,
      temperature: e.LLM_TEMPERATURE,
      topP: e.LLM_TOP_P,
      stop: e.LLM_STOP.split(',').map(decodeEscapes).filter((s) => s.length > 0),
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxAttempts: e.LLM_MAX_ATTEMPTS,
      retryBaseDelayMs: e.LLM_RETRY_BASE_DELAY_MS,
    },
    loop: {
      adequacyRounds: e.ADEQUACY_ROUNDS,
      punctuationRounds: e.PUNCTUATION_ROUNDS,
      ambiguousVerdict: e.GATE_AMBIGUOUS_VERDICT,
    },
    personalData: e.PERSONAL_DATA,
    skillsFile: e.SKILLS_FILE,
    promptsDir: e.PROMPTS_DIR,
    lettersDir: e.LETTERS_DIR,
    search: {
      apiUrl: e.HH_API_URL,
      userAgent: e.HH_USER_AGENT,
      progLanguage: e.PROG_LANGUAGE,
      frameworks: e.FRAMEWORKS,
      experience: e.EXPERIENCE,
      salary: e.SALARY,
      hasTest: e.HAS_TEST,
      perPage: e.PER_PARAMS,
    },
    criteria: {
      minSalary: e.SALARY,
      excludeKeywords: e.EXCLUDE_KEYWORDS,
      experience: e.EXPERIENCE,
    },
    cache: {
      backend: e.CACHE_BACKEND,
      redisUrl: e.REDIS_URL,
      redisKey: e.REDIS_CACHE_KEY,
    },
  });
}

/**
 * Load the candidate profile once at startup. The skills block lives in a
 * text file so it can be edited without touching the environment.
 */
export function loadCandidateProfile(config: Pick<AppConfig, 'personalData' | 'skillsFile'>): CandidateProfile {
  const skillsPath = path.resolve(config.skillsFile);
  let skills: string;
  try {
    skills = readFileSync(skillsPath, 'utf8').trim();
  } catch (err) {
    throw new Error(`Invalid configuration: cannot read SKILLS_FILE at ${skillsPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!skills) {
    throw new Error(`Invalid configuration: SKILLS_FILE at ${skillsPath} is empty`);
  }
  return Object.freeze({
    personal_data: config.personalData,
    skills,
  });
}
