#!/usr/bin/env node
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { loadCandidateProfile, loadConfig, type AppConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { createProvider } from './lib/llm.js';
import { getRedisClient, shutdownRedis } from './lib/redis-client.js';
import { captureError, flushSentry, initSentry } from './lib/sentry.js';
import { TextGenerationClient } from './agents/generation-client.js';
import { PromptBuilder } from './agents/prompt-builder.js';
import { createAdequacyGate, createPunctuationGate } from './agents/quality-gate.js';
import { SelfCorrectionLoop } from './agents/self-correction-loop.js';
import { VacancyHandler } from './agents/vacancy-handler.js';
import { runBatch, type BatchSummary } from './batch.js';
import { FileDuplicateCache, RedisDuplicateCache, type DuplicateCache } from './vacancies/duplicate-cache.js';
import { HHClient } from './vacancies/hh-client.js';
import { FileLetterSink } from './vacancies/letter-sink.js';

async function createCache(config: Readonly<AppConfig>): Promise<DuplicateCache> {
  if (config.cache.backend === 'redis' && config.cache.redisUrl) {
    const redis = getRedisClient(config.cache.redisUrl);
    await redis.connect();
    logger.info({ key: config.cache.redisKey }, 'Using Redis duplicate cache');
    return new RedisDuplicateCache(redis, config.cache.redisKey);
  }
  const cache = await FileDuplicateCache.load(config.lettersDir);
  logger.info({ lettersDir: config.lettersDir, known: cache.size }, 'Using file duplicate cache');
  return cache;
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<BatchSummary> {
  // Configuration, profile and templates are all checked before the first request
  const config = loadConfig(env);
  const profile = loadCandidateProfile(config);
  const prompts = PromptBuilder.fromDirectory(config.promptsDir, profile);

  const client = new TextGenerationClient({
    provider: createProvider(config.llm),
    options: config.llm,
  });
  const gateDeps = {
    client,
    prompts,
    model: config.llm.model,
    ambiguousVerdict: config.loop.ambiguousVerdict,
  };
  const loop = new SelfCorrectionLoop({
    client,
    prompts,
    adequacyGate: createAdequacyGate(gateDeps),
    punctuationGate: createPunctuationGate(gateDeps),
    model: config.llm.model,
    rounds: config.loop,
  });

  const cache = await createCache(config);
  const handler = new VacancyHandler({
    processor: loop,
    cache,
    sink: new FileLetterSink(config.lettersDir),
    criteria: config.criteria,
  });

  logger.info(
    {
      provider: config.llm.provider,
      model: config.llm.model,
      adequacyRounds: config.loop.adequacyRounds,
      punctuationRounds: config.loop.punctuationRounds,
    },
    'Cover letter batch starting',
  );
  const summary = await runBatch({
    source: new HHClient({ config: config.search }),
    cache,
    handler,
    search: config.search,
  });
  logger.info(summary, 'Cover letter batch finished');
  return summary;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

async function run(): Promise<void> {
  initSentry();
  try {
    await main();
  } catch (err) {
    captureError(err, { source: 'main' });
    logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Cover letter batch aborted');
    process.exitCode = 1;
  } finally {
    await shutdownRedis();
    await flushSentry(2000);
  }
}

if (isMainModule()) {
  void run();
}
