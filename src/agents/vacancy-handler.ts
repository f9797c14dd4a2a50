/**
 * VacancyHandler
 *
 * Boundary between the vacancy pipeline and a VacancyProcessor. For one
 * vacancy it checks the duplicate cache and the local criteria, runs the
 * processor once, persists the result, and records the id only after the
 * letter (or rejected draft) is on disk.
 *
 * Backend failures are not recorded, so the next run retries them.
 */

import type { VacancyCriteria } from '../lib/config.js';
import { createVacancyLogger } from '../lib/logger.js';
import { captureError } from '../lib/sentry.js';
import { matchesCriteria } from '../vacancies/criteria.js';
import type { DuplicateCache } from '../vacancies/duplicate-cache.js';
import type { LetterSink } from '../vacancies/letter-sink.js';
import type { LoopOutcome, VacancyProcessor, VacancyRecord } from './types.js';

export type HandleResult =
  | { status: 'skipped_cached'; vacancy_id: string }
  | { status: 'skipped_filtered'; vacancy_id: string; reason: string }
  | { status: 'processed'; vacancy_id: string; outcome: LoopOutcome; file_path: string | null };

export interface VacancyHandlerDeps {
  processor: VacancyProcessor;
  cache: DuplicateCache;
  sink: LetterSink;
  criteria: VacancyCriteria;
}

export class VacancyHandler {
  private readonly deps: VacancyHandlerDeps;

  constructor(deps: VacancyHandlerDeps) {
    this.deps = deps;
  }

  async handle(vacancy: VacancyRecord): Promise<HandleResult> {
    const { processor, cache, sink, criteria } = this.deps;
    const log = createVacancyLogger(vacancy.id);

    if (await cache.contains(vacancy.id)) {
      log.debug('Vacancy already processed, skipping');
      return { status: 'skipped_cached', vacancy_id: vacancy.id };
    }

    const match = matchesCriteria(vacancy, criteria);
    if (!match.ok) {
      log.info({ reason: match.reason }, 'Vacancy does not match criteria, skipping');
      return { status: 'skipped_filtered', vacancy_id: vacancy.id, reason: match.reason };
    }

    log.info({ title: vacancy.title, employer: vacancy.employer, processor: processor.name }, 'Processing vacancy');
    const outcome = await processor.process(vacancy);

    switch (outcome.status) {
      case 'accepted': {
        const filePath = await sink.write(vacancy.id, outcome.letter);
        await cache.add(vacancy.id);
        log.info({ filePath, generationCalls: outcome.stats.generation_calls }, 'Letter accepted');
        return { status: 'processed', vacancy_id: vacancy.id, outcome, file_path: filePath };
      }
      case 'rejected_adequacy':
      case 'rejected_punctuation': {
        const filePath = await sink.writeRejected(vacancy.id, outcome.last_text);
        await cache.add(vacancy.id);
        log.warn(
          {
            state: outcome.status,
            lastCritique: outcome.last_critique,
            adequacyRounds: outcome.stats.adequacy_rounds_used,
            punctuationRounds: outcome.stats.punctuation_rounds_used,
            filePath,
          },
          'Letter rejected, draft saved for manual review',
        );
        return { status: 'processed', vacancy_id: vacancy.id, outcome, file_path: filePath };
      }
      case 'backend_failure': {
        log.error(
          { state: outcome.status, stage: outcome.stage, reason: outcome.reason },
          'Backend unavailable, vacancy left for the next run',
        );
        captureError(new Error(`Backend failure during ${outcome.stage}: ${outcome.reason}`), {
          vacancyId: vacancy.id,
          stage: outcome.stage,
        });
        return { status: 'processed', vacancy_id: vacancy.id, outcome, file_path: null };
      }
    }
  }
}
