import type { SearchConfig } from './lib/config.js';
import logger, { createVacancyLogger } from './lib/logger.js';
import { captureError } from './lib/sentry.js';
import type { VacancyHandler } from './agents/vacancy-handler.js';
import type { DuplicateCache } from './vacancies/duplicate-cache.js';
import type { VacancyListing, VacancyQuery, VacancySource } from './vacancies/hh-client.js';

export interface BatchSummary {
  found: number;
  fresh: number;
  accepted: number;
  rejected: number;
  backend_failures: number;
  skipped_cached: number;
  skipped_filtered: number;
  errors: number;
}

export interface BatchDeps {
  source: VacancySource;
  cache: DuplicateCache;
  handler: Pick<VacancyHandler, 'handle'>;
  search: Pick<SearchConfig, 'frameworks' | 'experience'>;
}

/**
 * One query per framework × experience pair. An empty list on either axis
 * means "don't narrow by it".
 */
export function buildQueries(search: BatchDeps['search']): VacancyQuery[] {
  const frameworks: (string | null)[] = search.frameworks.length > 0 ? search.frameworks : [null];
  const experience: (string | null)[] = search.experience.length > 0 ? search.experience : [null];
  return frameworks.flatMap((framework) => experience.map((exp) => ({ framework, experience: exp })));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * hh.ru writes offsets without a colon (`+0300`); normalise before parsing.
 * Unparseable timestamps sort last.
 */
export function publishedTime(publishedAt: string): number {
  const ms = Date.parse(publishedAt.replace(/([+-]\d{2})(\d{2})$/, '$1:$2'));
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

function newestFirst(a: VacancyListing, b: VacancyListing): number {
  const diff = publishedTime(b.published_at) - publishedTime(a.published_at);
  return Number.isNaN(diff) ? 0 : diff;
}

async function collectListings(source: VacancySource, queries: VacancyQuery[]): Promise<VacancyListing[]> {
  const byId = new Map<string, VacancyListing>();
  for (const query of queries) {
    try {
      for (const listing of await source.search(query)) {
        if (!byId.has(listing.id)) byId.set(listing.id, listing);
      }
    } catch (err) {
      logger.error({ ...query, err: errorMessage(err) }, 'Vacancy search failed, skipping query');
      captureError(err, { stage: 'search', framework: query.framework, experience: query.experience });
    }
  }
  return [...byId.values()];
}

/**
 * Fetch, dedupe, drop cached, newest first, then hand each vacancy to the
 * handler one at a time. Per-vacancy errors are counted and the batch goes on.
 */
export async function runBatch(deps: BatchDeps): Promise<BatchSummary> {
  const { source, cache, handler } = deps;
  const summary: BatchSummary = {
    found: 0,
    fresh: 0,
    accepted: 0,
    rejected: 0,
    backend_failures: 0,
    skipped_cached: 0,
    skipped_filtered: 0,
    errors: 0,
  };

  const listings = await collectListings(source, buildQueries(deps.search));
  summary.found = listings.length;

  const fresh: VacancyListing[] = [];
  for (const listing of listings) {
    if (await cache.contains(listing.id)) {
      summary.skipped_cached += 1;
    } else {
      fresh.push(listing);
    }
  }
  fresh.sort(newestFirst);
  summary.fresh = fresh.length;
  logger.info({ found: summary.found, fresh: summary.fresh }, 'Vacancies collected');

  for (const listing of fresh) {
    const log = createVacancyLogger(listing.id);
    try {
      const vacancy = await source.fetchDetails(listing);
      const result = await handler.handle(vacancy);
      switch (result.status) {
        case 'skipped_cached':
          summary.skipped_cached += 1;
          break;
        case 'skipped_filtered':
          summary.skipped_filtered += 1;
          break;
        case 'processed':
          if (result.outcome.status === 'accepted') summary.accepted += 1;
          else if (result.outcome.status === 'backend_failure') summary.backend_failures += 1;
          else summary.rejected += 1;
          break;
      }
    } catch (err) {
      summary.errors += 1;
      log.error({ err: errorMessage(err) }, 'Vacancy failed, continuing with the next one');
      captureError(err, { vacancyId: listing.id });
    }
  }

  return summary;
}
