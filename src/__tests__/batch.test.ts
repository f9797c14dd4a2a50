import { vi, describe, it, expect, beforeEach } from 'vitest';

vi.mock('../lib/logger.js', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() };
  log.child.mockReturnValue(log);
  return { default: log, createVacancyLogger: vi.fn(() => log) };
});

const mockCaptureError = vi.hoisted(() => vi.fn());
vi.mock('../lib/sentry.js', () => ({
  captureError: mockCaptureError,
  initSentry: vi.fn(),
  flushSentry: vi.fn(),
}));

import { buildQueries, publishedTime, runBatch } from '../batch.js';
import type { HandleResult } from '../agents/vacancy-handler.js';
import type { VacancyRecord } from '../agents/types.js';
import type { DuplicateCache } from '../vacancies/duplicate-cache.js';
import type { VacancyListing, VacancyQuery, VacancySource } from '../vacancies/hh-client.js';
import { acceptedOutcome, makeStats, makeVacancy } from './fixtures.js';

function makeListing(id: string, publishedAt: string): VacancyListing {
  const { description: _description, ...rest } = makeVacancy({ id, published_at: publishedAt });
  return { ...rest, api_url: `https://api.hh.ru/vacancies/${id}` };
}

function fakeCache(ids: string[]): DuplicateCache {
  const known = new Set(ids);
  return {
    async contains(vacancyId) {
      return known.has(vacancyId);
    },
    async add(vacancyId) {
      known.add(vacancyId);
    },
  };
}

describe('buildQueries', () => {
  it('crosses frameworks with experience levels', () => {
    expect(buildQueries({ frameworks: ['NestJS', 'Express'], experience: ['noExperience', 'between1And3'] })).toEqual([
      { framework: 'NestJS', experience: 'noExperience' },
      { framework: 'NestJS', experience: 'between1And3' },
      { framework: 'Express', experience: 'noExperience' },
      { framework: 'Express', experience: 'between1And3' },
    ]);
  });

  it('runs a single unnarrowed query when both lists are empty', () => {
    expect(buildQueries({ frameworks: [], experience: [] })).toEqual([{ framework: null, experience: null }]);
  });
});

describe('publishedTime', () => {
  it('parses offsets written with or without a colon', () => {
    expect(publishedTime('2026-10-01T10:00:00+0300')).toBe(Date.UTC(2026, 9, 1, 7, 0, 0));
    expect(publishedTime('2026-10-01T10:00:00+03:00')).toBe(Date.UTC(2026, 9, 1, 7, 0, 0));
    expect(publishedTime('2026-10-01T09:30:00-0130')).toBe(Date.UTC(2026, 9, 1, 11, 0, 0));
  });

  it('puts an unparseable timestamp last', () => {
    expect(publishedTime('yesterday')).toBe(Number.NEGATIVE_INFINITY);
  });
});

describe('runBatch', () => {
  let handled: string[];
  let search: (query: VacancyQuery) => Promise<VacancyListing[]>;
  let fetchDetails: (listing: VacancyListing) => Promise<VacancyRecord>;
  let handle: (vacancy: VacancyRecord) => Promise<HandleResult>;

  beforeEach(() => {
    handled = [];
    mockCaptureError.mockClear();
    fetchDetails = async (listing) => makeVacancy({ id: listing.id, published_at: listing.published_at });
    handle = async (vacancy) => {
      handled.push(vacancy.id);
      return { status: 'processed', vacancy_id: vacancy.id, outcome: acceptedOutcome('Letter'), file_path: 'x' };
    };
  });

  function run(cachedIds: string[] = []) {
    const source: VacancySource = {
      search: (query) => search(query),
      fetchDetails: (listing) => fetchDetails(listing),
    };
    return runBatch({
      source,
      cache: fakeCache(cachedIds),
      handler: { handle: (vacancy) => handle(vacancy) },
      search: { frameworks: ['NestJS', 'Express'], experience: [] },
    });
  }

  it('dedupes across queries, drops cached ids and handles the newest first', async () => {
    search = async (query) => (query.framework === 'NestJS'
      ? [makeListing('1', '2026-10-01T09:00:00+0300'), makeListing('2', '2026-10-03T09:00:00+0300')]
      : [makeListing('2', '2026-10-03T09:00:00+0300'), makeListing('3', '2026-10-02T09:00:00+0300')]);

    const summary = await run(['3']);

    expect(handled).toEqual(['2', '1']);
    expect(summary).toEqual({
      found: 3,
      fresh: 2,
      accepted: 2,
      rejected: 0,
      backend_failures: 0,
      skipped_cached: 1,
      skipped_filtered: 0,
      errors: 0,
    });
  });

  it('orders by the instant of publication across time zones', async () => {
    search = async (query) => (query.framework === 'NestJS'
      ? [
          makeListing('msk', '2026-10-01T10:00:00+0300'),
          makeListing('utc', '2026-10-01T09:30:00+0000'),
          makeListing('bad', 'not a date'),
          makeListing('nsk', '2026-10-01T13:00:00+0700'),
        ]
      : []);

    await run();

    expect(handled).toEqual(['utc', 'msk', 'nsk', 'bad']);
  });

  it('keeps going when one query fails', async () => {
    search = async (query) => {
      if (query.framework === 'NestJS') throw new Error('hh.ru API error 500: oops');
      return [makeListing('7', '2026-10-01T09:00:00+0300')];
    };

    const summary = await run();

    expect(handled).toEqual(['7']);
    expect(summary.found).toBe(1);
    expect(mockCaptureError).toHaveBeenCalledWith(new Error('hh.ru API error 500: oops'), {
      stage: 'search',
      framework: 'NestJS',
      experience: null,
    });
  });

  it('counts each kind of result and survives a vacancy that throws', async () => {
    search = async (query) => (query.framework === 'NestJS'
      ? [
          makeListing('1', '2026-10-05T09:00:00+0300'),
          makeListing('2', '2026-10-04T09:00:00+0300'),
          makeListing('3', '2026-10-03T09:00:00+0300'),
          makeListing('4', '2026-10-02T09:00:00+0300'),
        ]
      : []);
    fetchDetails = async (listing) => {
      if (listing.id === '4') throw new Error('hh.ru API error 404: not found');
      return makeVacancy({ id: listing.id });
    };
    handle = async (vacancy) => {
      handled.push(vacancy.id);
      if (vacancy.id === '1') {
        return {
          status: 'processed',
          vacancy_id: '1',
          outcome: { status: 'rejected_adequacy', last_text: 'Draft', last_critique: 'Off topic', stats: makeStats() },
          file_path: 'letters/defective/1.txt',
        };
      }
      if (vacancy.id === '2') {
        return {
          status: 'processed',
          vacancy_id: '2',
          outcome: { status: 'backend_failure', stage: 'drafting', reason: 'down', last_text: null, stats: makeStats() },
          file_path: null,
        };
      }
      return { status: 'skipped_filtered', vacancy_id: vacancy.id, reason: 'salary 1 below 2' };
    };

    const summary = await run();

    expect(handled).toEqual(['1', '2', '3']);
    expect(summary).toEqual({
      found: 4,
      fresh: 4,
      accepted: 0,
      rejected: 1,
      backend_failures: 1,
      skipped_cached: 0,
      skipped_filtered: 1,
      errors: 1,
    });
    expect(mockCaptureError).toHaveBeenCalledWith(new Error('hh.ru API error 404: not found'), { vacancyId: '4' });
  });
});
