import { vi, describe, it, expect } from 'vitest';

vi.mock('../lib/logger.js', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() };
  log.child.mockReturnValue(log);
  return { default: log, createVacancyLogger: vi.fn(() => log) };
});

import { HHClient, type VacancyListing } from '../vacancies/hh-client.js';
import type { SearchConfig } from '../lib/config.js';

const SEARCH: SearchConfig = {
  apiUrl: 'https://api.hh.ru/vacancies',
  userAgent: 'cover-letter-triage/test',
  progLanguage: 'TypeScript',
  frameworks: ['NestJS'],
  experience: ['between1And3'],
  salary: 150000,
  hasTest: false,
  perPage: 50,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const SEARCH_ITEM = {
  id: '101',
  name: 'Backend Developer',
  url: 'https://api.hh.ru/vacancies/101',
  alternate_url: 'https://hh.ru/vacancy/101',
  published_at: '2026-10-01T10:00:00+0300',
  employer: { name: 'Acme' },
  salary: { from: 150000, to: null, currency: 'RUR', gross: false },
  experience: { id: 'between1And3' },
  snippet: { requirement: 'Strong <highlighttext>TypeScript</highlighttext>', responsibility: null },
};

describe('HHClient', () => {
  it('builds the search URL from the config and the query', () => {
    const client = new HHClient({ config: SEARCH });

    const url = new URL(client.buildSearchUrl({ framework: 'NestJS', experience: 'between1And3' }));

    expect(url.origin + url.pathname).toBe('https://api.hh.ru/vacancies');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      text: 'TypeScript NestJS',
      ored_clusters: 'true',
      work_format: 'REMOTE',
      order_by: 'publication_time',
      page: '0',
      per_page: '50',
      salary: '150000',
      has_test: 'false',
      experience: 'between1And3',
    });
  });

  it('searches by language alone when no framework is given', () => {
    const client = new HHClient({ config: { ...SEARCH, salary: undefined, hasTest: undefined } });

    const url = new URL(client.buildSearchUrl({ framework: null, experience: null }));

    expect(url.searchParams.get('text')).toBe('TypeScript');
    expect(url.searchParams.has('salary')).toBe(false);
    expect(url.searchParams.has('has_test')).toBe(false);
    expect(url.searchParams.has('experience')).toBe(false);
  });

  it('normalizes search items and skips malformed ones', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({
      items: [SEARCH_ITEM, { id: '102', name: 'Broken item without url' }],
    }));
    const client = new HHClient({ config: SEARCH, fetchImpl });

    const listings = await client.search({ framework: 'NestJS', experience: null });

    expect(listings).toEqual([
      {
        id: '101',
        title: 'Backend Developer',
        employer: 'Acme',
        requirements: 'Strong TypeScript',
        responsibility: '',
        salary: { from: 150000, to: null, currency: 'RUR', gross: false },
        experience: 'between1And3',
        published_at: '2026-10-01T10:00:00+0300',
        url: 'https://hh.ru/vacancy/101',
        api_url: 'https://api.hh.ru/vacancies/101',
      },
    ]);
    const init = fetchImpl.mock.calls[0]?.[1];
    expect(new Headers(init?.headers).get('hh-user-agent')).toBe('cover-letter-triage/test');
  });

  it('fetches the description and strips its HTML', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({
      description: '<p>We build <b>APIs</b>.</p>',
      experience: { id: 'between1And3' },
    }));
    const client = new HHClient({ config: SEARCH, fetchImpl });
    const listing: VacancyListing = {
      id: '101',
      title: 'Backend Developer',
      employer: 'Acme',
      requirements: '',
      responsibility: '',
      salary: null,
      experience: null,
      published_at: '2026-10-01T10:00:00+0300',
      url: 'https://hh.ru/vacancy/101',
      api_url: 'https://api.hh.ru/vacancies/101',
    };

    const vacancy = await client.fetchDetails(listing);

    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://api.hh.ru/vacancies/101');
    expect(vacancy).toEqual({
      id: '101',
      title: 'Backend Developer',
      employer: 'Acme',
      description: 'We build APIs.',
      requirements: '',
      responsibility: '',
      salary: null,
      experience: 'between1And3',
      published_at: '2026-10-01T10:00:00+0300',
      url: 'https://hh.ru/vacancy/101',
    });
  });

  it('retries a throttled request and gives up on a client error', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
      .mockResolvedValueOnce(jsonResponse({ items: [] }))
      .mockResolvedValueOnce(new Response('bad request', { status: 400 }));
    const client = new HHClient({ config: SEARCH, fetchImpl, sleep });

    await expect(client.search({ framework: null, experience: null })).resolves.toEqual([]);
    await expect(client.search({ framework: null, experience: null })).rejects.toMatchObject({
      message: 'hh.ru API error 400: bad request',
      status: 400,
    });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});
