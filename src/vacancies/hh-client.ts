/* ── hh.ru vacancy source ── */

import { z } from 'zod';
import type { SearchConfig } from '../lib/config.js';
import { htmlToText } from '../lib/clean-text.js';
import logger from '../lib/logger.js';
import { httpStatusError, withRetry, type Sleep } from '../lib/retry.js';
import type { VacancyRecord } from '../agents/types.js';

const HHVacancyItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  url: z.string().url(),
  alternate_url: z.string().optional(),
  published_at: z.string(),
  employer: z.object({ name: z.string() }).nullable().optional(),
  salary: z.object({
    from: z.number().nullable().optional(),
    to: z.number().nullable().optional(),
    currency: z.string().nullable().optional(),
    gross: z.boolean().nullable().optional(),
  }).nullable().optional(),
  experience: z.object({ id: z.string() }).nullable().optional(),
  snippet: z.object({
    requirement: z.string().nullable().optional(),
    responsibility: z.string().nullable().optional(),
  }).nullable().optional(),
});

const HHSearchResponseSchema = z.object({
  items: z.array(z.unknown()),
});

const HHVacancyDetailSchema = z.object({
  description: z.string().nullable().optional(),
  experience: z.object({ id: z.string() }).nullable().optional(),
});

/** Listing from a search page; the full description needs a second request. */
export interface VacancyListing extends Omit<VacancyRecord, 'description'> {
  api_url: string;
}

export interface VacancyQuery {
  framework: string | null;
  experience: string | null;
}

export interface VacancySource {
  search(query: VacancyQuery): Promise<VacancyListing[]>;
  fetchDetails(listing: VacancyListing): Promise<VacancyRecord>;
}

type FetchLike = typeof fetch;

export interface HHClientDeps {
  config: SearchConfig;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  timeoutMs?: number;
}

function toListing(item: z.infer<typeof HHVacancyItemSchema>): VacancyListing {
  return {
    id: item.id,
    title: item.name,
    employer: item.employer?.name ?? '',
    requirements: htmlToText(item.snippet?.requirement),
    responsibility: htmlToText(item.snippet?.responsibility),
    salary: item.salary
      ? {
          from: item.salary.from ?? null,
          to: item.salary.to ?? null,
          currency: item.salary.currency ?? null,
          gross: item.salary.gross ?? null,
        }
      : null,
    experience: item.experience?.id ?? null,
    published_at: item.published_at,
    url: item.alternate_url ?? `https://hh.ru/vacancy/${item.id}`,
    api_url: item.url,
  };
}

export class HHClient implements VacancySource {
  private readonly config: SearchConfig;
  private readonly fetchImpl: FetchLike;
  private readonly sleep?: Sleep;
  private readonly timeoutMs: number;

  constructor(deps: HHClientDeps) {
    this.config = deps.config;
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep;
    this.timeoutMs = deps.timeoutMs ?? 15_000;
  }

  buildSearchUrl(query: VacancyQuery): string {
    const url = new URL(this.config.apiUrl);
    const text = query.framework
      ? `${this.config.progLanguage} ${query.framework}`
      : this.config.progLanguage;

    url.searchParams.set('text', text);
    url.searchParams.set('ored_clusters', 'true');
    url.searchParams.set('work_format', 'REMOTE');
    url.searchParams.set('order_by', 'publication_time');
    url.searchParams.set('page', '0');
    url.searchParams.set('per_page', String(this.config.perPage));
    if (this.config.salary !== undefined) {
      url.searchParams.set('salary', String(this.config.salary));
    }
    if (this.config.hasTest !== undefined) {
      url.searchParams.set('has_test', String(this.config.hasTest));
    }
    if (query.experience) {
      url.searchParams.set('experience', query.experience);
    }
    return url.toString();
  }

  async search(query: VacancyQuery): Promise<VacancyListing[]> {
    const url = this.buildSearchUrl(query);
    logger.info({ framework: query.framework, experience: query.experience }, 'Searching vacancies');

    const data = HHSearchResponseSchema.parse(await this.getJSON(url));
    const listings: VacancyListing[] = [];
    for (const raw of data.items) {
      const parsed = HHVacancyItemSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn({ issues: parsed.error.issues.slice(0, 3) }, 'Skipping malformed vacancy item');
        continue;
      }
      listings.push(toListing(parsed.data));
    }
    return listings;
  }

  async fetchDetails(listing: VacancyListing): Promise<VacancyRecord> {
    logger.debug({ vacancyId: listing.id }, 'Fetching vacancy details');
    const detail = HHVacancyDetailSchema.parse(await this.getJSON(listing.api_url));
    const { api_url: _apiUrl, ...record } = listing;
    return {
      ...record,
      experience: record.experience ?? detail.experience?.id ?? null,
      description: htmlToText(detail.description),
    };
  }

  private async getJSON(url: string): Promise<unknown> {
    return withRetry(
      async () => {
        const res = await this.fetchImpl(url, {
          headers: {
            Accept: 'application/json',
            'User-Agent': this.config.userAgent,
            'HH-User-Agent': this.config.userAgent,
          },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (!res.ok) {
          const body = await res.text().catch(() => '');
          throw httpStatusError('hh.ru', res.status, body);
        }
        const json: unknown = await res.json();
        return json;
      },
      {
        maxAttempts: 3,
        baseDelay: 500,
        sleep: this.sleep,
        onRetry: (attempt, error) => {
          logger.warn({ url, attempt, err: error.message }, 'hh.ru request failed, retrying');
        },
      },
    );
  }
}
