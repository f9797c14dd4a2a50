import { readdir } from 'node:fs/promises';
import path from 'node:path';

/**
 * Key-existence store of vacancies that reached a terminal outcome.
 * Append-only: ids are added, never removed.
 */
export interface DuplicateCache {
  contains(vacancyId: string): Promise<boolean>;
  add(vacancyId: string): Promise<void>;
}

/** Letter files are named `{vacancyId}-{date}.txt`. */
export function vacancyIdFromFileName(fileName: string): string | null {
  const base = path.basename(fileName);
  const dash = base.indexOf('-');
  if (dash <= 0) return null;
  return base.slice(0, dash);
}

/**
 * Cache derived from the letters already on disk, including rejected drafts
 * in `defective/`. Nothing else is persisted: writing the letter is what
 * makes the id durable across runs.
 */
export class FileDuplicateCache implements DuplicateCache {
  private readonly ids: Set<string>;

  private constructor(ids: Iterable<string>) {
    this.ids = new Set(ids);
  }

  static async load(lettersDir: string): Promise<FileDuplicateCache> {
    let entries: string[];
    try {
      entries = await readdir(lettersDir, { recursive: true });
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return new FileDuplicateCache([]);
      }
      throw err;
    }

    const ids: string[] = [];
    for (const entry of entries) {
      if (!entry.endsWith('.txt')) continue;
      const id = vacancyIdFromFileName(entry);
      if (id) ids.push(id);
    }
    return new FileDuplicateCache(ids);
  }

  get size(): number {
    return this.ids.size;
  }

  async contains(vacancyId: string): Promise<boolean> {
    return this.ids.has(vacancyId);
  }

  async add(vacancyId: string): Promise<void> {
    this.ids.add(vacancyId);
  }
}

/** The two set commands the cache needs; an ioredis client satisfies it. */
export interface RedisSetClient {
  sismember(key: string, member: string): Promise<number>;
  sadd(key: string, ...members: string[]): Promise<number>;
}

/**
 * Cache kept in one Redis set, for running the worker from more than one
 * machine or container against the same history.
 */
export class RedisDuplicateCache implements DuplicateCache {
  constructor(
    private readonly client: RedisSetClient,
    private readonly key: string,
  ) {}

  async contains(vacancyId: string): Promise<boolean> {
    return (await this.client.sismember(this.key, vacancyId)) === 1;
  }

  async add(vacancyId: string): Promise<void> {
    await this.client.sadd(this.key, vacancyId);
  }
}
