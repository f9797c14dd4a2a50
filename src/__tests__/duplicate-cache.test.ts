import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  FileDuplicateCache,
  RedisDuplicateCache,
  vacancyIdFromFileName,
  type RedisSetClient,
} from '../vacancies/duplicate-cache.js';

describe('vacancyIdFromFileName', () => {
  it('takes everything before the first dash', () => {
    expect(vacancyIdFromFileName('101-2026-10-01.txt')).toBe('101');
    expect(vacancyIdFromFileName('defective/202-2026-10-02.txt')).toBe('202');
  });

  it('returns null when there is no id part', () => {
    expect(vacancyIdFromFileName('-2026-10-01.txt')).toBeNull();
    expect(vacancyIdFromFileName('notes.txt')).toBeNull();
  });
});

describe('FileDuplicateCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'letters-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('knows every vacancy that already has a letter or a rejected draft', async () => {
    await writeFile(path.join(dir, '101-2026-10-01.txt'), 'letter', 'utf8');
    await mkdir(path.join(dir, 'defective'));
    await writeFile(path.join(dir, 'defective', '202-2026-10-02.txt'), 'draft', 'utf8');
    await writeFile(path.join(dir, '303-notes.md'), 'not a letter', 'utf8');

    const cache = await FileDuplicateCache.load(dir);

    expect(cache.size).toBe(2);
    expect(await cache.contains('101')).toBe(true);
    expect(await cache.contains('202')).toBe(true);
    expect(await cache.contains('303')).toBe(false);
  });

  it('starts empty when the letters directory does not exist yet', async () => {
    const cache = await FileDuplicateCache.load(path.join(dir, 'missing'));

    expect(cache.size).toBe(0);
    expect(await cache.contains('101')).toBe(false);
  });

  it('remembers ids added during the run', async () => {
    const cache = await FileDuplicateCache.load(dir);

    await cache.add('404');

    expect(await cache.contains('404')).toBe(true);
  });
});

describe('RedisDuplicateCache', () => {
  function fakeRedis(): RedisSetClient & { sets: Map<string, Set<string>> } {
    const sets = new Map<string, Set<string>>();
    return {
      sets,
      async sismember(key: string, member: string) {
        return sets.get(key)?.has(member) ? 1 : 0;
      },
      async sadd(key: string, ...members: string[]) {
        const set = sets.get(key) ?? new Set<string>();
        let added = 0;
        for (const member of members) {
          if (!set.has(member)) added += 1;
          set.add(member);
        }
        sets.set(key, set);
        return added;
      },
    };
  }

  it('stores ids in one set under the configured key', async () => {
    const redis = fakeRedis();
    const cache = new RedisDuplicateCache(redis, 'cover-letters:processed');

    expect(await cache.contains('101')).toBe(false);
    await cache.add('101');

    expect(await cache.contains('101')).toBe(true);
    expect([...(redis.sets.get('cover-letters:processed') ?? [])]).toEqual(['101']);
  });
});
