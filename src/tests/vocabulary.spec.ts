import { beforeEach, describe, it, expect, vi } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import * as logger from 'firebase-functions/logger';
import { RemoteVocabularyClient, StaticVocabulary, extractIds, type FetchFn, type FetchResponse } from '../lib/vocabulary';
import { tmpDir } from './helpers';

vi.mock('firebase-functions/logger', () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }));

beforeEach(() => {
  vi.clearAllMocks();
});

const BASE = 'https://vocab.test';

const BODIES: Record<string, unknown> = {
  [`${BASE}/vocabularies/deposittypes`]: [{ id: 'image' }, { id: 'text' }],
  [`${BASE}/vocabularies/licenses`]: [{ code: 'CC-BY-4.0' }, { code: 'CC0-1.0' }],
  [`${BASE}/vocabularies/languages?limit=10000`]: [{ '@id': 'fr' }, { '@id': 'en' }],
};

const reply = (status: number, body: unknown): FetchResponse => ({ ok: status < 400, status, json: async () => body });

function fakeFetch(): FetchFn & { calls: string[] } {
  const calls: string[] = [];
  const fn = async (url: string) => {
    calls.push(url);
    return url in BODIES ? reply(200, BODIES[url]) : reply(404, null);
  };
  return Object.assign(fn, { calls });
}

describe('extractIds', () => {
  it('reads id, then @id, then code', () => {
    expect(extractIds([{ id: 'a' }, { '@id': 'b' }, { code: 'c' }, { label: 'none' }, 'bare'])).toEqual(['a', 'b', 'c']);
  });
});

describe('StaticVocabulary', () => {
  it('returns an empty list for unknown names', () => {
    const vocab = new StaticVocabulary({ licenses: ['CC0'] });
    expect(vocab.values('licenses')).toEqual(['CC0']);
    expect(vocab.values('languages')).toEqual([]);
  });
});

describe('RemoteVocabularyClient', () => {
  it('fetches every vocabulary and writes the cache', async () => {
    const cachePath = path.join(tmpDir('vocab-'), 'cache', 'vocab.json');
    const fetchFn = fakeFetch();
    const client = new RemoteVocabularyClient({ baseUrl: `${BASE}/`, cachePath, fetchFn });
    expect(client.values('licenses')).toEqual([]);

    await client.prefetch();
    expect(fetchFn.calls).toEqual(Object.keys(BODIES));
    expect(client.values('deposit_types')).toEqual(['image', 'text']);
    expect(client.values('licenses')).toEqual(['CC-BY-4.0', 'CC0-1.0']);
    expect(client.values('languages')).toEqual(['fr', 'en']);
    expect(existsSync(cachePath)).toBe(true);
    expect(JSON.parse(readFileSync(cachePath, 'utf8'))).toEqual({
      deposit_types: BODIES[`${BASE}/vocabularies/deposittypes`],
      licenses: BODIES[`${BASE}/vocabularies/licenses`],
      languages: BODIES[`${BASE}/vocabularies/languages?limit=10000`],
    });
  });

  it('serves the disk cache without fetching', async () => {
    const cachePath = path.join(tmpDir('vocab-'), 'vocab.json');
    await new RemoteVocabularyClient({ baseUrl: BASE, cachePath, fetchFn: fakeFetch() }).prefetch();

    const offline = fakeFetch();
    const client = new RemoteVocabularyClient({ baseUrl: BASE, cachePath, fetchFn: offline });
    expect(client.isCached('licenses')).toBe(true);
    expect(client.values('languages')).toEqual(['fr', 'en']);
    await client.prefetch();
    expect(offline.calls).toEqual([]);
    await client.prefetch({ refresh: true });
    expect(offline.calls).toHaveLength(3);
  });

  it('fails open on network errors', async () => {
    const fetchFn: FetchFn = async () => {
      throw new Error('offline');
    };
    const client = new RemoteVocabularyClient({ baseUrl: BASE, fetchFn });
    await client.prefetch();
    expect(client.values('licenses')).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Vocabulary fetch failed', {
      name: 'licenses',
      url: `${BASE}/vocabularies/licenses`,
      error: 'offline',
    });
  });

  it('rejects error statuses and unexpected bodies', async () => {
    const fetchFn: FetchFn = async (url) => (url.includes('licenses') ? reply(500, null) : reply(200, { items: [] }));
    const client = new RemoteVocabularyClient({ baseUrl: BASE, fetchFn });
    await client.prefetch();
    expect(logger.warn).toHaveBeenCalledWith('Vocabulary fetch failed', expect.objectContaining({ name: 'licenses', error: 'HTTP 500' }));
    expect(logger.warn).toHaveBeenCalledWith(
      'Vocabulary fetch failed',
      expect.objectContaining({ name: 'languages', error: 'Unexpected response shape' })
    );
  });

  it('gives up on a slow server', async () => {
    const fetchFn: FetchFn = () => new Promise<FetchResponse>(() => undefined);
    const client = new RemoteVocabularyClient({ baseUrl: BASE, timeoutMs: 10, fetchFn });
    await client.prefetch();
    expect(logger.warn).toHaveBeenCalledWith(
      'Vocabulary fetch failed',
      expect.objectContaining({ name: 'deposit_types', error: `Timed out after 10ms: ${BASE}/vocabularies/deposittypes` })
    );
    expect(client.values('deposit_types')).toEqual([]);
  });
});
