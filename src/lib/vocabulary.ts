/*
  Controlled vocabularies
  -----------------------
  Vocabulary-dependent rules read lists through VocabularyProvider.values().
  An empty list means "unavailable" and those rules then report nothing.

  RemoteVocabularyClient:
    - GET <baseUrl>/vocabularies/{deposittypes,licenses,languages}
    - raw responses cached to a JSON file (VOCAB_CACHE_PATH)
    - lookups are synchronous and served from memory / disk cache;
      prefetch() is the only network path
*/

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';
import fetch from 'node-fetch';
import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { errorMessage } from './utils';

export interface VocabularyProvider {
  values(name: string): readonly string[];
}

export const VOCABULARY_ENDPOINTS: Record<string, string> = {
  deposit_types: '/vocabularies/deposittypes',
  licenses: '/vocabularies/licenses',
  languages: '/vocabularies/languages?limit=10000',
};

export class StaticVocabulary implements VocabularyProvider {
  private readonly lists: Map<string, readonly string[]>;

  constructor(lists: Record<string, readonly string[]>) {
    this.lists = new Map(Object.entries(lists));
  }

  values(name: string): readonly string[] {
    return this.lists.get(name) ?? [];
  }
}

// --------------------------
// Remote client
// --------------------------
export interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}
export type FetchFn = (url: string) => Promise<FetchResponse>;

export interface RemoteVocabularyOptions {
  baseUrl: string;
  timeoutMs?: number;
  cachePath?: string | null;
  fetchFn?: FetchFn;
}

const CacheFile = z.record(z.array(z.unknown()));
type RawCache = z.infer<typeof CacheFile>;

const VocabItem = z
  .object({ id: z.string().optional(), '@id': z.string().optional(), code: z.string().optional() })
  .passthrough();

/** Pull ids out of a raw vocabulary response (`id`, then `@id`, then `code`). */
export function extractIds(items: readonly unknown[]): string[] {
  const out: string[] = [];
  for (const item of items) {
    const parsed = VocabItem.safeParse(item);
    if (!parsed.success) continue;
    const id = parsed.data.id || parsed.data['@id'] || parsed.data.code;
    if (id) out.push(id);
  }
  return out;
}

function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`Timed out after ${ms}ms: ${label}`)), ms);
    p.then(
      (v) => {
        clearTimeout(timer);
        resolve(v);
      },
      (e: unknown) => {
        clearTimeout(timer);
        reject(e);
      }
    );
  });
}

export class RemoteVocabularyClient implements VocabularyProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly cachePath: string | null;
  private readonly fetchFn: FetchFn;
  private raw: RawCache;
  private ids = new Map<string, string[]>();

  constructor(opts: RemoteVocabularyOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.cachePath = opts.cachePath ?? null;
    this.fetchFn = opts.fetchFn ?? ((url) => fetch(url));
    this.raw = this.loadCache();
    for (const [name, items] of Object.entries(this.raw)) this.ids.set(name, extractIds(items));
  }

  values(name: string): readonly string[] {
    return this.ids.get(name) ?? [];
  }

  isCached(name: string): boolean {
    return this.ids.has(name);
  }

  /** Fetch every known vocabulary not already cached (all of them with refresh). */
  async prefetch(opts: { refresh?: boolean } = {}): Promise<void> {
    const names = Object.keys(VOCABULARY_ENDPOINTS).filter((n) => opts.refresh || !this.isCached(n));
    const results = await Promise.all(names.map((n) => this.fetchOne(n)));
    if (results.some(Boolean)) this.saveCache();
  }

  private async fetchOne(name: string): Promise<boolean> {
    const url = `${this.baseUrl}${VOCABULARY_ENDPOINTS[name]}`;
    try {
      const res = await withTimeout(this.fetchFn(url), this.timeoutMs, url);
      if (!res.ok) throw new Error(`HTTP ${res.status}`);
      const body = await res.json();
      if (!Array.isArray(body)) throw new Error('Unexpected response shape');
      this.raw[name] = body;
      this.ids.set(name, extractIds(body));
      logger.info('Vocabulary fetched', { name, count: this.values(name).length });
      return true;
    } catch (e) {
      logger.warn('Vocabulary fetch failed', { name, url, error: errorMessage(e) });
      return false;
    }
  }

  private loadCache(): RawCache {
    if (!this.cachePath || !existsSync(this.cachePath)) return {};
    try {
      const parsed = CacheFile.safeParse(JSON.parse(readFileSync(this.cachePath, 'utf8')));
      if (parsed.success) return parsed.data;
      logger.warn('Vocabulary cache has an unexpected shape, ignoring', { cachePath: this.cachePath });
    } catch (e) {
      logger.warn('Vocabulary cache unreadable, ignoring', { cachePath: this.cachePath, error: errorMessage(e) });
    }
    return {};
  }

  private saveCache(): void {
    if (!this.cachePath) return;
    try {
      mkdirSync(path.dirname(this.cachePath), { recursive: true });
      writeFileSync(this.cachePath, JSON.stringify(this.raw, null, 2), 'utf8');
    } catch (e) {
      logger.warn('Vocabulary cache not written', { cachePath: this.cachePath, error: errorMessage(e) });
    }
  }
}
