// Web search collaborator — consumed by the research and contact stages
// Live implementation uses the Google Custom Search JSON API

import { z } from 'zod';
import type { SearchResult } from '../types/stages.js';
import { ProviderError, errorMessage } from '../types/errors.js';

export interface SearchOptions {
  limit?: number;
  signal?: AbortSignal;
}

export interface SearchClient {
  search(query: string, options?: SearchOptions): Promise<SearchResult[]>;
}

export interface GoogleSearchConfig {
  apiKey: string;
  engineId: string;
  /** Per-request timeout (default: 10s) */
  timeoutMs?: number;
  baseUrl?: string;
}

const GOOGLE_SEARCH_URL = 'https://www.googleapis.com/customsearch/v1';
const PROVIDER = 'google-search';

const SearchResponseSchema = z.object({
  items: z.array(z.object({
    title: z.string().default(''),
    snippet: z.string().default(''),
    link: z.string(),
  })).optional(),
});

/** 408, 429 and 5xx are worth retrying; any other HTTP error is not */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Link an optional caller signal to a fresh controller that also aborts on timeout.
 * `dispose` must be called once the request settles.
 */
export function withTimeout(timeoutMs: number, signal?: AbortSignal): {
  signal: AbortSignal;
  timedOut: () => boolean;
  dispose: () => void;
} {
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  if (signal?.aborted) controller.abort();
  else signal?.addEventListener('abort', onAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

export class GoogleSearchClient implements SearchClient {
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(private readonly config: GoogleSearchConfig) {
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.baseUrl = config.baseUrl ?? GOOGLE_SEARCH_URL;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const limit = Math.min(Math.max(options.limit ?? 5, 1), 10);
    const url = new URL(this.baseUrl);
    url.searchParams.set('key', this.config.apiKey);
    url.searchParams.set('cx', this.config.engineId);
    url.searchParams.set('q', query);
    url.searchParams.set('num', String(limit));

    const request = withTimeout(this.timeoutMs, options.signal);
    let res: Response;
    try {
      res = await fetch(url.toString(), {
        headers: { 'Accept': 'application/json' },
        signal: request.signal,
      });
    } catch (err) {
      const reason = request.timedOut()
        ? `timed out after ${this.timeoutMs}ms`
        : errorMessage(err);
      throw new ProviderError(`Search request failed: ${reason}`, PROVIDER, true, undefined, err);
    } finally {
      request.dispose();
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      if (res.status === 401 || res.status === 403) {
        throw new ProviderError(`Search: API key rejected (HTTP ${res.status})`, PROVIDER, false, res.status);
      }
      throw new ProviderError(
        `Search: HTTP ${res.status} — ${body.slice(0, 200)}`,
        PROVIDER,
        isTransientStatus(res.status),
        res.status,
      );
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new ProviderError(`Search: invalid JSON response (${errorMessage(err)})`, PROVIDER, false, res.status, err);
    }

    const parsed = SearchResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError('Search: unexpected response shape', PROVIDER, false, res.status, parsed.error);
    }

    return (parsed.data.items ?? []).slice(0, limit).map(item => ({
      title: item.title,
      snippet: item.snippet,
      url: item.link,
    }));
  }
}
