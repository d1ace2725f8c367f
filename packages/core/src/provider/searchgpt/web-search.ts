import { z } from 'zod';

import { combineSignals } from '../../utils/signals';

export const SERPER_ENDPOINT = 'https://google.serper.dev/search';
export const DEFAULT_SEARCH_RESULTS = 5;
export const DEFAULT_SEARCH_TIMEOUT_MS = 10_000;

export interface WebSearchResult {
  title: string;
  link: string;
  snippet: string;
}

export interface WebSearchClient {
  search(query: string, signal?: AbortSignal): Promise<WebSearchResult[]>;
}

export interface SerperSearchConfig {
  apiKey: string;
  endpoint?: string;
  numResults?: number;
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof globalThis.fetch;
}

const serperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        title: z.string().default(''),
        link: z.string().default(''),
        snippet: z.string().default(''),
      })
    )
    .default([]),
});

/**
 * Web search through the Serper API (Google results).
 *
 * Rejects on HTTP errors and malformed bodies; callers decide whether a
 * failed search is fatal.
 */
export function createSerperSearchClient(config: SerperSearchConfig): WebSearchClient {
  const {
    apiKey,
    endpoint = SERPER_ENDPOINT,
    numResults = DEFAULT_SEARCH_RESULTS,
    timeoutMs = DEFAULT_SEARCH_TIMEOUT_MS,
    fetch = globalThis.fetch,
  } = config;

  return {
    async search(query, signal) {
      const timeout = AbortSignal.timeout(timeoutMs);
      const combined = signal ? combineSignals(signal, timeout) : undefined;

      try {
        const response = await fetch(endpoint, {
          method: 'POST',
          headers: {
            'X-API-KEY': apiKey,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({ q: query, num: numResults }),
          signal: combined?.signal ?? timeout,
        });

        if (!response.ok) {
          throw new Error(`Web search failed: HTTP ${response.status} ${response.statusText}`);
        }

        const body = serperResponseSchema.parse(await response.json());
        return body.organic.slice(0, numResults);
      } finally {
        combined?.dispose();
      }
    },
  };
}
