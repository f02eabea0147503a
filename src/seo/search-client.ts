/**
 * Search-ranking data source client (SerpAPI-style JSON endpoint).
 * Returns the "related searches" a results page lists for a query.
 */

import { z } from 'zod';
import {
  ApiError,
  MalformedResponseError,
  ProviderError,
  ProviderRateLimitError,
  errorMessage,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { toTaxonomyError } from '../resilience/classify.js';
import { validateInput } from '../resilience/guards.js';
import { runWithRetry } from '../resilience/retry.js';
import type { RateLimiter } from '../resilience/rate-limiter.js';
import type { Clock } from '../resilience/clock.js';
import type { RetryPolicy } from '../resilience/types.js';
import type { UsageLogger } from '../persistence/usage-logger.js';
import type { SearchConfig } from '../config/types.js';

const SERVICE = 'search';

const SearchResponseSchema = z.object({
  related_searches: z
    .array(z.object({ query: z.string().optional() }))
    .optional(),
});

export interface SearchClientOptions {
  limiter: RateLimiter;
  timeoutMs: number;
  retryPolicy?: Partial<Omit<RetryPolicy, 'retryOn'>>;
  usageLogger?: UsageLogger;
  clock?: Clock;
}

/** Abstraction the SEO engine depends on. */
export interface RelatedSearchSource {
  relatedSearches(query: string): Promise<string[]>;
}

export class SearchClient implements RelatedSearchSource {
  private readonly config: SearchConfig;
  private readonly options: SearchClientOptions;

  constructor(config: SearchConfig, options: SearchClientOptions) {
    this.config = config;
    this.options = options;
  }

  /**
   * Related search queries for `query`, in the order the source lists them.
   * @throws ValidationError when no search API key is configured or the query is empty.
   */
  async relatedSearches(query: string): Promise<string[]> {
    validateInput(this.config.apiKey.length > 0, 'Search API key is required (search.apiKey)');
    validateInput(query.trim().length > 0, 'Search query must not be empty');

    const url = new URL(this.config.baseUrl);
    url.search = new URLSearchParams({
      engine: 'google',
      q: query,
      location: this.config.location,
      google_domain: 'google.com',
      gl: 'us',
      hl: 'en',
      api_key: this.config.apiKey,
    }).toString();

    const startedAt = Date.now();
    const start = performance.now();
    let attempts = 0;

    try {
      const { queries, status } = await runWithRetry(
        async (attempt) => {
          attempts = attempt + 1;
          await this.options.limiter.throttle();
          try {
            return await this.fetchRelated(url);
          } catch (error: unknown) {
            throw toTaxonomyError(error, SERVICE);
          }
        },
        { ...this.options.retryPolicy, retryOn: [ApiError] },
        { name: `search "${query}"`, clock: this.options.clock },
      );

      this.options.usageLogger?.log({
        timestamp: startedAt,
        service: SERVICE,
        endpoint: url.pathname,
        inputTokens: 0,
        outputTokens: 0,
        outcome: 'success',
        httpStatus: status,
        latencyMs: performance.now() - start,
        attempts,
      });

      logger.debug({ query, related: queries.length }, 'Fetched related searches');
      return queries;
    } catch (error: unknown) {
      this.options.usageLogger?.log({
        timestamp: startedAt,
        service: SERVICE,
        endpoint: url.pathname,
        inputTokens: 0,
        outputTokens: 0,
        outcome: 'error',
        httpStatus: error instanceof ApiError ? error.statusCode : undefined,
        latencyMs: performance.now() - start,
        attempts,
        errorMessage: errorMessage(error),
      });
      throw error;
    }
  }

  private async fetchRelated(url: URL): Promise<{ queries: string[]; status: number }> {
    const response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (response.status === 429) {
      throw new ProviderRateLimitError(SERVICE, response.headers, await response.text());
    }
    if (!response.ok) {
      throw new ProviderError(SERVICE, response.status, await response.text());
    }

    const raw = await response.text();
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      throw new MalformedResponseError(SERVICE, 'body is not valid JSON', raw);
    }

    const parsed = SearchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedResponseError(SERVICE, 'unexpected related_searches shape', raw);
    }

    const queries = (parsed.data.related_searches ?? [])
      .map((item) => item.query?.trim() ?? '')
      .filter((q) => q.length > 0);

    return { queries, status: response.status };
  }
}
