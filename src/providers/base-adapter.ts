/**
 * Abstract base adapter with shared HTTP request logic.
 * Concrete adapters supply the endpoint, auth headers, body shape and
 * response parsing for their provider.
 */

import { logger } from '../shared/logger.js';
import { MalformedResponseError, ProviderError, ProviderRateLimitError } from '../shared/errors.js';
import type {
  CompletionRequest,
  CompletionResult,
  LlmAdapter,
  ParsedCompletion,
  RateLimitInfo,
} from './types.js';

export abstract class BaseAdapter implements LlmAdapter {
  public readonly id: string;
  public readonly providerType: string;
  public readonly baseUrl: string;
  protected readonly apiKey: string;

  constructor(id: string, providerType: string, apiKey: string, baseUrl: string) {
    this.id = id;
    this.providerType = providerType;
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * Send a completion request to the provider.
   * Handles URL construction, headers, latency measurement, and error detection.
   */
  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResult> {
    const url = `${this.baseUrl}${this.endpointPath()}`;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.getAuthHeaders(),
    };

    logger.debug({ provider: this.id, model: request.model, url }, 'Sending completion request');

    const start = performance.now();

    const response = await fetch(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(this.buildRequestBody(request)),
      signal,
    });

    const latencyMs = Math.round(performance.now() - start);

    if (response.status === 429) {
      const responseBody = await response.text();
      logger.warn({ provider: this.id, model: request.model, latencyMs }, 'Provider returned 429 rate limit');
      throw new ProviderRateLimitError(this.id, response.headers, responseBody);
    }

    if (!response.ok) {
      const errorText = await response.text();
      logger.error(
        { provider: this.id, model: request.model, status: response.status, latencyMs },
        'Provider returned error',
      );
      throw new ProviderError(this.id, response.status, errorText);
    }

    const raw = await response.text();
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      throw new MalformedResponseError(this.id, 'body is not valid JSON', raw);
    }

    const parsed = this.parseResponseBody(payload, raw);

    logger.debug(
      { provider: this.id, model: parsed.model, status: response.status, latencyMs },
      'Completion succeeded',
    );

    return {
      ...parsed,
      status: response.status,
      latencyMs,
      rateLimit: this.parseRateLimitHeaders(response.headers),
    };
  }

  /** Path appended to the base URL, starting with '/'. */
  protected abstract endpointPath(): string;

  /** Provider-specific authentication and version headers. */
  protected abstract getAuthHeaders(): Record<string, string>;

  /** Provider-specific request body. */
  protected abstract buildRequestBody(request: CompletionRequest): Record<string, unknown>;

  /**
   * Extract text, model and usage from a decoded body.
   * @throws MalformedResponseError when the body does not match the provider's shape.
   */
  protected abstract parseResponseBody(payload: unknown, raw: string): ParsedCompletion;

  abstract parseRateLimitHeaders(headers: Headers): RateLimitInfo | null;
}
