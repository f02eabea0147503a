/**
 * LLM adapter types.
 * Every provider is reduced to one operation: a single-turn completion with
 * an optional system prompt, returning plain text plus usage and quota info.
 */

/** Normalized rate limit information from any provider's response headers. */
export interface RateLimitInfo {
  /** Maximum requests allowed in the rate limit window. */
  limitRequests?: number;
  /** Requests remaining in the current window. */
  remainingRequests?: number;
  /** Milliseconds until the request limit resets. */
  resetRequestsMs?: number;
  /** Maximum tokens allowed in the rate limit window. */
  limitTokens?: number;
  /** Tokens remaining in the current window. */
  remainingTokens?: number;
  /** Milliseconds until the token limit resets. */
  resetTokensMs?: number;
  /** Explicit retry-after from a 429 response, in milliseconds. */
  retryAfterMs?: number;
}

export interface CompletionRequest {
  model: string;
  prompt: string;
  system?: string;
  maxTokens: number;
  temperature?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/** What an adapter extracts from a provider's response body. */
export interface ParsedCompletion {
  text: string;
  model: string;
  usage: TokenUsage;
}

export interface CompletionResult extends ParsedCompletion {
  /** HTTP status code from the provider. */
  status: number;
  /** Time taken for the request in milliseconds. */
  latencyMs: number;
  /** Quota headers from the response, when the provider sent any. */
  rateLimit: RateLimitInfo | null;
}

/**
 * Uniform interface for LLM adapters. The LLM client works exclusively
 * through this interface.
 */
export interface LlmAdapter {
  /** Provider instance ID used in logs and usage rows. */
  readonly id: string;
  /** Provider type discriminator ('anthropic', 'openai'). */
  readonly providerType: string;
  /** API base URL. */
  readonly baseUrl: string;

  /**
   * Send one completion request.
   * @throws ProviderRateLimitError on 429 responses.
   * @throws ProviderError on other non-OK responses.
   * @throws MalformedResponseError when the body is not the expected shape.
   */
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResult>;

  /**
   * Parse rate limit information from the provider's response headers.
   * @returns Normalized rate limit info, or null if no rate limit headers present.
   */
  parseRateLimitHeaders(headers: Headers): RateLimitInfo | null;
}
