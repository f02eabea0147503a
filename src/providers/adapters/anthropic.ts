/**
 * Anthropic Messages API adapter.
 * Uses x-api-key auth and the anthropic-version header; quota headers carry
 * RFC 3339 reset timestamps rather than durations.
 */

import { z } from 'zod';
import { BaseAdapter } from '../base-adapter.js';
import { MalformedResponseError } from '../../shared/errors.js';
import type { CompletionRequest, ParsedCompletion, RateLimitInfo } from '../types.js';
import { compactRateLimitInfo, parseIntHeader, parseRetryAfterMs } from '../utils.js';

const DEFAULT_BASE_URL = 'https://api.anthropic.com/v1';
const API_VERSION = '2023-06-01';

const MessagesResponseSchema = z.object({
  model: z.string(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
  usage: z
    .object({
      input_tokens: z.number().int().nonnegative(),
      output_tokens: z.number().int().nonnegative(),
    })
    .optional(),
});

export class AnthropicAdapter extends BaseAdapter {
  constructor(id: string, apiKey: string, baseUrl?: string) {
    super(id, 'anthropic', apiKey, baseUrl ?? DEFAULT_BASE_URL);
  }

  protected override endpointPath(): string {
    return '/messages';
  }

  protected override getAuthHeaders(): Record<string, string> {
    return {
      'x-api-key': this.apiKey,
      'anthropic-version': API_VERSION,
    };
  }

  protected override buildRequestBody(request: CompletionRequest): Record<string, unknown> {
    return {
      model: request.model,
      max_tokens: request.maxTokens,
      ...(request.system !== undefined && { system: request.system }),
      ...(request.temperature !== undefined && { temperature: request.temperature }),
      messages: [{ role: 'user', content: request.prompt }],
    };
  }

  protected override parseResponseBody(payload: unknown, raw: string): ParsedCompletion {
    const result = MessagesResponseSchema.safeParse(payload);
    if (!result.success) {
      throw new MalformedResponseError(this.id, 'unexpected messages response shape', raw);
    }

    const text = result.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    if (text.length === 0) {
      throw new MalformedResponseError(this.id, 'response contained no text content', raw);
    }

    return {
      text,
      model: result.data.model,
      usage: {
        inputTokens: result.data.usage?.input_tokens ?? 0,
        outputTokens: result.data.usage?.output_tokens ?? 0,
      },
    };
  }

  /**
   * Parse Anthropic rate limit headers.
   *
   * Format:
   *   anthropic-ratelimit-requests-limit      -> max requests per minute
   *   anthropic-ratelimit-requests-remaining  -> remaining requests
   *   anthropic-ratelimit-requests-reset      -> RFC 3339 time of reset
   *   anthropic-ratelimit-tokens-limit        -> max tokens per minute
   *   anthropic-ratelimit-tokens-remaining    -> remaining tokens
   *   anthropic-ratelimit-tokens-reset        -> RFC 3339 time of reset
   *   retry-after                             -> seconds (only on 429)
   */
  override parseRateLimitHeaders(headers: Headers): RateLimitInfo | null {
    return compactRateLimitInfo<RateLimitInfo>({
      limitRequests: parseIntHeader(headers, 'anthropic-ratelimit-requests-limit'),
      remainingRequests: parseIntHeader(headers, 'anthropic-ratelimit-requests-remaining'),
      resetRequestsMs: msUntil(headers.get('anthropic-ratelimit-requests-reset')),
      limitTokens: parseIntHeader(headers, 'anthropic-ratelimit-tokens-limit'),
      remainingTokens: parseIntHeader(headers, 'anthropic-ratelimit-tokens-remaining'),
      resetTokensMs: msUntil(headers.get('anthropic-ratelimit-tokens-reset')),
      retryAfterMs: parseRetryAfterMs(headers),
    });
  }
}

function msUntil(timestamp: string | null): number | undefined {
  if (timestamp === null) return undefined;
  const at = Date.parse(timestamp);
  return isNaN(at) ? undefined : Math.max(0, at - Date.now());
}
