/**
 * OpenAI-compatible chat completions adapter.
 * Also serves any endpoint that follows the OpenAI API (set baseUrl).
 */

import { z } from 'zod';
import { BaseAdapter } from '../base-adapter.js';
import { MalformedResponseError } from '../../shared/errors.js';
import type { CompletionRequest, ParsedCompletion, RateLimitInfo } from '../types.js';
import {
  compactRateLimitInfo,
  parseDurationToMs,
  parseIntHeader,
  parseRetryAfterMs,
} from '../utils.js';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

const ChatCompletionResponseSchema = z.object({
  model: z.string(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative(),
      completion_tokens: z.number().int().nonnegative(),
    })
    .optional(),
});

export class OpenAIAdapter extends BaseAdapter {
  constructor(id: string, apiKey: string, baseUrl?: string) {
    super(id, 'openai', apiKey, baseUrl ?? DEFAULT_BASE_URL);
  }

  protected override endpointPath(): string {
    return '/chat/completions';
  }

  protected override getAuthHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  protected override buildRequestBody(request: CompletionRequest): Record<string, unknown> {
    const messages = [
      ...(request.system !== undefined ? [{ role: 'system', content: request.system }] : []),
      { role: 'user', content: request.prompt },
    ];
    return {
      model: request.model,
      max_tokens: request.maxTokens,
      ...(request.temperature !== undefined && { temperature: request.temperature }),
      messages,
      stream: false,
    };
  }

  protected override parseResponseBody(payload: unknown, raw: string): ParsedCompletion {
    const result = ChatCompletionResponseSchema.safeParse(payload);
    if (!result.success) {
      throw new MalformedResponseError(this.id, 'unexpected chat completion shape', raw);
    }

    const text = result.data.choices[0]?.message.content ?? '';
    if (text.length === 0) {
      throw new MalformedResponseError(this.id, 'response contained no text content', raw);
    }

    return {
      text,
      model: result.data.model,
      usage: {
        inputTokens: result.data.usage?.prompt_tokens ?? 0,
        outputTokens: result.data.usage?.completion_tokens ?? 0,
      },
    };
  }

  /**
   * Parse OpenAI rate limit headers.
   *
   * Format:
   *   x-ratelimit-limit-requests       -> max requests
   *   x-ratelimit-remaining-requests   -> remaining requests
   *   x-ratelimit-reset-requests       -> duration string until request reset
   *   x-ratelimit-limit-tokens         -> max tokens (TPM)
   *   x-ratelimit-remaining-tokens     -> remaining tokens
   *   x-ratelimit-reset-tokens         -> duration string until token reset
   *   retry-after                      -> seconds (only on 429)
   */
  override parseRateLimitHeaders(headers: Headers): RateLimitInfo | null {
    const resetReq = headers.get('x-ratelimit-reset-requests');
    const resetTok = headers.get('x-ratelimit-reset-tokens');

    return compactRateLimitInfo<RateLimitInfo>({
      limitRequests: parseIntHeader(headers, 'x-ratelimit-limit-requests'),
      remainingRequests: parseIntHeader(headers, 'x-ratelimit-remaining-requests'),
      resetRequestsMs: resetReq === null ? undefined : parseDurationToMs(resetReq),
      limitTokens: parseIntHeader(headers, 'x-ratelimit-limit-tokens'),
      remainingTokens: parseIntHeader(headers, 'x-ratelimit-remaining-tokens'),
      resetTokensMs: resetTok === null ? undefined : parseDurationToMs(resetTok),
      retryAfterMs: parseRetryAfterMs(headers),
    });
  }
}
