/**
 * LLM client: the single path every prompt takes to the provider.
 *
 * Each attempt waits on the shared rate limiter, calls the adapter with a
 * timeout, and converts transport failures into the error taxonomy. Attempts
 * are retried per the configured policy; only ApiError (and RateLimitError)
 * is retried, anything else propagates on the first failure.
 */

import type { z } from 'zod';
import { ApiError, MalformedResponseError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { toTaxonomyError } from '../resilience/classify.js';
import { validateInput } from '../resilience/guards.js';
import { runWithRetry } from '../resilience/retry.js';
import type { RateLimiter } from '../resilience/rate-limiter.js';
import { systemClock, type Clock } from '../resilience/clock.js';
import type { RetryPolicy } from '../resilience/types.js';
import type { UsageLogger } from '../persistence/usage-logger.js';
import type { CompletionRequest, CompletionResult, LlmAdapter, RateLimitInfo } from '../providers/types.js';

export interface LlmClientOptions {
  model: string;
  limiter: RateLimiter;
  /** Default output budget per request. */
  maxTokens: number;
  /** Per-attempt timeout. */
  timeoutMs: number;
  retryPolicy?: Partial<Omit<RetryPolicy, 'retryOn'>>;
  usageLogger?: UsageLogger;
  clock?: Clock;
}

export interface CompleteOptions {
  system?: string;
  maxTokens?: number;
  temperature?: number;
  /** Label for logs and usage rows. */
  operation?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull a JSON object out of model output. Accepts a bare object, one wrapped
 * in a ``` or ```json fence, or one surrounded by prose.
 *
 * @throws MalformedResponseError when no JSON object can be recovered.
 */
export function extractJsonObject(text: string, source: string = 'llm'): Record<string, unknown> {
  let candidate = text.trim();

  const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```\s*$/.exec(candidate);
  if (fenced?.[1] !== undefined) {
    candidate = fenced[1].trim();
  }

  const attempts = [candidate];
  const open = candidate.indexOf('{');
  const close = candidate.lastIndexOf('}');
  if (open !== -1 && close > open && (open > 0 || close < candidate.length - 1)) {
    attempts.push(candidate.slice(open, close + 1));
  }

  for (const attempt of attempts) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(attempt);
    } catch {
      continue;
    }
    if (isRecord(parsed)) {
      return parsed;
    }
  }

  throw new MalformedResponseError(source, 'response is not a JSON object', text);
}

/**
 * How long to hold off after a response whose quota headers report an
 * exhausted window, or null when quota remains (or the provider sent none).
 */
export function quotaPauseMs(rateLimit: RateLimitInfo | null): number | null {
  if (rateLimit === null) return null;
  const waits: number[] = [];
  if (rateLimit.remainingRequests === 0 && rateLimit.resetRequestsMs !== undefined) {
    waits.push(rateLimit.resetRequestsMs);
  }
  if (rateLimit.remainingTokens === 0 && rateLimit.resetTokensMs !== undefined) {
    waits.push(rateLimit.resetTokensMs);
  }
  return waits.length === 0 ? null : Math.max(...waits);
}

export class LlmClient {
  private readonly adapter: LlmAdapter;
  private readonly options: LlmClientOptions;
  private readonly clock: Clock;
  /** Clock time before which the provider said its quota is spent. */
  private quotaResumesAt: number | null = null;

  constructor(adapter: LlmAdapter, options: LlmClientOptions) {
    this.adapter = adapter;
    this.options = options;
    this.clock = options.clock ?? systemClock;
  }

  get model(): string {
    return this.options.model;
  }

  /** Send one prompt and return the completion. */
  async complete(prompt: string, options: CompleteOptions = {}): Promise<CompletionResult> {
    return this.execute(prompt, options, (result) => result);
  }

  /**
   * Send one prompt whose answer must be a JSON object matching `schema`.
   * An unusable answer counts as a failed attempt and is retried.
   */
  async completeJson<T>(prompt: string, schema: z.ZodType<T>, options: CompleteOptions = {}): Promise<T> {
    return this.execute(prompt, options, (result) => {
      const payload = extractJsonObject(result.text, this.adapter.id);
      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
        throw new MalformedResponseError(this.adapter.id, `missing or invalid fields: ${fields}`, result.text);
      }
      return parsed.data;
    });
  }

  private async execute<T>(
    prompt: string,
    options: CompleteOptions,
    transform: (result: CompletionResult) => T,
  ): Promise<T> {
    validateInput(prompt.trim().length > 0, 'Prompt must not be empty');

    const operation = options.operation ?? 'llm.complete';
    const request: CompletionRequest = {
      model: this.options.model,
      prompt,
      maxTokens: options.maxTokens ?? this.options.maxTokens,
      ...(options.system !== undefined && { system: options.system }),
      ...(options.temperature !== undefined && { temperature: options.temperature }),
    };

    const startedAt = Date.now();
    const start = performance.now();
    let attempts = 0;

    try {
      const { value, result } = await runWithRetry(
        async (attempt) => {
          attempts = attempt + 1;
          await this.waitForQuota();
          await this.options.limiter.throttle();
          try {
            const completion = await this.adapter.complete(request, AbortSignal.timeout(this.options.timeoutMs));
            return { value: transform(completion), result: completion };
          } catch (error: unknown) {
            throw toTaxonomyError(error, this.adapter.id);
          }
        },
        { ...this.options.retryPolicy, retryOn: [ApiError] },
        { name: operation, clock: this.clock },
      );

      this.trackQuota(result.rateLimit);

      this.options.usageLogger?.log({
        timestamp: startedAt,
        service: this.adapter.id,
        endpoint: operation,
        model: result.model,
        inputTokens: result.usage.inputTokens,
        outputTokens: result.usage.outputTokens,
        outcome: 'success',
        httpStatus: result.status,
        latencyMs: performance.now() - start,
        attempts,
        remainingRequests: result.rateLimit?.remainingRequests,
        remainingTokens: result.rateLimit?.remainingTokens,
      });

      return value;
    } catch (error: unknown) {
      this.options.usageLogger?.log({
        timestamp: startedAt,
        service: this.adapter.id,
        endpoint: operation,
        model: request.model,
        inputTokens: 0,
        outputTokens: 0,
        outcome: 'error',
        httpStatus: error instanceof ApiError ? error.statusCode : undefined,
        latencyMs: performance.now() - start,
        attempts,
        errorMessage: errorMessage(error),
      });
      logger.debug({ operation, attempts }, 'LLM call failed');
      throw error;
    }
  }

  private trackQuota(rateLimit: RateLimitInfo | null): void {
    const pauseMs = quotaPauseMs(rateLimit);
    if (pauseMs === null) return;
    this.quotaResumesAt = this.clock.now() + pauseMs;
    logger.warn(
      { provider: this.adapter.id, pauseMs },
      `${this.adapter.id} quota exhausted. Pausing ${pauseMs}ms before the next call`,
    );
  }

  private async waitForQuota(): Promise<void> {
    if (this.quotaResumesAt === null) return;
    const waitMs = Math.ceil(this.quotaResumesAt - this.clock.now());
    this.quotaResumesAt = null;
    if (waitMs > 0) {
      await this.clock.sleep(waitMs);
    }
  }
}
