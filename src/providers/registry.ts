/**
 * Adapter factory: builds the configured LLM adapter.
 */

import { logger } from '../shared/logger.js';
import { ConfigError } from '../shared/errors.js';
import type { LlmConfig } from '../config/types.js';
import type { LlmAdapter } from './types.js';
import { AnthropicAdapter } from './adapters/anthropic.js';
import { OpenAIAdapter } from './adapters/openai.js';

/**
 * Create the adapter for the configured provider type.
 * @throws ConfigError if the type is unknown.
 */
export function createLlmAdapter(config: LlmConfig): LlmAdapter {
  const adapter = instantiate(config);

  logger.info(
    { provider: adapter.id, type: adapter.providerType, baseUrl: adapter.baseUrl },
    `Using LLM provider ${adapter.providerType} at ${adapter.baseUrl}`,
  );

  return adapter;
}

function instantiate(config: LlmConfig): LlmAdapter {
  switch (config.type) {
    case 'anthropic':
      return new AnthropicAdapter('anthropic', config.apiKey, config.baseUrl);
    case 'openai':
      return new OpenAIAdapter('openai', config.apiKey, config.baseUrl);
    default:
      throw new ConfigError(
        `Unknown LLM provider type '${String(config.type)}'. Supported types: anthropic, openai`,
      );
  }
}
