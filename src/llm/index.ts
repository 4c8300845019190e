/**
 * LLM module: the decision oracle behind one interface.
 * The only module that talks to model APIs.
 */

import type { LLMClient, LLMConfig } from './client.js';
import { KEY_VARIABLES } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockLLMClient, MockCall } from './mock.js';
export { LLMProviderError, retryOnRateLimit, parseRetryAfter } from './retry.js';
export type { RetryPolicy, RateLimited } from './retry.js';

function requireKey(config: LLMConfig, provider: keyof typeof KEY_VARIABLES): string {
  if (!config.apiKey) {
    throw new Error(`${KEY_VARIABLES[provider]} is required when using the ${provider} provider`);
  }
  return config.apiKey;
}

export function createLLMClient(config: LLMConfig): LLMClient {
  switch (config.provider) {
    case 'anthropic':
      return createAnthropicClient(requireKey(config, 'anthropic'), config.model);
    case 'openai':
      return createOpenAIClient(requireKey(config, 'openai'), config.model);
    case 'mock':
      return createMockClient();
  }
}
