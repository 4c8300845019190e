import Anthropic from '@anthropic-ai/sdk';

import type { LLMClient } from './client.js';
import { LLMProviderError, retryOnRateLimit } from './retry.js';

const PROVIDER = 'Anthropic';
const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 1024;

/** Messages API client; the SDK's own retries are off so ours apply. */
export function createAnthropicClient(apiKey: string, model?: string): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const response = await retryOnRateLimit(
        () =>
          client.messages.create({
            model: resolvedModel,
            max_tokens: MAX_TOKENS,
            temperature: 0.2,
            system: systemPrompt,
            messages: [{ role: 'user', content: userPrompt }],
          }),
        {
          provider: PROVIDER,
          rateLimit: (err) => (err instanceof Anthropic.RateLimitError ? {} : undefined),
        },
      );

      const text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('');
      if (text.length === 0) {
        throw new LLMProviderError(PROVIDER, 'reply contained no text');
      }
      return text;
    },
  };
}
