import { z } from 'zod';

import type { LLMClient } from './client.js';
import { LLMProviderError, parseRetryAfter, retryOnRateLimit } from './retry.js';

const PROVIDER = 'OpenAI';
const DEFAULT_MODEL = 'gpt-4o';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

const chatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .nonempty(),
});

class RateLimitResponse extends Error {
  readonly retryAfterMs: number | undefined;

  constructor(retryAfterMs: number | undefined) {
    super('rate limited');
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Chat Completions over plain fetch. JSON mode is requested because
 * every decision reply must be a single JSON object.
 */
export function createOpenAIClient(apiKey: string, model?: string): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  async function complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await fetch(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model: resolvedModel,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0.2,
        response_format: { type: 'json_object' },
      }),
    });

    if (response.status === 429) {
      throw new RateLimitResponse(parseRetryAfter(response.headers.get('retry-after')));
    }
    if (!response.ok) {
      throw new LLMProviderError(PROVIDER, await response.text(), response.status);
    }

    const parsed = chatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new LLMProviderError(PROVIDER, `unexpected response shape: ${parsed.error.message}`);
    }
    return parsed.data.choices[0].message.content ?? '';
  }

  return {
    generate: (systemPrompt, userPrompt) =>
      retryOnRateLimit(() => complete(systemPrompt, userPrompt), {
        provider: PROVIDER,
        rateLimit: (err) =>
          err instanceof RateLimitResponse ? { retryAfterMs: err.retryAfterMs } : undefined,
      }),
  };
}
