import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"action":"finish","reason":"mock provider"}';

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
}

export interface MockLLMClient extends LLMClient {
  /** Every prompt pair received, in call order. */
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for testing and dry runs.
 * Returns the provided canned responses in order, then falls back to
 * the last one (or a finish action when none were given).
 */
export function createMockClient(
  responses?: readonly string[],
): MockLLMClient {
  const calls: MockCall[] = [];

  return {
    calls,

    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      calls.push({ systemPrompt, userPrompt });
      const index = Math.min(calls.length - 1, (responses?.length ?? 1) - 1);
      return responses?.[index] ?? DEFAULT_RESPONSE;
    },
  };
}
