import { z } from 'zod';

// ── LLMClient interface ──────────────────────────────────────

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

export const KEY_VARIABLES = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const;

// ── Env loader ───────────────────────────────────────────────

/** Values from a config file; they win over the environment. */
export interface LLMConfigOverrides {
  provider?: LLMProvider | undefined;
  model?: string | undefined;
}

// dotenv turns `NAME=` into an empty string; that means unset
function setting(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: LLMConfigOverrides = {},
): LLMConfig {
  const requested = overrides.provider ?? setting(env, 'LLM_PROVIDER') ?? 'openai';
  const parsed = llmProviderSchema.safeParse(requested);
  if (!parsed.success) {
    throw new Error(
      `LLM_PROVIDER must be one of ${llmProviderSchema.options.join(', ')} (got "${requested}")`,
    );
  }
  const provider = parsed.data;

  // The key always belongs to the provider actually used
  const apiKey = provider === 'mock' ? undefined : setting(env, KEY_VARIABLES[provider]);

  return llmConfigSchema.parse({
    provider,
    apiKey,
    model: overrides.model ?? setting(env, 'PAGEPILOT_MODEL'),
  });
}
