import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { delay } from '../utils/timeout.js';

// ── Provider error ───────────────────────────────────────────

export class LLMProviderError extends Error {
  readonly provider: string;
  readonly status: number | undefined;

  constructor(provider: string, message: string, status?: number) {
    super(`${provider}: ${message}`);
    this.name = 'LLMProviderError';
    this.provider = provider;
    this.status = status;
  }
}

// ── Rate-limit retry ─────────────────────────────────────────

export interface RateLimited {
  /** Server-suggested wait, when the provider sent one. */
  retryAfterMs?: number | undefined;
}

export interface RetryPolicy {
  provider: string;
  /** Classify a thrown error; undefined means "not a rate limit". */
  rateLimit: (err: unknown) => RateLimited | undefined;
  maxAttempts?: number | undefined;
  baseDelayMs?: number | undefined;
}

/**
 * Run `fn`, retrying only on rate limits with linear backoff
 * (or the provider's Retry-After). Other errors propagate at once.
 */
export async function retryOnRateLimit<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
): Promise<T> {
  const maxAttempts = policy.maxAttempts ?? LIMITS.MAX_LLM_RETRIES;
  const baseDelayMs = policy.baseDelayMs ?? 5_000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const limited = policy.rateLimit(err);
      if (!limited) throw err;
      if (attempt >= maxAttempts) {
        throw new LLMProviderError(policy.provider, `still rate limited after ${String(attempt)} attempts`, 429);
      }

      const waitMs = limited.retryAfterMs ?? attempt * baseDelayMs;
      log.warn(`${policy.provider} rate limited, retrying in ${String(Math.round(waitMs / 1000))}s...`);
      await delay(waitMs);
    }
  }
}

export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) return undefined;
  const seconds = Number.parseFloat(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}
