import { TIMEOUTS } from '../config/defaults.js';
import type { LLMClient } from '../llm/index.js';
import type { DurationHint, ProposedAction } from '../schema/index.js';
import { SAFE_DEFAULT_ACTION, durationHintSchema, proposedActionSchema } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { DecisionPromptInput } from './prompt.js';
import { buildDecisionPrompt } from './prompt.js';

// ── Public types ─────────────────────────────────────────────

export type DecisionRequest = DecisionPromptInput;

export interface Decision {
  action: ProposedAction;
  /** Set when the reply was unusable and the safe default was substituted. */
  failure?: 'DecisionParseFailure' | undefined;
  failureMessage?: string | undefined;
  rawReply: string;
}

export interface DecideOptions {
  timeoutMs?: number | undefined;
}

export type ReplyParseResult =
  | { ok: true; action: ProposedAction; strategy: 'strict' | 'extracted' }
  | { ok: false; error: string };

// ── Main entry ───────────────────────────────────────────────

/**
 * Ask the oracle for the next action. Never throws: provider errors,
 * timeouts and unusable replies all yield the safe default action
 * flagged as a DecisionParseFailure.
 */
export async function decide(
  client: LLMClient,
  request: DecisionRequest,
  options: DecideOptions = {},
): Promise<Decision> {
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.DECISION_TIMEOUT;

  let raw: string;
  try {
    const prompt = await buildDecisionPrompt(request);
    raw = await withTimeout(
      client.generate(prompt.systemPrompt, prompt.userPrompt),
      timeoutMs,
      'Decision oracle call',
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Decision call failed: ${message}`);
    return fallback('', message);
  }

  const parsed = parseDecisionReply(raw);
  if (parsed.ok) {
    if (parsed.strategy === 'extracted') {
      log.detail('Oracle reply contained extra text; used the embedded JSON object');
    }
    return { action: parsed.action, rawReply: raw };
  }

  log.warn(`Oracle reply unusable (${parsed.error}): ${raw.slice(0, 200)}`);
  return fallback(raw, parsed.error);
}

function fallback(rawReply: string, message: string): Decision {
  return {
    action: SAFE_DEFAULT_ACTION,
    failure: 'DecisionParseFailure',
    failureMessage: message,
    rawReply,
  };
}

// ── Reply parsing ────────────────────────────────────────────

/**
 * Strict parse of the whole reply first; on failure, parse the first
 * balanced JSON object embedded in it.
 */
export function parseDecisionReply(raw: string): ReplyParseResult {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return { ok: false, error: 'empty reply' };

  const strict = tryParseCandidate(trimmed);
  if (strict.ok) return { ok: true, action: strict.action, strategy: 'strict' };

  const embedded = extractFirstJsonObject(trimmed);
  if (embedded === undefined) {
    return { ok: false, error: `no JSON object found (${strict.error})` };
  }

  const extracted = tryParseCandidate(embedded);
  if (extracted.ok) return { ok: true, action: extracted.action, strategy: 'extracted' };

  return { ok: false, error: extracted.error };
}

function tryParseCandidate(
  text: string,
): { ok: true; action: ProposedAction } | { ok: false; error: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }

  const result = proposedActionSchema.safeParse(normalizeReply(parsed));
  if (!result.success) {
    return { ok: false, error: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  return { ok: true, action: result.data };
}

/**
 * Return the first `{...}` substring whose braces balance, skipping
 * braces inside JSON strings. Undefined when there is none.
 */
export function extractFirstJsonObject(text: string): string | undefined {
  let start = text.indexOf('{');

  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];

      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }

      if (ch === '"') inString = true;
      else if (ch === '{') depth++;
      else if (ch === '}') {
        depth--;
        if (depth === 0) return text.slice(start, i + 1);
      }
    }

    // Unbalanced from this brace; try the next opening brace
    start = text.indexOf('{', start + 1);
  }

  return undefined;
}

// ── Pre-validation fixups ────────────────────────────────────
// Oracles drift between field spellings ("target_text", "seconds",
// "summary", a nested "action" object). Map them onto the schema
// before validation.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(obj: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}

export function secondsToHint(seconds: number): DurationHint {
  if (seconds <= 1) return 'short';
  if (seconds <= 3) return 'medium';
  return 'long';
}

function toDurationHint(obj: Record<string, unknown>): DurationHint | undefined {
  const hint = durationHintSchema.safeParse(obj['durationHint']);
  if (hint.success) return hint.data;

  for (const key of ['durationHint', 'seconds', 'duration']) {
    const value = obj[key];
    if (typeof value === 'number' && Number.isFinite(value)) return secondsToHint(value);
  }
  return undefined;
}

export function normalizeReply(parsed: unknown): unknown {
  if (!isRecord(parsed)) return parsed;

  // {"action": {"kind": "click", ...}} → the inner object
  const nested = parsed['action'];
  if (isRecord(nested)) return normalizeReply(nested);

  const kind = firstString(parsed, ['kind', 'action', 'type']);
  const out: Record<string, unknown> = { kind: kind?.trim().toLowerCase() };

  const targetText = firstString(parsed, ['targetText', 'target_text', 'target_field', 'target', 'field', 'element']);
  if (targetText !== undefined) out['targetText'] = targetText;

  const value = firstString(parsed, ['value', 'text']);
  if (value !== undefined) out['value'] = value;

  const key = firstString(parsed, ['key']);
  if (key !== undefined) out['key'] = key;

  const durationHint = toDurationHint(parsed);
  if (durationHint !== undefined) out['durationHint'] = durationHint;

  const reason = firstString(parsed, ['reason', 'summary']);
  if (reason !== undefined) out['reason'] = reason;

  return out;
}
