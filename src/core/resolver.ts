import type {
  Action,
  InteractiveElement,
  PageStateSnapshot,
  ProposedAction,
} from '../schema/index.js';
import { isActionKind } from '../schema/index.js';

// ── Public types ─────────────────────────────────────────────

export type ResolutionErrorCode = 'UnknownAction' | 'EmptyTarget';

export interface ResolutionError {
  code: ResolutionErrorCode;
  message: string;
}

export type MatchTier = 'exact' | 'case-insensitive' | 'substring';

export interface ElementMatch {
  element: InteractiveElement;
  tier: MatchTier;
}

export type ResolutionResult =
  | {
      ok: true;
      action: Action;
      /** Target matched no serialized element; execution still proceeds. */
      lowConfidence: boolean;
      match?: ElementMatch | undefined;
    }
  | { ok: false; error: ResolutionError };

// ── Element matching ─────────────────────────────────────────

function labelsOf(el: InteractiveElement): string[] {
  const labels = [el.accessibleText];
  if (el.identifierHint) labels.push(el.identifierHint);
  return labels.filter((l) => l.length > 0);
}

/**
 * Three-tier fallback match of `targetText` against the snapshot's
 * elements: exact, then case-insensitive, then substring (either
 * direction). The first element matching the earliest tier wins.
 */
export function matchElement(
  targetText: string,
  elements: readonly InteractiveElement[],
): ElementMatch | undefined {
  const target = targetText.trim();
  if (target.length === 0) return undefined;
  const lower = target.toLowerCase();

  const exact = elements.find((el) => labelsOf(el).some((l) => l === target));
  if (exact) return { element: exact, tier: 'exact' };

  const folded = elements.find((el) =>
    labelsOf(el).some((l) => l.toLowerCase() === lower),
  );
  if (folded) return { element: folded, tier: 'case-insensitive' };

  const partial = elements.find((el) =>
    labelsOf(el).some((l) => {
      const label = l.toLowerCase();
      return label.includes(lower) || lower.includes(label);
    }),
  );
  if (partial) return { element: partial, tier: 'substring' };

  return undefined;
}

// ── Resolver ─────────────────────────────────────────────────

/**
 * Validate and normalize a proposed action against the action
 * vocabulary and the current snapshot. Pure; performs no lookup in
 * the live page.
 */
export function resolveAction(
  proposed: ProposedAction,
  snapshot: PageStateSnapshot,
): ResolutionResult {
  const kind = proposed.kind.trim().toLowerCase();

  if (!isActionKind(kind)) {
    return reject('UnknownAction', `Unrecognized action kind "${proposed.kind}"`);
  }

  switch (kind) {
    case 'click': {
      const targetText = proposed.targetText?.trim() ?? '';
      if (targetText.length === 0) {
        return reject('EmptyTarget', 'Click requires a non-empty targetText');
      }
      return withPlausibility({ kind, targetText }, targetText, snapshot);
    }

    case 'type': {
      const targetText = proposed.targetText?.trim() ?? '';
      if (targetText.length === 0) {
        return reject('EmptyTarget', 'Type requires a non-empty targetText');
      }
      const value = proposed.value ?? '';
      return withPlausibility({ kind, targetText, value }, targetText, snapshot);
    }

    case 'press': {
      const key = proposed.key?.trim() ?? '';
      if (key.length === 0) {
        return reject('EmptyTarget', 'Press requires a non-empty key');
      }
      return { ok: true, action: { kind, key }, lowConfidence: false };
    }

    case 'wait':
      return {
        ok: true,
        action: { kind, durationHint: proposed.durationHint ?? 'short' },
        lowConfidence: false,
      };

    case 'finish':
      return {
        ok: true,
        action: { kind, reason: proposed.reason?.trim() || 'task complete' },
        lowConfidence: false,
      };
  }
}

function withPlausibility(
  action: Action,
  targetText: string,
  snapshot: PageStateSnapshot,
): ResolutionResult {
  const match = matchElement(targetText, snapshot.interactiveElements);
  return { ok: true, action, lowConfidence: match === undefined, match };
}

function reject(code: ResolutionErrorCode, message: string): ResolutionResult {
  return { ok: false, error: { code, message } };
}
