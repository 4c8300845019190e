import { LIMITS } from '../config/defaults.js';
import type { FailureKind, StepRecord } from '../schema/index.js';
import { actionTarget } from '../schema/index.js';
import { didChange } from './detector.js';

// ── History summary ──────────────────────────────────────────
// Advisory context for the oracle so it can avoid repeating a
// just-failed action. Values are the recorded ones, so credentials
// only ever appear as placeholders.

export interface HistoryEntry {
  index: number;
  kind: string;
  target: string;
  value?: string | undefined;
  success: boolean;
  failureKind?: FailureKind | undefined;
  changed: boolean;
}

export type HistorySummary = readonly HistoryEntry[];

export function summarizeHistory(
  steps: readonly StepRecord[],
  limit: number = LIMITS.HISTORY_ENTRIES,
): HistorySummary {
  return steps.slice(-limit).map((s) => ({
    index: s.index,
    kind: s.action.kind,
    target: actionTarget(s.action),
    value: s.action.value,
    success: s.success,
    failureKind: s.failureKind,
    changed: didChange(s),
  }));
}

export function formatHistory(history: HistorySummary): string {
  if (history.length === 0) return '(no actions taken yet)';

  return history
    .map((entry) => {
      const icon = entry.success ? '✓' : '✗';
      const value = entry.value !== undefined ? ` = "${entry.value}"` : '';
      const target = entry.target ? ` "${entry.target}"` : '';
      const outcome = entry.success
        ? entry.changed ? 'page changed' : 'no visible change'
        : `failed (${entry.failureKind ?? 'unknown'})`;
      return `${String(entry.index + 1)}. [${entry.kind}]${target}${value} → ${icon} ${outcome}`;
    })
    .join('\n');
}
