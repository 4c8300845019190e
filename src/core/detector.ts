import { createHash } from 'node:crypto';

import { LIMITS } from '../config/defaults.js';
import type { StepRecord } from '../schema/index.js';
import { actionTarget } from '../schema/index.js';

// ── Public types ─────────────────────────────────────────────

export type RunClassification = 'Progressing' | 'Stalled' | 'Looping';

export interface LoopEntry {
  /** Monotonic sequence number across the whole run. */
  seq: number;
  key: string;
  url: string;
  kind: string;
  target: string;
  changed: boolean;
  success: boolean;
}

// ── Loop key ────────────────────────────────────────────────

/** Hash of (url, action kind, target text or key). */
export function loopKey(url: string, kind: string, target: string): string {
  return createHash('sha256')
    .update([url, kind, target.trim().toLowerCase()].join('\n'))
    .digest('hex')
    .slice(0, 32);
}

export function didChange(record: StepRecord): boolean {
  return (
    record.urlChanged ||
    record.elementsAppeared.length > 0 ||
    record.elementsDisappeared.length > 0
  );
}

// ── LoopWindow ──────────────────────────────────────────────

/**
 * Fixed-capacity ring buffer of the most recent steps. Old entries
 * age out as new ones arrive; it is never reset mid-run.
 */
export class LoopWindow {
  readonly capacity: number;
  private readonly slots: Array<LoopEntry | undefined>;
  private next = 0;
  private size = 0;
  private seq = 0;

  constructor(capacity: number = LIMITS.LOOP_WINDOW_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LoopWindow capacity must be a positive integer, got ${String(capacity)}`);
    }
    this.capacity = capacity;
    this.slots = new Array<LoopEntry | undefined>(capacity).fill(undefined);
  }

  /** Add one executed step. Returns the stored entry. */
  record(record: StepRecord): LoopEntry {
    const target = actionTarget(record.action);
    const entry: LoopEntry = {
      seq: this.seq++,
      key: loopKey(record.stateBefore.url, record.action.kind, target),
      url: record.stateBefore.url,
      kind: record.action.kind,
      target,
      changed: didChange(record),
      success: record.success,
    };

    this.slots[this.next] = entry;
    this.next = (this.next + 1) % this.capacity;
    this.size = Math.min(this.size + 1, this.capacity);
    return entry;
  }

  /** Entries oldest → newest. */
  entries(): LoopEntry[] {
    const out: LoopEntry[] = [];
    for (let i = 0; i < this.size; i++) {
      const slot = this.slots[(this.next - this.size + i + this.capacity) % this.capacity];
      if (slot) out.push(slot);
    }
    return out;
  }

  latest(): LoopEntry | undefined {
    if (this.size === 0) return undefined;
    return this.slots[(this.next - 1 + this.capacity) % this.capacity];
  }
}

// ── Classification ──────────────────────────────────────────

/**
 * Classify the recent run behaviour.
 *
 * Looping: the newest entry's key occurs at least LOOP_REPEAT_THRESHOLD
 * times in the window. Stalled: the last STALL_STEPS entries changed
 * nothing observable. Looping wins when both hold.
 */
export function classify(window: LoopWindow): RunClassification {
  const entries = window.entries();
  const latest = entries[entries.length - 1];
  if (!latest) return 'Progressing';

  const repeats = entries.filter((e) => e.key === latest.key).length;
  if (repeats >= LIMITS.LOOP_REPEAT_THRESHOLD) return 'Looping';

  const tail = entries.slice(-LIMITS.STALL_STEPS);
  if (tail.length === LIMITS.STALL_STEPS && tail.every((e) => !e.changed)) {
    return 'Stalled';
  }

  return 'Progressing';
}

// ── Cumulative failures ─────────────────────────────────────

export function countFailures(steps: readonly StepRecord[]): number {
  return steps.filter((s) => !s.success).length;
}

export function isStuck(steps: readonly StepRecord[]): boolean {
  return countFailures(steps) >= LIMITS.MAX_FAILED_STEPS;
}
