import type { PageStateSnapshot } from '../schema/index.js';

// ── Action outcome ──────────────────────────────────────────

export type ExecutionFailureKind = 'ElementNotFound' | 'ActionTimeout';

export type ActionOutcome =
  | { ok: true }
  | { ok: false; failure: ExecutionFailureKind; message: string };

export interface ActionOptions {
  /** Per-attempt ceiling for the underlying primitive. */
  timeoutMs?: number | undefined;
  /** Skip text matching and start at role-based lookup. */
  escalate?: boolean | undefined;
}

/** Opaque reference to a stored screenshot; null when capture failed. */
export type ScreenshotHandle = string | null;

// ── Collaborators ───────────────────────────────────────────

/**
 * Generic browser primitives. Every action resolves to an outcome;
 * element lookup and timeouts never throw past this boundary.
 */
export interface BrowserController {
  navigate(url: string): Promise<void>;
  click(targetText: string, options?: ActionOptions): Promise<ActionOutcome>;
  type(targetText: string, value: string, options?: ActionOptions): Promise<ActionOutcome>;
  press(key: string, options?: ActionOptions): Promise<ActionOutcome>;
  wait(durationMs: number): Promise<ActionOutcome>;
  screenshot(name: string): Promise<ScreenshotHandle>;
  /** Wait for DOM/network quiescence, bounded by the ceiling. */
  settle?(ceilingMs: number): Promise<void>;
  close(): Promise<void>;
}

/** Read-only, app-agnostic page serialization. */
export interface PageSerializer {
  serialize(): Promise<PageStateSnapshot>;
}

export function ok(): ActionOutcome {
  return { ok: true };
}

export function failed(failure: ExecutionFailureKind, message: string): ActionOutcome {
  return { ok: false, failure, message };
}
