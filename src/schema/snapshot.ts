import { z } from 'zod';

// ── InteractiveElement ───────────────────────────────────────

export const interactiveElementSchema = z.object({
  role: z.string().min(1),
  accessibleText: z.string(),
  identifierHint: z.string().optional(),
  inputType: z.string().optional(),
});

export type InteractiveElement = z.infer<typeof interactiveElementSchema>;

// ── PageStateSnapshot ────────────────────────────────────────

export const pageStateSnapshotSchema = z.object({
  url: z.string().min(1),
  interactiveElements: z.array(interactiveElementSchema),
  visibleText: z.array(z.string()),
});

export type PageStateSnapshot = z.infer<typeof pageStateSnapshotSchema>;

// ── Element identity ─────────────────────────────────────────

/** Stable identity used when diffing two snapshots. */
export function elementKey(el: InteractiveElement): string {
  return [el.role, el.accessibleText, el.identifierHint ?? '', el.inputType ?? ''].join('\u0000');
}

/** Human-readable one-liner for reports and history. */
export function describeElement(el: InteractiveElement): string {
  const type = el.inputType ? `[${el.inputType}]` : '';
  const text = el.accessibleText || el.identifierHint || '';
  return `${el.role}${type} "${text}"`;
}

export function isPasswordInput(el: InteractiveElement): boolean {
  return el.inputType?.toLowerCase() === 'password';
}

export function hasPasswordInput(snapshot: PageStateSnapshot): boolean {
  return snapshot.interactiveElements.some(isPasswordInput);
}
