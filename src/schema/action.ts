import { z } from 'zod';

// ── Action vocabulary ────────────────────────────────────────

export const ACTION_KINDS = ['click', 'type', 'press', 'wait', 'finish'] as const;

export const actionKindSchema = z.enum(ACTION_KINDS);

export type ActionKind = z.infer<typeof actionKindSchema>;

export const durationHintSchema = z.enum(['short', 'medium', 'long']);

export type DurationHint = z.infer<typeof durationHintSchema>;

// ── Individual action schemas ────────────────────────────────

export const clickActionSchema = z.object({
  kind: z.literal('click'),
  targetText: z.string(),
});

export const typeActionSchema = z.object({
  kind: z.literal('type'),
  targetText: z.string(),
  value: z.string(),
});

export const pressActionSchema = z.object({
  kind: z.literal('press'),
  key: z.string(),
});

export const waitActionSchema = z.object({
  kind: z.literal('wait'),
  durationHint: durationHintSchema,
});

export const finishActionSchema = z.object({
  kind: z.literal('finish'),
  reason: z.string(),
});

// ── Union schema ─────────────────────────────────────────────

export const actionSchema = z.discriminatedUnion('kind', [
  clickActionSchema,
  typeActionSchema,
  pressActionSchema,
  waitActionSchema,
  finishActionSchema,
]);

export type Action = z.infer<typeof actionSchema>;

export type ClickAction = z.infer<typeof clickActionSchema>;
export type TypeAction = z.infer<typeof typeActionSchema>;
export type PressAction = z.infer<typeof pressActionSchema>;
export type WaitAction = z.infer<typeof waitActionSchema>;
export type FinishAction = z.infer<typeof finishActionSchema>;

// ── Proposed (unresolved) action ─────────────────────────────
// What the oracle proposed, before the resolver has checked the
// variant and payload. Every Action is also a ProposedAction.

export const proposedActionSchema = z.object({
  kind: z.string().min(1),
  targetText: z.string().optional(),
  value: z.string().optional(),
  key: z.string().optional(),
  durationHint: durationHintSchema.optional(),
  reason: z.string().optional(),
});

export type ProposedAction = z.infer<typeof proposedActionSchema>;

/** The fallback the loop always receives when the oracle reply is unusable. */
export const SAFE_DEFAULT_ACTION: WaitAction = {
  kind: 'wait',
  durationHint: 'short',
};

// ── Type guards ──────────────────────────────────────────────

export function isActionKind(kind: string): kind is ActionKind {
  return ACTION_KINDS.some((k) => k === kind);
}

// ── Description helper ───────────────────────────────────────

/** Target of an action as used for loop keys and history: text, key, or ''. */
export function actionTarget(action: ProposedAction): string {
  return action.targetText ?? action.key ?? '';
}

/** Human-readable one-liner describing the action for logs and reports. */
export function describeAction(action: ProposedAction): string {
  switch (action.kind) {
    case 'click':
      return `click "${action.targetText ?? ''}"`;
    case 'type':
      return `type "${action.value ?? ''}" into "${action.targetText ?? ''}"`;
    case 'press':
      return `press ${action.key ?? '?'}`;
    case 'wait':
      return `wait (${action.durationHint ?? 'short'})`;
    case 'finish':
      return `finish: ${action.reason ?? ''}`;
    default:
      return `${action.kind} (unrecognized)`;
  }
}
