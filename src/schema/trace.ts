import { z } from 'zod';

import { proposedActionSchema } from './action.js';
import { interactiveElementSchema, pageStateSnapshotSchema } from './snapshot.js';

// ── Failure taxonomy ─────────────────────────────────────────

export const failureKindSchema = z.enum([
  'DecisionParseFailure',
  'UnknownAction',
  'EmptyTarget',
  'ElementNotFound',
  'ActionTimeout',
  'CredentialUnavailable',
]);

export type FailureKind = z.infer<typeof failureKindSchema>;

// ── Terminal status ──────────────────────────────────────────

export const terminalStatusSchema = z.enum([
  'Completed',
  'MaxStepsExceeded',
  'StuckAborted',
]);

export type TerminalStatus = z.infer<typeof terminalStatusSchema>;

export const stopReasonSchema = z.enum([
  'finished',
  'maxSteps',
  'deadline',
  'aborted',
  'stuck',
  'fatal',
]);

export type StopReason = z.infer<typeof stopReasonSchema>;

// ── StepRecord ───────────────────────────────────────────────

export const stepPhaseSchema = z.enum(['running', 'login']);

export type StepPhase = z.infer<typeof stepPhaseSchema>;

export const stepOriginSchema = z.enum(['oracle', 'variation']);

export type StepOrigin = z.infer<typeof stepOriginSchema>;

export const credentialFieldSchema = z.enum(['username', 'password']);

export type CredentialField = z.infer<typeof credentialFieldSchema>;

export const stepRecordSchema = z.object({
  index: z.number().int().nonnegative(),
  phase: stepPhaseSchema,
  origin: stepOriginSchema,
  stateBefore: pageStateSnapshotSchema,
  action: proposedActionSchema,
  lowConfidence: z.boolean(),
  success: z.boolean(),
  failureKind: failureKindSchema.optional(),
  failureMessage: z.string().optional(),
  stateAfter: pageStateSnapshotSchema,
  elementsAppeared: z.array(interactiveElementSchema),
  elementsDisappeared: z.array(interactiveElementSchema),
  urlChanged: z.boolean(),
  credentialInjected: credentialFieldSchema.optional(),
  /** Element lookup started at role-based locators for this step. */
  escalated: z.boolean().optional(),
  screenshotBefore: z.string().nullable(),
  screenshotAfter: z.string().nullable(),
});

export type StepRecord = z.infer<typeof stepRecordSchema>;

// ── Trace ────────────────────────────────────────────────────

export const traceSchema = z.object({
  runId: z.string().min(1),
  task: z.string().min(1),
  startUrl: z.string().min(1),
  status: terminalStatusSchema,
  stopReason: stopReasonSchema,
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  initialState: pageStateSnapshotSchema,
  initialScreenshot: z.string().nullable(),
  steps: z.array(stepRecordSchema),
  failureCount: z.number().int().nonnegative(),
  error: z.string().optional(),
});

export type Trace = z.infer<typeof traceSchema>;

// ── Exit codes ───────────────────────────────────────────────

export function exitCodeFor(status: TerminalStatus): number {
  switch (status) {
    case 'Completed':
      return 0;
    case 'MaxStepsExceeded':
      return 1;
    case 'StuckAborted':
      return 2;
  }
}
