import { z } from 'zod';

import { proposedActionSchema } from './action.js';
import {
  credentialFieldSchema,
  failureKindSchema,
  stepOriginSchema,
  stepPhaseSchema,
  stopReasonSchema,
  terminalStatusSchema,
} from './trace.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const TRACE_DOCUMENT_VERSION = '1.0' as const;

// ── Step output ─────────────────────────────────────────────

export const traceDocumentStepSchema = z.object({
  index: z.number().int().nonnegative(),
  phase: stepPhaseSchema,
  origin: stepOriginSchema,
  url: z.string(),
  urlAfter: z.string(),
  action: proposedActionSchema,
  success: z.boolean(),
  failureKind: failureKindSchema.nullable(),
  lowConfidence: z.boolean(),
  credentialInjected: credentialFieldSchema.nullable(),
  // Absent in traces written before escalation was recorded
  escalated: z.boolean().default(false),
  elementsAppeared: z.array(z.string()),
  elementsDisappeared: z.array(z.string()),
  screenshotBefore: z.string().nullable(),
  screenshotAfter: z.string().nullable(),
});

export type TraceDocumentStep = z.infer<typeof traceDocumentStepSchema>;

// ── Root output ─────────────────────────────────────────────

export const traceDocumentSchema = z.object({
  version: z.literal(TRACE_DOCUMENT_VERSION),
  runId: z.string().min(1),
  task: z.string(),
  startUrl: z.string(),
  status: terminalStatusSchema,
  stopReason: stopReasonSchema,
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number().int().nonnegative(),
  failureCount: z.number().int().nonnegative(),
  error: z.string().nullable(),
  initialScreenshot: z.string().nullable().default(null),
  steps: z.array(traceDocumentStepSchema),
});

export type TraceDocument = z.infer<typeof traceDocumentSchema>;

export function parseTraceDocument(data: unknown): TraceDocument {
  return traceDocumentSchema.parse(data);
}
