import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type {
  StepRecord,
  TerminalStatus,
  Trace,
  TraceDocument,
  TraceDocumentStep,
} from '../schema/index.js';
import { TRACE_DOCUMENT_VERSION, describeAction, describeElement } from '../schema/index.js';

// ── Trace document ───────────────────────────────────────────

export function generateTraceDocument(trace: Trace): TraceDocument {
  return {
    version: TRACE_DOCUMENT_VERSION,
    runId: trace.runId,
    task: trace.task,
    startUrl: trace.startUrl,
    status: trace.status,
    stopReason: trace.stopReason,
    startedAt: trace.startedAt,
    finishedAt: trace.finishedAt,
    durationMs: trace.durationMs,
    failureCount: trace.failureCount,
    error: trace.error ?? null,
    initialScreenshot: trace.initialScreenshot,
    steps: trace.steps.map(stepToDocument),
  };
}

function stepToDocument(step: StepRecord): TraceDocumentStep {
  return {
    index: step.index,
    phase: step.phase,
    origin: step.origin,
    url: step.stateBefore.url,
    urlAfter: step.stateAfter.url,
    action: step.action,
    success: step.success,
    failureKind: step.failureKind ?? null,
    lowConfidence: step.lowConfidence,
    credentialInjected: step.credentialInjected ?? null,
    escalated: step.escalated ?? false,
    elementsAppeared: step.elementsAppeared.map(describeElement),
    elementsDisappeared: step.elementsDisappeared.map(describeElement),
    screenshotBefore: step.screenshotBefore,
    screenshotAfter: step.screenshotAfter,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: TraceDocument): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(trace: Trace): string {
  const lines: string[] = [];

  lines.push(`# pagepilot Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **URL** | ${trace.startUrl} |`);
  lines.push(`| **Task** | ${escapeMarkdownCell(trace.task)} |`);
  lines.push(`| **Run ID** | \`${trace.runId}\` |`);
  lines.push(`| **Started** | ${trace.startedAt} |`);
  lines.push(`| **Finished** | ${trace.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(trace.durationMs)} |`);
  lines.push(`| **Status** | **${trace.status}** ${statusIcon(trace.status)} |`);
  lines.push(`| **Stop reason** | ${trace.stopReason} |`);
  lines.push(`| **Failed steps** | ${String(trace.failureCount)} |`);
  lines.push('');

  if (trace.error !== undefined) {
    lines.push(`> **Error:** ${trace.error}`);
    lines.push('');
  }

  if (trace.initialScreenshot) {
    lines.push(`![initial page](${trace.initialScreenshot})`);
    lines.push('');
  }

  lines.push(`## Steps`);
  lines.push('');

  if (trace.steps.length === 0) {
    lines.push('_No steps were executed._');
    lines.push('');
    return lines.join('\n');
  }

  lines.push(`| # | Phase | Action | Result | Page change |`);
  lines.push(`|---|-------|--------|--------|-------------|`);

  for (const step of trace.steps) {
    const action = escapeMarkdownCell(describeAction(step.action));
    const origin = step.origin === 'variation' ? ' _(forced)_' : '';
    const result = step.success ? 'OK' : `FAIL (${step.failureKind ?? 'unknown'})`;
    lines.push(
      `| ${String(step.index + 1)} | ${step.phase} | ${action}${origin} | ${result} | ${formatChange(step)} |`,
    );
  }

  lines.push('');
  lines.push(`## Step Details`);
  lines.push('');

  for (const step of trace.steps) {
    lines.push(`### Step ${String(step.index + 1)}: ${describeAction(step.action)}`);
    lines.push('');
    lines.push(`- URL: ${step.stateBefore.url}`);
    if (step.urlChanged) lines.push(`- Navigated to: ${step.stateAfter.url}`);
    if (step.lowConfidence) lines.push(`- Target matched no serialized element`);
    if (step.escalated) lines.push(`- Lookup started at role-based locators`);
    if (step.credentialInjected) lines.push(`- Credential supplied: ${step.credentialInjected}`);
    if (step.failureMessage) lines.push(`- Failure: ${step.failureMessage}`);

    for (const el of step.elementsAppeared) lines.push(`- \\+ ${describeElement(el)}`);
    for (const el of step.elementsDisappeared) lines.push(`- \\- ${describeElement(el)}`);
    lines.push('');

    if (step.screenshotAfter) {
      lines.push(`![screenshot](${step.screenshotAfter})`);
      lines.push('');
    }
  }

  return lines.join('\n');
}

// ── Artifacts ────────────────────────────────────────────────

export interface TraceArtifacts {
  tracePath: string;
  reportPath: string;
}

export async function writeTraceArtifacts(
  outputDir: string,
  trace: Trace,
): Promise<TraceArtifacts> {
  await mkdir(outputDir, { recursive: true });

  const tracePath = path.join(outputDir, 'trace.json');
  const reportPath = path.join(outputDir, 'report.md');

  await writeFile(tracePath, serializeJSON(generateTraceDocument(trace)) + '\n', 'utf-8');
  await writeFile(reportPath, generateMarkdown(trace), 'utf-8');

  return { tracePath, reportPath };
}

// ── Helpers ──────────────────────────────────────────────────

function formatChange(step: StepRecord): string {
  const parts: string[] = [];
  if (step.urlChanged) parts.push('url');
  if (step.elementsAppeared.length > 0) parts.push(`+${String(step.elementsAppeared.length)}`);
  if (step.elementsDisappeared.length > 0) parts.push(`-${String(step.elementsDisappeared.length)}`);
  return parts.length > 0 ? parts.join(' ') : 'none';
}

function statusIcon(status: TerminalStatus): string {
  switch (status) {
    case 'Completed':
      return '[DONE]';
    case 'MaxStepsExceeded':
      return '[BUDGET]';
    case 'StuckAborted':
      return '[STUCK]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
