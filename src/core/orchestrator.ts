import { randomUUID } from 'node:crypto';
import path from 'node:path';

import type { BrowserController, PageSerializer, ScreenshotHandle } from '../browser/types.js';
import { launchBrowser } from '../browser/controller.js';
import type { Credentials } from '../config/credentials.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import type { LLMClient } from '../llm/index.js';
import { writeTraceArtifacts } from '../report/reporter.js';
import type {
  Action,
  PageStateSnapshot,
  StepRecord,
  StopReason,
  TerminalStatus,
  Trace,
} from '../schema/index.js';
import { describeAction } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { LoginHandler } from './credentials.js';
import { LoopWindow, classify, countFailures, isStuck } from './detector.js';
import type { StepState } from './executor.js';
import { executeStep } from './executor.js';
import { summarizeHistory } from './history.js';

// ── Public types ─────────────────────────────────────────────

export type RunState = 'Starting' | 'Running' | 'LoginHandling' | TerminalStatus;

export interface RunDependencies {
  llm: LLMClient;
  browser: BrowserController;
  serializer: PageSerializer;
  /** Clock used for timestamps and the run deadline. */
  now?: (() => Date) | undefined;
}

export interface RunOptions {
  task: string;
  /** Defaults to a fresh UUID. */
  runId?: string | undefined;
  startUrl: string;
  maxSteps?: number | undefined;
  credentials?: Credentials | undefined;
  signal?: AbortSignal | undefined;
  totalTimeoutMs?: number | undefined;
  decisionTimeoutMs?: number | undefined;
  onStateChange?: ((state: RunState) => void) | undefined;
  onStepState?: ((index: number, state: StepState) => void) | undefined;
}

export interface BrowserRunConfig {
  task: string;
  url: string;
  headless: boolean;
  outputDir: string;
  maxSteps?: number | undefined;
  totalTimeoutMs?: number | undefined;
  cookie?: string | undefined;
  credentials?: Credentials | undefined;
  signal?: AbortSignal | undefined;
}

export interface BrowserRunResult {
  trace: Trace;
  /** Directory holding this run's trace, report and screenshots. */
  runDir: string;
  tracePath: string;
  reportPath: string;
}

// ── Advisories ───────────────────────────────────────────────

const STALLED_ADVISORY =
  'Your last actions changed nothing visible on the page. Try a different element or a different approach.';

function escalationAdvisory(target: string): string {
  return `Acting on "${target}" has been repeated without progress. If it still fails, pick another element.`;
}

const LOOP_VARIATION: Action = { kind: 'wait', durationHint: 'medium' };

function isEscalatable(kind: string): boolean {
  return kind === 'click' || kind === 'type';
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Drive one task to a terminal status. Always returns a sealed trace;
 * collaborator crashes end the run as StuckAborted with the error
 * message attached.
 */
export async function runTask(deps: RunDependencies, options: RunOptions): Promise<Trace> {
  const now = deps.now ?? (() => new Date());
  const maxSteps = options.maxSteps ?? LIMITS.MAX_STEPS;
  const runId = options.runId ?? randomUUID();
  const startedAt = now();
  const deadline = startedAt.getTime() + (options.totalTimeoutMs ?? TIMEOUTS.TOTAL_RUN_TIMEOUT);

  const steps: StepRecord[] = [];
  const window = new LoopWindow(LIMITS.LOOP_WINDOW_SIZE);
  const login = new LoginHandler(options.credentials);
  const escalated = new Set<string>();
  let lastClassifiedSeq = -1;
  let initialState: PageStateSnapshot = {
    url: options.startUrl,
    interactiveElements: [],
    visibleText: [],
  };
  let initialScreenshot: ScreenshotHandle = null;

  const enter = (state: RunState): void => options.onStateChange?.(state);

  const seal = (status: TerminalStatus, stopReason: StopReason, error?: string): Trace => {
    const finishedAt = now();
    const trace: Trace = {
      runId,
      task: options.task,
      startUrl: options.startUrl,
      status,
      stopReason,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
      initialState,
      initialScreenshot,
      steps,
      failureCount: countFailures(steps),
    };
    if (error !== undefined) trace.error = error;

    enter(status);
    log.section('Summary');
    const durationSec = (trace.durationMs / 1000).toFixed(1);
    log.info(`${status} (${stopReason}): ${String(steps.length)} steps, ${String(trace.failureCount)} failed, ${durationSec}s`);
    return trace;
  };

  log.section(`Run: ${options.task}`);
  log.info(`Target: ${options.startUrl}`);

  try {
    // ── STARTING ─────────────────────────────────────────
    enter('Starting');
    await deps.browser.navigate(options.startUrl);
    if (deps.browser.settle) await deps.browser.settle(TIMEOUTS.SETTLE_CEILING);
    initialState = await deps.serializer.serialize();
    initialScreenshot = await deps.browser.screenshot('step-00-initial');
    log.snapshot(initialState.interactiveElements.length, initialState.url);

    let carried: PageStateSnapshot = initialState;
    let state: RunState = 'Running';
    enter(state);

    for (;;) {
      // ── STOP CONDITIONS ──────────────────────────────
      if (steps.length >= maxSteps) {
        log.warn(`Step budget of ${String(maxSteps)} exhausted`);
        return seal('MaxStepsExceeded', 'maxSteps');
      }
      if (options.signal?.aborted) {
        log.warn('Run aborted');
        return seal('MaxStepsExceeded', 'aborted');
      }
      if (now().getTime() >= deadline) {
        log.warn('Run deadline reached; stopping');
        return seal('MaxStepsExceeded', 'deadline');
      }

      // ── CLASSIFY ─────────────────────────────────────
      const advisories: string[] = [];
      let forcedAction: Action | undefined;
      const latest = window.latest();

      if (latest && latest.seq > lastClassifiedSeq) {
        lastClassifiedSeq = latest.seq;
        const classification = classify(window);

        if (classification === 'Looping') {
          const targetKey = latest.target.toLowerCase();
          if (isEscalatable(latest.kind) && targetKey && !escalated.has(targetKey)) {
            escalated.add(targetKey);
            advisories.push(escalationAdvisory(latest.target));
            log.loop(`Loop on ${latest.kind} "${latest.target}"; escalating element lookup`);
          } else {
            forcedAction = LOOP_VARIATION;
            log.loop(`Loop on ${latest.kind}${latest.target ? ` "${latest.target}"` : ''}; forcing a variation step`);
          }
        } else if (classification === 'Stalled') {
          advisories.push(STALLED_ADVISORY);
          log.loop('No visible change for the last steps');
        }
      }

      // ── STEP ─────────────────────────────────────────
      const index = steps.length;
      if (!forcedAction) {
        log.llm(`Deciding step ${String(index + 1)}/${String(maxSteps)}...`);
      }

      const { record, finished } = await executeStep(
        { llm: deps.llm, browser: deps.browser, serializer: deps.serializer },
        {
          index,
          maxSteps,
          task: options.task,
          phase: login.phase,
          stateBefore: carried,
          history: summarizeHistory(steps),
          advisories,
          credentialsAvailable: login.credentialsAvailable,
          forcedAction,
          escalatedTargets: escalated,
          prepare: (action, snapshot) => login.prepare(action, snapshot),
          decisionTimeoutMs: options.decisionTimeoutMs,
          onTransition: options.onStepState
            ? (state) => options.onStepState?.(index, state)
            : undefined,
        },
      );

      // ── RECORD ───────────────────────────────────────
      steps.push(record);
      carried = record.stateAfter;
      if (record.origin === 'oracle') window.record(record);

      log.stepResult(
        index,
        maxSteps,
        record.success,
        record.success
          ? describeAction(record.action)
          : `${describeAction(record.action)} (${record.failureKind ?? 'failed'})`,
      );

      login.observe(record);
      const next: RunState = login.phase === 'login' ? 'LoginHandling' : 'Running';
      if (next !== state) {
        state = next;
        enter(state);
      }

      if (finished) return seal('Completed', 'finished');
      if (isStuck(steps)) {
        log.error(`${String(countFailures(steps))} failed steps; giving up`);
        return seal('StuckAborted', 'stuck');
      }
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Run crashed: ${message}`);
    return seal('StuckAborted', 'fatal', message);
  }
}

// ── Playwright-backed run ────────────────────────────────────

/**
 * Directory name for one run: sortable UTC timestamp plus the start
 * of the run ID, e.g. `20260101-093000-1a2b3c4d`.
 */
export function runDirectoryName(startedAt: Date, runId: string): string {
  const stamp = startedAt
    .toISOString()
    .replace(/\.\d{3}Z$/, '')
    .replace(/[-:]/g, '')
    .replace('T', '-');
  return `${stamp}-${runId.slice(0, 8)}`;
}

/**
 * Launch Chromium, run the task against it, and persist trace.json,
 * report.md and screenshots in a fresh directory under the output
 * directory, so earlier runs are never overwritten.
 */
export async function runTaskInBrowser(
  client: LLMClient,
  config: BrowserRunConfig,
): Promise<BrowserRunResult> {
  const runId = randomUUID();
  const runDir = path.join(config.outputDir, runDirectoryName(new Date(), runId));

  const session = await launchBrowser({
    headless: config.headless,
    screenshotDir: path.join(runDir, 'screenshots'),
    cookie: config.cookie,
    cookieUrl: config.cookie !== undefined ? config.url : undefined,
  });

  let trace: Trace;
  try {
    trace = await runTask(
      { llm: client, browser: session, serializer: session },
      {
        task: config.task,
        runId,
        startUrl: config.url,
        maxSteps: config.maxSteps,
        credentials: config.credentials,
        signal: config.signal,
        totalTimeoutMs: config.totalTimeoutMs,
      },
    );
  } finally {
    await session.close();
  }

  const { tracePath, reportPath } = await writeTraceArtifacts(runDir, trace);
  log.info(`Trace written to ${tracePath}`);
  return { trace, runDir, tracePath, reportPath };
}
