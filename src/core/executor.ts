import type { ActionOutcome, BrowserController, PageSerializer, ScreenshotHandle } from '../browser/types.js';
import { ok } from '../browser/types.js';
import { TIMEOUTS, WAIT_DURATIONS } from '../config/defaults.js';
import type { LLMClient } from '../llm/index.js';
import type {
  Action,
  CredentialField,
  FailureKind,
  PageStateSnapshot,
  ProposedAction,
  StepOrigin,
  StepPhase,
  StepRecord,
} from '../schema/index.js';
import { describeAction } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import type { PreparedAction } from './credentials.js';
import { decide } from './decision.js';
import { diffSnapshots } from './diff.js';
import type { HistorySummary } from './history.js';
import { resolveAction } from './resolver.js';

// ── Public types ─────────────────────────────────────────────

export type StepState =
  | 'Idle'
  | 'Snapshotting'
  | 'Deciding'
  | 'Resolving'
  | 'Executing'
  | 'Diffing'
  | 'Recorded';

export interface StepDependencies {
  llm: LLMClient;
  browser: BrowserController;
  serializer: PageSerializer;
}

export interface StepInput {
  index: number;
  maxSteps: number;
  task: string;
  phase: StepPhase;
  /** Snapshot carried over from the previous step (continuity). */
  stateBefore?: PageStateSnapshot | undefined;
  history: HistorySummary;
  advisories: readonly string[];
  credentialsAvailable: boolean;
  /** Skip the oracle and execute this action (forced variation). */
  forcedAction?: Action | undefined;
  /** Targets whose lookup starts at role-based matching. */
  escalatedTargets: ReadonlySet<string>;
  /** Credential seam supplied by the orchestration loop. */
  prepare: (action: Action, snapshot: PageStateSnapshot) => PreparedAction;
  decisionTimeoutMs?: number | undefined;
  /** Reports state-machine transitions; used for tracing and tests. */
  onTransition?: ((state: StepState) => void) | undefined;
}

export interface StepOutcome {
  record: StepRecord;
  finished: boolean;
}

export interface ActionExecution {
  success: boolean;
  failureKind?: FailureKind | undefined;
  failureMessage?: string | undefined;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Run one step end to end: snapshot → decide → resolve → execute →
 * re-snapshot → diff → record. Per-step failures are recorded on the
 * returned StepRecord; only collaborator crashes propagate.
 */
export async function executeStep(
  deps: StepDependencies,
  input: StepInput,
): Promise<StepOutcome> {
  const enter = (state: StepState): void => input.onTransition?.(state);
  const origin: StepOrigin = input.forcedAction ? 'variation' : 'oracle';
  const name = `step-${String(input.index).padStart(2, '0')}`;

  enter('Idle');

  // ── SNAPSHOT ─────────────────────────────────────────
  enter('Snapshotting');
  const stateBefore = input.stateBefore ?? (await deps.serializer.serialize());
  const screenshotBefore = await deps.browser.screenshot(`${name}-before`);

  // ── DECIDE ───────────────────────────────────────────
  enter('Deciding');
  let proposed: ProposedAction;
  let decisionFailure: ActionExecution | undefined;

  if (input.forcedAction) {
    proposed = input.forcedAction;
  } else {
    const decision = await decide(
      deps.llm,
      {
        task: input.task,
        snapshot: stateBefore,
        history: input.history,
        advisories: input.advisories,
        credentialsAvailable: input.credentialsAvailable,
      },
      { timeoutMs: input.decisionTimeoutMs },
    );
    proposed = decision.action;
    if (decision.failure) {
      decisionFailure = {
        success: false,
        failureKind: decision.failure,
        failureMessage: decision.failureMessage,
      };
    }
  }

  // ── RESOLVE ──────────────────────────────────────────
  enter('Resolving');
  const resolution = resolveAction(proposed, stateBefore);

  if (!resolution.ok) {
    log.warn(`Step ${String(input.index + 1)}: ${resolution.error.message}`);
    return finishRecord(deps, input, enter, {
      origin,
      name,
      stateBefore,
      screenshotBefore,
      recorded: proposed,
      lowConfidence: false,
      execution: {
        success: false,
        failureKind: resolution.error.code,
        failureMessage: resolution.error.message,
      },
    });
  }

  const { action, lowConfidence } = resolution;
  if (lowConfidence) {
    log.detail(`${describeAction(action)} matches no serialized element; trying anyway`);
  }

  // ── FINISH (short-circuit) ───────────────────────────
  if (action.kind === 'finish') {
    enter('Recorded');
    return {
      finished: true,
      record: {
        index: input.index,
        phase: input.phase,
        origin,
        stateBefore,
        action,
        lowConfidence: false,
        success: true,
        stateAfter: stateBefore,
        elementsAppeared: [],
        elementsDisappeared: [],
        urlChanged: false,
        screenshotBefore,
        screenshotAfter: screenshotBefore,
      },
    };
  }

  // ── CREDENTIAL SEAM ──────────────────────────────────
  const prepared = input.prepare(action, stateBefore);
  if (!prepared.ok) {
    log.warn(`Step ${String(input.index + 1)}: ${prepared.message}`);
    return finishRecord(deps, input, enter, {
      origin,
      name,
      stateBefore,
      screenshotBefore,
      recorded: prepared.recorded,
      lowConfidence,
      execution: {
        success: false,
        failureKind: 'CredentialUnavailable',
        failureMessage: prepared.message,
      },
    });
  }

  log.step(input.index, input.maxSteps, describeAction(prepared.recorded));

  // ── ACT ──────────────────────────────────────────────
  enter('Executing');
  const escalate = isEscalated(prepared.executable, input.escalatedTargets);
  const executed = await performAction(deps.browser, prepared.executable, {
    lowConfidence,
    escalate,
  });

  return finishRecord(deps, input, enter, {
    origin,
    name,
    stateBefore,
    screenshotBefore,
    recorded: prepared.recorded,
    lowConfidence,
    injected: prepared.injected,
    escalated: escalate,
    settleCeilingMs: lowConfidence
      ? TIMEOUTS.LOW_CONFIDENCE_SETTLE_CEILING
      : TIMEOUTS.SETTLE_CEILING,
    execution: decisionFailure ?? executed,
  });
}

// ── Execution ─────────────────────────────────────────────────

function isEscalated(action: Action, escalated: ReadonlySet<string>): boolean {
  if (action.kind !== 'click' && action.kind !== 'type') return false;
  return escalated.has(action.targetText.toLowerCase());
}

/**
 * Send one resolved action to the browser, bounded by the action
 * timeout. Timeouts become ActionTimeout failures; anything else the
 * controller throws propagates.
 *
 * When the outer ceiling fires, the browser call is given up to one
 * more action timeout to settle before this returns, so the page is
 * not re-serialized while the action is still being applied.
 */
export async function performAction(
  browser: BrowserController,
  action: Action,
  opts: { lowConfidence: boolean; escalate: boolean },
): Promise<ActionExecution> {
  const timeoutMs = opts.lowConfidence
    ? TIMEOUTS.LOW_CONFIDENCE_ACTION_TIMEOUT
    : TIMEOUTS.ACTION_TIMEOUT;
  const options = { timeoutMs, escalate: opts.escalate };

  // The outer bound covers collaborators that ignore their own timeout
  const ceiling = action.kind === 'wait'
    ? WAIT_DURATIONS[action.durationHint] + TIMEOUTS.ACTION_TIMEOUT
    : timeoutMs * 4;

  const pending = run(browser, action, options);

  try {
    const outcome = await withTimeout(pending, ceiling, `${action.kind} action`);
    if (outcome.ok) return { success: true };
    return { success: false, failureKind: outcome.failure, failureMessage: outcome.message };
  } catch (err) {
    if (!(err instanceof TimeoutError)) throw err;
    await drain(pending, action);
    return { success: false, failureKind: 'ActionTimeout', failureMessage: err.message };
  }
}

async function drain(pending: Promise<ActionOutcome>, action: Action): Promise<void> {
  try {
    await withTimeout(pending, TIMEOUTS.ACTION_TIMEOUT, `${action.kind} action drain`);
  } catch (err) {
    if (!(err instanceof TimeoutError)) throw err;
    log.warn(`${describeAction(action)} is still running after its timeout`);
  }
}

function run(
  browser: BrowserController,
  action: Action,
  options: { timeoutMs: number; escalate: boolean },
): Promise<ActionOutcome> {
  switch (action.kind) {
    case 'click':
      return browser.click(action.targetText, options);
    case 'type':
      return browser.type(action.targetText, action.value, options);
    case 'press':
      return browser.press(action.key, options);
    case 'wait':
      return browser.wait(WAIT_DURATIONS[action.durationHint]);
    case 'finish':
      return Promise.resolve(ok());
  }
}

// ── Diff + record ────────────────────────────────────────────

interface RecordParts {
  origin: StepOrigin;
  name: string;
  stateBefore: PageStateSnapshot;
  screenshotBefore: ScreenshotHandle;
  recorded: ProposedAction;
  lowConfidence: boolean;
  injected?: CredentialField | undefined;
  escalated?: boolean | undefined;
  settleCeilingMs?: number | undefined;
  execution: ActionExecution;
}

async function finishRecord(
  deps: StepDependencies,
  input: StepInput,
  enter: (state: StepState) => void,
  parts: RecordParts,
): Promise<StepOutcome> {
  enter('Diffing');
  if (parts.settleCeilingMs !== undefined && deps.browser.settle) {
    await deps.browser.settle(parts.settleCeilingMs);
  }

  const stateAfter = await deps.serializer.serialize();
  const screenshotAfter = await deps.browser.screenshot(
    `${parts.name}-${parts.execution.success ? 'after' : 'error'}`,
  );
  const diff = diffSnapshots(parts.stateBefore, stateAfter);

  const record: StepRecord = {
    index: input.index,
    phase: input.phase,
    origin: parts.origin,
    stateBefore: parts.stateBefore,
    action: parts.recorded,
    lowConfidence: parts.lowConfidence,
    success: parts.execution.success,
    stateAfter,
    elementsAppeared: diff.elementsAppeared,
    elementsDisappeared: diff.elementsDisappeared,
    urlChanged: diff.urlChanged,
    screenshotBefore: parts.screenshotBefore,
    screenshotAfter,
  };
  if (parts.execution.failureKind !== undefined) record.failureKind = parts.execution.failureKind;
  if (parts.execution.failureMessage !== undefined) record.failureMessage = parts.execution.failureMessage;
  if (parts.injected !== undefined) record.credentialInjected = parts.injected;
  if (parts.escalated === true) record.escalated = true;

  enter('Recorded');
  return { record, finished: false };
}
