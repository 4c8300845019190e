import type { BrowserController, PageSerializer } from '../browser/types.js';
import type { Credentials } from '../config/credentials.js';
import { TIMEOUTS } from '../config/defaults.js';
import type { FailureKind, ProposedAction, TraceDocument } from '../schema/index.js';
import { describeAction, describeElement } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { LoginHandler } from './credentials.js';
import { diffSnapshots } from './diff.js';
import { performAction } from './executor.js';
import { resolveAction } from './resolver.js';

// ── Public types ─────────────────────────────────────────────

export interface ReplayDependencies {
  browser: BrowserController;
  serializer: PageSerializer;
}

export interface ReplayOptions {
  credentials?: Credentials | undefined;
}

export interface ReplayedStep {
  index: number;
  action: ProposedAction;
  success: boolean;
  failureKind?: FailureKind | undefined;
  expectedAppeared: string[];
  expectedDisappeared: string[];
  actualAppeared: string[];
  actualDisappeared: string[];
  /** Appeared/disappeared sets equal the recorded ones. */
  matches: boolean;
}

export interface ReplayResult {
  steps: ReplayedStep[];
  matches: boolean;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Re-execute a trace's recorded actions from its start URL, with no
 * oracle involved, and compare each step's element diff with the
 * recorded one. Credential placeholders are filled from `options`.
 */
export async function replayTrace(
  document: TraceDocument,
  deps: ReplayDependencies,
  options: ReplayOptions = {},
): Promise<ReplayResult> {
  const login = new LoginHandler(options.credentials);

  log.section(`Replay: ${document.task}`);
  await deps.browser.navigate(document.startUrl);
  if (deps.browser.settle) await deps.browser.settle(TIMEOUTS.SETTLE_CEILING);
  let current = await deps.serializer.serialize();

  const steps: ReplayedStep[] = [];

  for (const recorded of document.steps) {
    const before = current;
    let success = false;
    let failureKind: FailureKind | undefined;

    const resolution = resolveAction(recorded.action, before);
    if (!resolution.ok) {
      failureKind = resolution.error.code;
    } else if (resolution.action.kind === 'finish') {
      success = true;
    } else {
      const prepared = login.prepare(resolution.action, before);
      if (!prepared.ok) {
        failureKind = 'CredentialUnavailable';
      } else {
        const execution = await performAction(deps.browser, prepared.executable, {
          lowConfidence: resolution.lowConfidence,
          escalate: recorded.escalated,
        });
        success = execution.success;
        failureKind = execution.failureKind;
        if (deps.browser.settle) {
          await deps.browser.settle(
            resolution.lowConfidence
              ? TIMEOUTS.LOW_CONFIDENCE_SETTLE_CEILING
              : TIMEOUTS.SETTLE_CEILING,
          );
        }
      }
    }

    if (!resolution.ok || resolution.action.kind !== 'finish') {
      current = await deps.serializer.serialize();
    }

    const diff = diffSnapshots(before, current);
    const actualAppeared = diff.elementsAppeared.map(describeElement);
    const actualDisappeared = diff.elementsDisappeared.map(describeElement);
    const matches =
      sameSet(actualAppeared, recorded.elementsAppeared) &&
      sameSet(actualDisappeared, recorded.elementsDisappeared);

    log.stepResult(
      recorded.index,
      document.steps.length,
      matches,
      `${describeAction(recorded.action)}${matches ? '' : ' (diff differs from recording)'}`,
    );

    steps.push({
      index: recorded.index,
      action: recorded.action,
      success,
      failureKind,
      expectedAppeared: recorded.elementsAppeared,
      expectedDisappeared: recorded.elementsDisappeared,
      actualAppeared,
      actualDisappeared,
      matches,
    });
  }

  return { steps, matches: steps.every((s) => s.matches) };
}

export function sameSet(a: readonly string[], b: readonly string[]): boolean {
  const left = [...new Set(a)].sort();
  const right = [...new Set(b)].sort();
  return left.length === right.length && left.every((v, i) => v === right[i]);
}
