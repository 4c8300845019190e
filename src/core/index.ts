/**
 * Core agent module.
 * Decision → resolution → execution → diff, driven by the run loop.
 * Browser and oracle access go through injected collaborators.
 */

export { resolveAction, matchElement } from './resolver.js';
export type { ResolutionResult, ResolutionError, ResolutionErrorCode, ElementMatch, MatchTier } from './resolver.js';
export { decide, parseDecisionReply, extractFirstJsonObject, normalizeReply } from './decision.js';
export type { Decision, DecisionRequest, DecideOptions, ReplyParseResult } from './decision.js';
export { LoopWindow, classify, loopKey, countFailures, isStuck } from './detector.js';
export type { LoopEntry, RunClassification } from './detector.js';
export { diffSnapshots } from './diff.js';
export type { SnapshotDiff } from './diff.js';
export { summarizeHistory, formatHistory } from './history.js';
export type { HistoryEntry, HistorySummary } from './history.js';
export { buildDecisionPrompt, renderTemplate } from './prompt.js';
export type { DecisionPrompt, DecisionPromptInput } from './prompt.js';
export { LoginHandler, CREDENTIAL_PLACEHOLDERS, credentialFieldFor } from './credentials.js';
export type { PreparedAction } from './credentials.js';
export { executeStep, performAction } from './executor.js';
export type { StepDependencies, StepInput, StepOutcome, StepState, ActionExecution } from './executor.js';
export { runTask, runTaskInBrowser, runDirectoryName } from './orchestrator.js';
export type { RunDependencies, RunOptions, RunState, BrowserRunConfig, BrowserRunResult } from './orchestrator.js';
export { replayTrace, sameSet } from './replay.js';
export type { ReplayDependencies, ReplayOptions, ReplayResult, ReplayedStep } from './replay.js';
