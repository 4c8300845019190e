/**
 * Browser module.
 * Playwright-backed controller and serializer. No LLM calls.
 * Executes generic primitives and reports outcomes; never decides.
 */

export {
  launchBrowser,
  injectCookies,
  parseCookieString,
  toOutcome,
  toleratingLoadTimeout,
} from './controller.js';
export type { BrowserConfig, BrowserSession } from './controller.js';
export { serializePage, splitVisibleText } from './serializer.js';
export { clickCandidates, fieldCandidates, firstPresent, ElementNotFoundError } from './locators.js';
export type { LocatorCandidate } from './locators.js';
export { ok, failed } from './types.js';
export type {
  ActionOptions,
  ActionOutcome,
  BrowserController,
  ExecutionFailureKind,
  PageSerializer,
  ScreenshotHandle,
} from './types.js';
