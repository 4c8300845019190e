import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import { chromium, errors } from 'playwright';
import type { BrowserContext, Page } from 'playwright';

import { TIMEOUTS } from '../config/defaults.js';
import type { PageStateSnapshot } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { ElementNotFoundError, clickCandidates, fieldCandidates, firstPresent } from './locators.js';
import { serializePage } from './serializer.js';
import { failed, ok } from './types.js';
import type {
  ActionOptions,
  ActionOutcome,
  BrowserController,
  PageSerializer,
  ScreenshotHandle,
} from './types.js';

// ── Public types ─────────────────────────────────────────────

export interface BrowserConfig {
  headless: boolean;
  screenshotDir: string;
  cookie?: string | undefined;
  cookieUrl?: string | undefined;
}

export interface BrowserSession extends BrowserController, PageSerializer {
  readonly page: Page;
}

const VIEWPORT = { width: 1920, height: 1080 } as const;

// ── Session launcher ─────────────────────────────────────────

export async function launchBrowser(config: BrowserConfig): Promise<BrowserSession> {
  await mkdir(config.screenshotDir, { recursive: true });

  const browser = await chromium.launch({ headless: config.headless });
  const context = await browser.newContext({ viewport: VIEWPORT });

  if (config.cookie !== undefined && config.cookieUrl !== undefined) {
    await injectCookies(context, config.cookie, config.cookieUrl);
  }

  const page = await context.newPage();

  return {
    page,

    navigate(url: string): Promise<void> {
      return toleratingLoadTimeout(url, () =>
        page.goto(url, {
          timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
          waitUntil: 'domcontentloaded',
        }),
      );
    },

    click(targetText: string, options?: ActionOptions): Promise<ActionOutcome> {
      return toOutcome(targetText, async () => {
        const candidates = clickCandidates(page, targetText, options?.escalate);
        const match = await firstPresent(targetText, candidates);
        await match.locator.click({
          timeout: options?.timeoutMs ?? TIMEOUTS.ACTION_TIMEOUT,
        });
      });
    },

    type(targetText: string, value: string, options?: ActionOptions): Promise<ActionOutcome> {
      return toOutcome(targetText, async () => {
        const candidates = fieldCandidates(page, targetText, options?.escalate);
        const match = await firstPresent(targetText, candidates);
        await match.locator.fill(value, {
          timeout: options?.timeoutMs ?? TIMEOUTS.ACTION_TIMEOUT,
        });
      });
    },

    press(key: string, options?: ActionOptions): Promise<ActionOutcome> {
      // keyboard.press takes no timeout of its own
      return toOutcome(key, () =>
        withTimeout(
          page.keyboard.press(key),
          options?.timeoutMs ?? TIMEOUTS.ACTION_TIMEOUT,
          `Pressing ${key}`,
        ),
      );
    },

    async wait(durationMs: number): Promise<ActionOutcome> {
      await page.waitForTimeout(durationMs);
      return ok();
    },

    async screenshot(name: string): Promise<ScreenshotHandle> {
      const fileName = `${name}.png`;
      try {
        await page.screenshot({
          path: path.join(config.screenshotDir, fileName),
          fullPage: true,
        });
        return path.join('screenshots', fileName);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`Screenshot ${fileName} failed: ${message}`);
        return null;
      }
    },

    async settle(ceilingMs: number): Promise<void> {
      try {
        await page.waitForLoadState('networkidle', { timeout: ceilingMs });
      } catch (err) {
        if (!(err instanceof errors.TimeoutError)) throw err;
        // Long-polling pages never go idle; the ceiling is the settle.
      }
    },

    serialize(): Promise<PageStateSnapshot> {
      return serializePage(page);
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}

// ── Outcome mapping ──────────────────────────────────────────

const CLOSED_TARGET = /has been closed/;

export async function toOutcome(
  target: string,
  action: () => Promise<void>,
): Promise<ActionOutcome> {
  try {
    await action();
    return ok();
  } catch (err) {
    if (err instanceof ElementNotFoundError) {
      return failed('ElementNotFound', err.message);
    }
    if (err instanceof errors.TimeoutError || err instanceof TimeoutError) {
      return failed('ActionTimeout', `Action on "${target}" timed out: ${err.message}`);
    }
    // A closed page or browser is a crash, not a lookup failure
    if (err instanceof Error && CLOSED_TARGET.test(err.message)) throw err;
    const message = err instanceof Error ? err.message : String(err);
    return failed('ElementNotFound', message);
  }
}

/**
 * A page that is slow to finish loading is still usable; only the
 * load timeout is tolerated, every other navigation error propagates.
 */
export async function toleratingLoadTimeout(
  url: string,
  load: () => Promise<unknown>,
): Promise<void> {
  try {
    await load();
  } catch (err) {
    if (!(err instanceof errors.TimeoutError)) throw err;
    log.warn(`Loading ${url} timed out; continuing with the page as it is`);
  }
}

// ── Cookie injection ────────────────────────────────────────

/**
 * Parse a cookie string ("name=value; name2=value2") and inject
 * all cookies into the browser context before navigation begins.
 *
 * Playwright requires a `url` to scope each cookie; the start URL
 * is used so cookies attach to the correct origin.
 */
export async function injectCookies(
  context: BrowserContext,
  cookies: string,
  url: string,
): Promise<void> {
  const parsed = parseCookieString(cookies);
  if (parsed.length === 0) return;

  await context.addCookies(
    parsed.map((c) => ({
      name: c.name,
      value: c.value,
      url,
    })),
  );
}

export function parseCookieString(
  cookies: string,
): Array<{ name: string; value: string }> {
  return cookies
    .split(';')
    .map((s) => s.trim())
    .filter(Boolean)
    .map((pair) => {
      const eqIdx = pair.indexOf('=');
      if (eqIdx === -1) {
        throw new Error(`Invalid cookie format: "${pair}" (expected name=value)`);
      }
      return {
        name: pair.slice(0, eqIdx).trim(),
        value: pair.slice(eqIdx + 1).trim(),
      };
    });
}
