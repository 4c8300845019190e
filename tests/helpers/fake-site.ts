import type {
  ActionOptions,
  ActionOutcome,
  BrowserController,
  PageSerializer,
  ScreenshotHandle,
} from '../../src/browser/types.js';
import { failed, ok } from '../../src/browser/types.js';
import type { InteractiveElement, PageStateSnapshot } from '../../src/schema/index.js';

export interface FakePage {
  url: string;
  elements: InteractiveElement[];
  text?: string[];
  /** Click target (case-insensitive) → URL of the page it leads to. */
  clicks?: Record<string, string>;
  /** Key name → URL of the page it leads to. */
  keys?: Record<string, string>;
  /** Targets whose actions report ActionTimeout. */
  timeouts?: string[];
}

export interface ClickCall {
  targetText: string;
  escalate: boolean;
}

export interface TypeCall {
  targetText: string;
  value: string;
}

/**
 * Deterministic in-memory site standing in for the Playwright
 * controller and serializer. Pages are keyed by URL.
 */
export class FakeSite implements BrowserController, PageSerializer {
  readonly clicks: ClickCall[] = [];
  readonly typed: TypeCall[] = [];
  readonly pressed: string[] = [];
  readonly waits: number[] = [];
  serializeCount = 0;
  private readonly pages: Map<string, FakePage>;
  private current: FakePage | undefined;

  constructor(pages: readonly FakePage[]) {
    this.pages = new Map(pages.map((p) => [p.url, p]));
  }

  get url(): string {
    return this.page().url;
  }

  async navigate(url: string): Promise<void> {
    const page = this.pages.get(url);
    if (!page) throw new Error(`No fake page at ${url}`);
    this.current = page;
  }

  async click(targetText: string, options?: ActionOptions): Promise<ActionOutcome> {
    this.clicks.push({ targetText, escalate: options?.escalate ?? false });
    const page = this.page();
    const missing = this.check(page, targetText);
    if (missing) return missing;

    const next = lookup(page.clicks, targetText);
    if (next !== undefined) await this.navigate(next);
    return ok();
  }

  async type(targetText: string, value: string): Promise<ActionOutcome> {
    const missing = this.check(this.page(), targetText);
    if (missing) return missing;
    this.typed.push({ targetText, value });
    return ok();
  }

  async press(key: string): Promise<ActionOutcome> {
    this.pressed.push(key);
    const next = lookup(this.page().keys, key);
    if (next !== undefined) await this.navigate(next);
    return ok();
  }

  async wait(durationMs: number): Promise<ActionOutcome> {
    this.waits.push(durationMs);
    return ok();
  }

  async screenshot(name: string): Promise<ScreenshotHandle> {
    return `screenshots/${name}.png`;
  }

  async serialize(): Promise<PageStateSnapshot> {
    this.serializeCount++;
    const page = this.page();
    return {
      url: page.url,
      interactiveElements: page.elements.map((el) => ({ ...el })),
      visibleText: [...(page.text ?? [])],
    };
  }

  async close(): Promise<void> {
    this.current = undefined;
  }

  private page(): FakePage {
    if (!this.current) throw new Error('FakeSite has not navigated anywhere');
    return this.current;
  }

  private check(page: FakePage, targetText: string): ActionOutcome | undefined {
    const wanted = targetText.toLowerCase();
    if (page.timeouts?.some((t) => t.toLowerCase() === wanted)) {
      return failed('ActionTimeout', `"${targetText}" did not respond`);
    }
    const found = page.elements.some(
      (el) =>
        el.accessibleText.toLowerCase() === wanted ||
        el.identifierHint?.toLowerCase() === wanted,
    );
    return found ? undefined : failed('ElementNotFound', `No element matching "${targetText}"`);
  }
}

function lookup(table: Record<string, string> | undefined, name: string): string | undefined {
  if (!table) return undefined;
  const wanted = name.toLowerCase();
  const entry = Object.entries(table).find(([k]) => k.toLowerCase() === wanted);
  return entry?.[1];
}

// ── Shared fixtures ─────────────────────────────────────────

export const SHOP_HOME = 'https://shop.test/';
export const SHOP_PRODUCTS = 'https://shop.test/products';

export function shopPages(): FakePage[] {
  return [
    {
      url: SHOP_HOME,
      elements: [
        { role: 'link', accessibleText: 'Products', identifierHint: '/products' },
        { role: 'button', accessibleText: 'Sign in' },
      ],
      text: ['Welcome to the shop'],
      clicks: { Products: SHOP_PRODUCTS },
    },
    {
      url: SHOP_PRODUCTS,
      elements: [
        { role: 'link', accessibleText: 'Home', identifierHint: '/' },
        { role: 'button', accessibleText: 'Add to cart' },
      ],
      text: ['Products', 'Blue mug'],
      clicks: { Home: SHOP_HOME },
    },
  ];
}

export const APP_HOME = 'https://app.test/';
export const APP_LOGIN = 'https://app.test/login';
export const APP_DASHBOARD = 'https://app.test/dashboard';

export function loginPages(): FakePage[] {
  return [
    {
      url: APP_HOME,
      elements: [{ role: 'button', accessibleText: 'Log in' }],
      clicks: { 'Log in': APP_LOGIN },
    },
    {
      url: APP_LOGIN,
      elements: [
        { role: 'input', accessibleText: 'Email', inputType: 'email' },
        { role: 'input', accessibleText: 'Password', inputType: 'password' },
        { role: 'button', accessibleText: 'Submit' },
      ],
      clicks: { Submit: APP_DASHBOARD },
    },
    {
      url: APP_DASHBOARD,
      elements: [{ role: 'link', accessibleText: 'Reports' }],
      text: ['Dashboard'],
    },
  ];
}

export const APP_SIGNIN = 'https://app.test/signin';
export const APP_SIGNIN_PASSWORD = 'https://app.test/signin/password';

/** Username and password on separate pages, joined by a Next button. */
export function twoStepLoginPages(): FakePage[] {
  return [
    {
      url: APP_HOME,
      elements: [{ role: 'button', accessibleText: 'Log in' }],
      clicks: { 'Log in': APP_SIGNIN },
    },
    {
      url: APP_SIGNIN,
      elements: [
        { role: 'input', accessibleText: 'Username', inputType: 'text' },
        { role: 'button', accessibleText: 'Next' },
      ],
      clicks: { Next: APP_SIGNIN_PASSWORD },
    },
    {
      url: APP_SIGNIN_PASSWORD,
      elements: [
        { role: 'input', accessibleText: 'Password', inputType: 'password' },
        { role: 'button', accessibleText: 'Sign in' },
      ],
      clicks: { 'Sign in': APP_DASHBOARD },
    },
    {
      url: APP_DASHBOARD,
      elements: [{ role: 'link', accessibleText: 'Reports' }],
      text: ['Dashboard'],
    },
  ];
}

export function reply(action: Record<string, unknown>): string {
  return JSON.stringify(action);
}
