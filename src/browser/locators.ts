import type { Locator, Page } from 'playwright';

// ── Error ─────────────────────────────────────────────────────

export class ElementNotFoundError extends Error {
  readonly targetText: string;
  readonly tiers: readonly string[];

  constructor(targetText: string, tiers: readonly string[]) {
    super(`No element matches "${targetText}" (tried ${tiers.join(' → ')})`);
    this.name = 'ElementNotFoundError';
    this.targetText = targetText;
    this.tiers = tiers;
  }
}

// ── Candidates ────────────────────────────────────────────────

export interface LocatorCandidate {
  tier: string;
  locator: Locator;
}

/**
 * Locators for a clickable element, tried in order:
 *   1. exact text     → page.getByText(text, { exact: true })
 *   2. partial text   → page.getByText(text)
 *   3. button role    → page.getByRole('button', { name })
 *   4. link role      → page.getByRole('link', { name })
 *
 * Escalated targets (repeated without progress) start at the role tiers.
 */
export function clickCandidates(
  page: Page,
  text: string,
  escalate = false,
): LocatorCandidate[] {
  const textTiers: LocatorCandidate[] = [
    { tier: 'exact-text', locator: page.getByText(text, { exact: true }).first() },
    { tier: 'partial-text', locator: page.getByText(text, { exact: false }).first() },
  ];
  const roleTiers: LocatorCandidate[] = [
    { tier: 'role-button', locator: page.getByRole('button', { name: text, exact: false }).first() },
    { tier: 'role-link', locator: page.getByRole('link', { name: text, exact: false }).first() },
  ];

  return escalate ? [...roleTiers, ...textTiers] : [...textTiers, ...roleTiers];
}

/**
 * Locators for a text field, tried in order:
 *   1. placeholder    → page.getByPlaceholder(label)
 *   2. label          → page.getByLabel(label)
 *   3. textbox role   → page.getByRole('textbox', { name })
 */
export function fieldCandidates(
  page: Page,
  label: string,
  escalate = false,
): LocatorCandidate[] {
  const textTiers: LocatorCandidate[] = [
    { tier: 'placeholder', locator: page.getByPlaceholder(label, { exact: false }).first() },
    { tier: 'label', locator: page.getByLabel(label, { exact: false }).first() },
  ];
  const roleTiers: LocatorCandidate[] = [
    { tier: 'role-textbox', locator: page.getByRole('textbox', { name: label, exact: false }).first() },
  ];

  return escalate ? [...roleTiers, ...textTiers] : [...textTiers, ...roleTiers];
}

// ── Lookup ────────────────────────────────────────────────────

/**
 * Return the first candidate that currently matches an element.
 * Throws ElementNotFoundError when no tier matches.
 */
export async function firstPresent(
  targetText: string,
  candidates: readonly LocatorCandidate[],
): Promise<LocatorCandidate> {
  for (const candidate of candidates) {
    if ((await candidate.locator.count()) > 0) return candidate;
  }

  throw new ElementNotFoundError(
    targetText,
    candidates.map((c) => c.tier),
  );
}
