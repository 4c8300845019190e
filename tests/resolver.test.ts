import { describe, it, expect } from 'vitest';

import { matchElement, resolveAction } from '../src/core/resolver.js';
import type { PageStateSnapshot } from '../src/schema/index.js';

const snapshot: PageStateSnapshot = {
  url: 'https://shop.test/',
  interactiveElements: [
    { role: 'link', accessibleText: 'Home' },
    { role: 'button', accessibleText: 'Sign in now' },
    { role: 'input', accessibleText: '', identifierHint: 'email', inputType: 'email' },
    { role: 'button', accessibleText: 'Submit' },
  ],
  visibleText: [],
};

describe('matchElement', () => {
  it('prefers an exact match', () => {
    expect(matchElement('Home', snapshot.interactiveElements)).toEqual({
      element: { role: 'link', accessibleText: 'Home' },
      tier: 'exact',
    });
  });

  it('falls back to a case-insensitive match on the identifier hint', () => {
    const match = matchElement('EMAIL', snapshot.interactiveElements);
    expect(match?.tier).toBe('case-insensitive');
    expect(match?.element.inputType).toBe('email');
  });

  it('falls back to substring matching in both directions', () => {
    expect(matchElement('sign in', snapshot.interactiveElements)?.element.accessibleText).toBe(
      'Sign in now',
    );
    const longer = matchElement('Submit the form', snapshot.interactiveElements);
    expect(longer?.tier).toBe('substring');
    expect(longer?.element.accessibleText).toBe('Submit');
  });

  it('returns undefined for an empty or unknown target', () => {
    expect(matchElement('   ', snapshot.interactiveElements)).toBeUndefined();
    expect(matchElement('Checkout', snapshot.interactiveElements)).toBeUndefined();
  });
});

describe('resolveAction', () => {
  it('resolves a click on a known element with full confidence', () => {
    const result = resolveAction({ kind: 'click', targetText: 'Home' }, snapshot);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.action).toEqual({ kind: 'click', targetText: 'Home' });
    expect(result.lowConfidence).toBe(false);
  });

  it('normalizes the kind and trims the target', () => {
    const result = resolveAction({ kind: ' Click ', targetText: '  Home ' }, snapshot);
    expect(result.ok && result.action).toEqual({ kind: 'click', targetText: 'Home' });
  });

  it('flags a target that matches nothing as low confidence but still resolves it', () => {
    const result = resolveAction({ kind: 'click', targetText: 'Checkout' }, snapshot);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.lowConfidence).toBe(true);
    expect(result.match).toBeUndefined();
  });

  it('rejects kinds outside the vocabulary', () => {
    expect(resolveAction({ kind: 'scroll' }, snapshot)).toEqual({
      ok: false,
      error: { code: 'UnknownAction', message: 'Unrecognized action kind "scroll"' },
    });
  });

  it('rejects click, type and press without a target', () => {
    const cases = [
      { kind: 'click' },
      { kind: 'type', targetText: '  ', value: 'x' },
      { kind: 'press', key: '' },
    ];
    for (const proposed of cases) {
      const result = resolveAction(proposed, snapshot);
      expect(result.ok ? undefined : result.error.code).toBe('EmptyTarget');
    }
  });

  it('fills defaults for type, wait and finish', () => {
    const typed = resolveAction({ kind: 'type', targetText: 'email' }, snapshot);
    expect(typed.ok && typed.action).toEqual({ kind: 'type', targetText: 'email', value: '' });

    const waited = resolveAction({ kind: 'wait' }, snapshot);
    expect(waited.ok && waited.action).toEqual({ kind: 'wait', durationHint: 'short' });

    const finished = resolveAction({ kind: 'finish', reason: '  ' }, snapshot);
    expect(finished.ok && finished.action).toEqual({ kind: 'finish', reason: 'task complete' });
  });

  it('keeps press keys verbatim apart from trimming', () => {
    const result = resolveAction({ kind: 'press', key: ' Enter ' }, snapshot);
    expect(result.ok && result.action).toEqual({ kind: 'press', key: 'Enter' });
  });
});
