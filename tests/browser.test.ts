import { describe, it, expect } from 'vitest';

import { errors } from 'playwright';

import { parseCookieString, toOutcome, toleratingLoadTimeout } from '../src/browser/controller.js';
import { ElementNotFoundError } from '../src/browser/locators.js';
import { splitVisibleText } from '../src/browser/serializer.js';
import { TimeoutError } from '../src/utils/timeout.js';

describe('splitVisibleText', () => {
  it('trims lines and drops blank ones', () => {
    expect(splitVisibleText('  Welcome \n\n   \n Sign in\n')).toEqual(['Welcome', 'Sign in']);
  });

  it('caps the number of lines', () => {
    const text = Array.from({ length: 500 }, (_, i) => `line ${String(i)}`).join('\n');
    const lines = splitVisibleText(text);
    expect(lines).toHaveLength(400);
    expect(lines[399]).toBe('line 399');
  });
});

describe('parseCookieString', () => {
  it('splits name=value pairs and keeps = inside values', () => {
    expect(parseCookieString('session=abc; theme = dark=true ;')).toEqual([
      { name: 'session', value: 'abc' },
      { name: 'theme', value: 'dark=true' },
    ]);
  });

  it('rejects a pair without =', () => {
    expect(() => parseCookieString('session')).toThrow(
      'Invalid cookie format: "session" (expected name=value)',
    );
  });
});

describe('ElementNotFoundError', () => {
  it('lists the tiers that were tried', () => {
    const err = new ElementNotFoundError('Buy', ['exact-text', 'role-button']);
    expect(err.message).toBe('No element matches "Buy" (tried exact-text → role-button)');
    expect(err.name).toBe('ElementNotFoundError');
  });
});

describe('toOutcome', () => {
  it('maps a bounded press running out of time to ActionTimeout', async () => {
    const outcome = await toOutcome('Enter', () => Promise.reject(new TimeoutError('Pressing Enter', 4000)));

    expect(outcome).toEqual({
      ok: false,
      failure: 'ActionTimeout',
      message: 'Action on "Enter" timed out: Pressing Enter timed out after 4000ms',
    });
  });

  it('maps a failed lookup to ElementNotFound', async () => {
    const outcome = await toOutcome('Buy', () => Promise.reject(new ElementNotFoundError('Buy', ['exact-text'])));

    expect(outcome.ok).toBe(false);
    expect(outcome.ok === false && outcome.failure).toBe('ElementNotFound');
  });

  it('rethrows a closed page', async () => {
    await expect(
      toOutcome('Buy', () => Promise.reject(new Error('Target page, context or browser has been closed'))),
    ).rejects.toThrow('has been closed');
  });
});

describe('toleratingLoadTimeout', () => {
  it('carries on when the page is slow to load', async () => {
    await expect(
      toleratingLoadTimeout('https://slow.test/', () =>
        Promise.reject(new errors.TimeoutError('Timeout 30000ms exceeded.')),
      ),
    ).resolves.toBeUndefined();
  });

  it('propagates other navigation errors', async () => {
    await expect(
      toleratingLoadTimeout('https://nowhere.test/', () =>
        Promise.reject(new Error('net::ERR_NAME_NOT_RESOLVED')),
      ),
    ).rejects.toThrow('net::ERR_NAME_NOT_RESOLVED');
  });
});
