import { describe, it, expect } from 'vitest';

import { diffSnapshots } from '../src/core/diff.js';
import type { PageStateSnapshot } from '../src/schema/index.js';

describe('diffSnapshots', () => {
  const before: PageStateSnapshot = {
    url: 'https://shop.test/',
    interactiveElements: [
      { role: 'link', accessibleText: 'Products' },
      { role: 'button', accessibleText: 'Sign in' },
      { role: 'button', accessibleText: 'Sign in' },
    ],
    visibleText: [],
  };

  it('reports appeared and disappeared elements once each', () => {
    const after: PageStateSnapshot = {
      url: 'https://shop.test/',
      interactiveElements: [
        { role: 'link', accessibleText: 'Products' },
        { role: 'button', accessibleText: 'Sign out' },
      ],
      visibleText: [],
    };

    expect(diffSnapshots(before, after)).toEqual({
      elementsAppeared: [{ role: 'button', accessibleText: 'Sign out' }],
      elementsDisappeared: [{ role: 'button', accessibleText: 'Sign in' }],
      urlChanged: false,
    });
  });

  it('treats a changed input type as a different element', () => {
    const after: PageStateSnapshot = {
      ...before,
      interactiveElements: [
        ...before.interactiveElements,
        { role: 'link', accessibleText: 'Products', inputType: 'x' },
      ],
    };
    expect(diffSnapshots(before, after).elementsAppeared).toHaveLength(1);
  });

  it('flags a url change with identical elements', () => {
    const after = { ...before, url: 'https://shop.test/?page=2' };
    expect(diffSnapshots(before, after)).toEqual({
      elementsAppeared: [],
      elementsDisappeared: [],
      urlChanged: true,
    });
  });
});
