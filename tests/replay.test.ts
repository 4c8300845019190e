import { describe, it, expect } from 'vitest';

import { runTask } from '../src/core/orchestrator.js';
import { replayTrace, sameSet } from '../src/core/replay.js';
import { createMockClient } from '../src/llm/index.js';
import { generateTraceDocument } from '../src/report/reporter.js';
import type { TraceDocument } from '../src/schema/index.js';
import {
  APP_HOME,
  FakeSite,
  SHOP_HOME,
  SHOP_PRODUCTS,
  loginPages,
  reply,
  shopPages,
} from './helpers/fake-site.js';

const credentials = { username: 'test-user', password: 'test-secret' };

async function recordShopRun(): Promise<TraceDocument> {
  const site = new FakeSite(shopPages());
  const llm = createMockClient([
    reply({ action: 'click', targetText: 'Products' }),
    reply({ action: 'click', targetText: 'Home' }),
    reply({ action: 'finish', reason: 'browsed' }),
  ]);
  const trace = await runTask({ llm, browser: site, serializer: site }, { task: 'Browse', startUrl: SHOP_HOME });
  return generateTraceDocument(trace);
}

async function recordLoginRun(): Promise<TraceDocument> {
  const site = new FakeSite(loginPages());
  const llm = createMockClient([
    reply({ action: 'click', targetText: 'Log in' }),
    reply({ action: 'type', targetText: 'Email', value: 'someone' }),
    reply({ action: 'type', targetText: 'Password', value: 'anything' }),
    reply({ action: 'click', targetText: 'Submit' }),
    reply({ action: 'finish', reason: 'logged in' }),
  ]);
  const trace = await runTask(
    { llm, browser: site, serializer: site },
    { task: 'Log in', startUrl: APP_HOME, credentials },
  );
  return generateTraceDocument(trace);
}

describe('replayTrace', () => {
  it('reproduces the recorded diffs against the same site', async () => {
    const document = await recordShopRun();
    const site = new FakeSite(shopPages());

    const result = await replayTrace(document, { browser: site, serializer: site });

    expect(result.matches).toBe(true);
    expect(result.steps.map((s) => s.matches)).toEqual([true, true, true]);
    expect(result.steps[0]?.actualAppeared).toEqual(['link "Home"', 'button "Add to cart"']);
    expect(site.clicks.map((c) => c.targetText)).toEqual(['Products', 'Home']);
  });

  it('is idempotent across repeated replays', async () => {
    const document = await recordShopRun();
    const siteA = new FakeSite(shopPages());
    const siteB = new FakeSite(shopPages());

    const a = await replayTrace(document, { browser: siteA, serializer: siteA });
    const b = await replayTrace(document, { browser: siteB, serializer: siteB });

    expect(a).toEqual(b);
    expect(a.steps).toHaveLength(3);
  });

  it('reports divergence when the site behaves differently', async () => {
    const document = await recordShopRun();
    const pages = shopPages();
    const home = pages[0];
    if (home) home.clicks = {};
    const site = new FakeSite(pages);

    const result = await replayTrace(document, { browser: site, serializer: site });

    expect(result.matches).toBe(false);
    expect(result.steps[0]?.matches).toBe(false);
    expect(result.steps[0]?.actualAppeared).toEqual([]);
    expect(result.steps[0]?.expectedAppeared).toEqual(['link "Home"', 'button "Add to cart"']);
  });

  it('fills credential placeholders from the supplied credentials', async () => {
    const document = await recordLoginRun();
    expect(document.steps[1]?.action.value).toBe('{{username}}');
    const site = new FakeSite(loginPages());

    const result = await replayTrace(document, { browser: site, serializer: site }, { credentials });

    expect(result.matches).toBe(true);
    expect(site.typed).toEqual([
      { targetText: 'Email', value: 'test-user' },
      { targetText: 'Password', value: 'test-secret' },
    ]);
  });

  it('cannot type placeholders without credentials', async () => {
    const document = await recordLoginRun();
    const site = new FakeSite(loginPages());

    const result = await replayTrace(document, { browser: site, serializer: site });

    expect(result.steps[1]?.failureKind).toBe('CredentialUnavailable');
    expect(site.typed).toEqual([]);
  });

  it('replays escalated steps with escalated lookup', async () => {
    const recorded = await recordShopRun();
    const document: TraceDocument = {
      ...recorded,
      steps: recorded.steps.map((step) => (step.index === 0 ? { ...step, escalated: true } : step)),
    };
    const site = new FakeSite(shopPages());

    await replayTrace(document, { browser: site, serializer: site });

    expect(site.clicks).toEqual([
      { targetText: 'Products', escalate: true },
      { targetText: 'Home', escalate: false },
    ]);
  });

  it('starts from the recorded url', async () => {
    const document = await recordShopRun();
    const site = new FakeSite(shopPages());
    await replayTrace(document, { browser: site, serializer: site });
    expect(site.url).toBe(SHOP_HOME);
    expect(document.steps[0]?.urlAfter).toBe(SHOP_PRODUCTS);
  });
});

describe('sameSet', () => {
  it('ignores order and duplicates', () => {
    expect(sameSet(['a', 'b', 'a'], ['b', 'a'])).toBe(true);
    expect(sameSet(['a'], ['a', 'b'])).toBe(false);
  });
});
