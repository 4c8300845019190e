import { describe, it, expect } from 'vitest';

import {
  decide,
  extractFirstJsonObject,
  normalizeReply,
  parseDecisionReply,
  secondsToHint,
} from '../src/core/decision.js';
import type { DecisionRequest } from '../src/core/decision.js';
import type { LLMClient } from '../src/llm/index.js';
import { createMockClient } from '../src/llm/index.js';

const request: DecisionRequest = {
  task: 'Add a blue mug to the cart',
  snapshot: {
    url: 'https://shop.test/',
    interactiveElements: [{ role: 'link', accessibleText: 'Products' }],
    visibleText: ['Welcome to the shop'],
  },
  history: [],
  advisories: [],
  credentialsAvailable: false,
};

describe('parseDecisionReply', () => {
  it('parses a well-formed reply strictly', () => {
    expect(parseDecisionReply('{"action":"click","targetText":"Products"}')).toEqual({
      ok: true,
      action: { kind: 'click', targetText: 'Products' },
      strategy: 'strict',
    });
  });

  it('extracts the JSON object from surrounding prose and code fences', () => {
    const raw = 'Sure! Here is the action:\n```json\n{"action": "press", "key": "Enter"}\n```';
    expect(parseDecisionReply(raw)).toEqual({
      ok: true,
      action: { kind: 'press', key: 'Enter' },
      strategy: 'extracted',
    });
  });

  it('maps alternate field spellings', () => {
    const typed = parseDecisionReply('{"action":"type","target_text":"Email","text":"someone"}');
    expect(typed.ok && typed.action).toEqual({ kind: 'type', targetText: 'Email', value: 'someone' });

    const nested = parseDecisionReply('{"action":{"kind":"FINISH","summary":"done"}}');
    expect(nested.ok && nested.action).toEqual({ kind: 'finish', reason: 'done' });

    const waited = parseDecisionReply('{"action":"wait","seconds":2}');
    expect(waited.ok && waited.action).toEqual({ kind: 'wait', durationHint: 'medium' });
  });

  it('keeps unknown kinds for the resolver to reject', () => {
    const result = parseDecisionReply('{"action":"scroll","direction":"down"}');
    expect(result.ok && result.action).toEqual({ kind: 'scroll' });
  });

  it('fails on empty, non-JSON and kind-less replies', () => {
    expect(parseDecisionReply('   ')).toEqual({ ok: false, error: 'empty reply' });

    const prose = parseDecisionReply('I think we should click the button');
    expect(prose.ok).toBe(false);
    expect(prose.ok ? '' : prose.error).toMatch(/^no JSON object found/);

    expect(parseDecisionReply('{"foo": 1}').ok).toBe(false);
  });
});

describe('extractFirstJsonObject', () => {
  it('ignores braces inside strings', () => {
    expect(extractFirstJsonObject('a {"x": "}"} b')).toBe('{"x": "}"}');
  });

  it('skips an unbalanced opening brace', () => {
    expect(extractFirstJsonObject('{ unbalanced {"a":1}')).toBe('{"a":1}');
  });

  it('returns undefined when there is no object', () => {
    expect(extractFirstJsonObject('no braces here')).toBeUndefined();
  });
});

describe('normalizeReply', () => {
  it('passes non-objects through unchanged', () => {
    expect(normalizeReply('click')).toBe('click');
    expect(normalizeReply([1, 2])).toEqual([1, 2]);
  });

  it('keeps a valid durationHint over a numeric duration', () => {
    expect(normalizeReply({ kind: 'wait', durationHint: 'long', seconds: 1 })).toEqual({
      kind: 'wait',
      durationHint: 'long',
    });
  });
});

describe('secondsToHint', () => {
  it('buckets seconds into hints', () => {
    expect([0.5, 1, 3, 10].map(secondsToHint)).toEqual(['short', 'short', 'medium', 'long']);
  });
});

describe('decide', () => {
  it('returns the parsed action and sends the rendered prompt', async () => {
    const client = createMockClient(['{"action":"click","targetText":"Products"}']);
    const decision = await decide(client, request);

    expect(decision.action).toEqual({ kind: 'click', targetText: 'Products' });
    expect(decision.failure).toBeUndefined();
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0]?.userPrompt).toContain('TASK: Add a blue mug to the cart');
    expect(client.calls[0]?.userPrompt).toContain('  - "Products"');
  });

  it('substitutes the safe default for an unusable reply', async () => {
    const decision = await decide(createMockClient(['garbage']), request);
    expect(decision).toEqual({
      action: { kind: 'wait', durationHint: 'short' },
      failure: 'DecisionParseFailure',
      failureMessage: 'no JSON object found (Invalid JSON: ' + failureDetail('garbage') + ')',
      rawReply: 'garbage',
    });
  });

  it('never throws when the provider fails', async () => {
    const client: LLMClient = {
      generate: () => Promise.reject(new Error('rate limited')),
    };
    const decision = await decide(client, request);
    expect(decision.failure).toBe('DecisionParseFailure');
    expect(decision.failureMessage).toBe('rate limited');
    expect(decision.rawReply).toBe('');
  });

  it('bounds the oracle call with the decision timeout', async () => {
    const client: LLMClient = { generate: () => new Promise<string>(() => undefined) };
    const decision = await decide(client, request, { timeoutMs: 20 });
    expect(decision.action).toEqual({ kind: 'wait', durationHint: 'short' });
    expect(decision.failureMessage).toBe('Decision oracle call timed out after 20ms');
  });
});

describe('createMockClient', () => {
  it('replays responses in order and then repeats the last one', async () => {
    const client = createMockClient(['one', 'two']);
    const replies = [
      await client.generate('s', 'u'),
      await client.generate('s', 'u'),
      await client.generate('s', 'u'),
    ];
    expect(replies).toEqual(['one', 'two', 'two']);
  });

  it('finishes when given no responses', async () => {
    expect(await createMockClient().generate('s', 'u')).toBe('{"action":"finish","reason":"mock provider"}');
  });
});

function failureDetail(text: string): string {
  try {
    JSON.parse(text);
    return '';
  } catch (e) {
    return e instanceof Error ? e.message : String(e);
  }
}
