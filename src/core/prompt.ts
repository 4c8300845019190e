import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { TOKEN_GUARDS } from '../config/defaults.js';
import type { InteractiveElement, PageStateSnapshot } from '../schema/index.js';
import { CREDENTIAL_PLACEHOLDERS } from './credentials.js';
import type { HistorySummary } from './history.js';
import { formatHistory } from './history.js';

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── Public types ─────────────────────────────────────────────

export interface DecisionPromptInput {
  task: string;
  snapshot: PageStateSnapshot;
  history: HistorySummary;
  advisories: readonly string[];
  credentialsAvailable: boolean;
}

export interface DecisionPrompt {
  systemPrompt: string;
  userPrompt: string;
}

// ── Template rendering ───────────────────────────────────────

/**
 * Single-pass `{{name}}` substitution. Inserted values are never
 * re-scanned, and unknown names are left untouched.
 */
export function renderTemplate(
  template: string,
  vars: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (whole, name: string) =>
    Object.hasOwn(vars, name) ? (vars[name] ?? '') : whole,
  );
}

export async function buildDecisionPrompt(
  input: DecisionPromptInput,
): Promise<DecisionPrompt> {
  const [systemTemplate, stepTemplate] = await Promise.all([
    readFile(path.join(PROMPTS_DIR, 'decide_system.txt'), 'utf-8'),
    readFile(path.join(PROMPTS_DIR, 'decide_step.txt'), 'utf-8'),
  ]);

  const credentialRule = input.credentialsAvailable
    ? `6. If a login form asks for credentials, type ${CREDENTIAL_PLACEHOLDERS.username} as the username and ${CREDENTIAL_PLACEHOLDERS.password} as the password. Never invent credentials.`
    : '6. No credentials are available. Do not try to log in with made-up values.';

  const advisories = input.advisories.length > 0
    ? `\nNOTES:\n${input.advisories.map((a) => `- ${a}`).join('\n')}\n`
    : '';

  return {
    systemPrompt: renderTemplate(systemTemplate, { credentialRule }),
    userPrompt: renderTemplate(stepTemplate, {
      task: input.task,
      url: input.snapshot.url,
      elements: formatElements(input.snapshot.interactiveElements),
      visibleText: formatVisibleText(input.snapshot.visibleText),
      history: formatHistory(input.history),
      advisories,
    }),
  };
}

// ── Element formatting ───────────────────────────────────────

const ROLE_HEADINGS: Readonly<Record<string, string>> = {
  button: 'Buttons',
  link: 'Links',
  input: 'Inputs',
  textarea: 'Text areas',
  textbox: 'Text boxes',
  select: 'Selects',
};

function formatElement(el: InteractiveElement): string {
  const type = el.inputType ? ` (${el.inputType})` : '';
  const hint = el.identifierHint ? ` [${el.identifierHint}]` : '';
  return `  - "${el.accessibleText}"${type}${hint}`;
}

/** Group by role, capping each group so large pages stay within budget. */
export function formatElements(elements: readonly InteractiveElement[]): string {
  if (elements.length === 0) return '- (No interactive elements found)';

  const groups = new Map<string, InteractiveElement[]>();
  for (const el of elements) {
    const group = groups.get(el.role) ?? [];
    group.push(el);
    groups.set(el.role, group);
  }

  const sections: string[] = [];
  for (const [role, group] of groups) {
    const heading = ROLE_HEADINGS[role] ?? role;
    const shown = group.slice(0, TOKEN_GUARDS.MAX_ELEMENTS_PER_ROLE);
    const lines = shown.map(formatElement);
    if (group.length > shown.length) {
      lines.push(`  ... (${String(group.length - shown.length)} more)`);
    }
    sections.push(`${heading}:\n${lines.join('\n')}`);
  }

  return sections.join('\n\n');
}

export function formatVisibleText(lines: readonly string[]): string {
  const text = lines.join('\n');
  if (text.length <= TOKEN_GUARDS.MAX_VISIBLE_TEXT_CHARS) return text;
  return `${text.slice(0, TOKEN_GUARDS.MAX_VISIBLE_TEXT_CHARS)}\n... (truncated)`;
}
