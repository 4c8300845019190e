import type { Page } from 'playwright';

import { TOKEN_GUARDS } from '../config/defaults.js';
import type { InteractiveElement, PageStateSnapshot } from '../schema/index.js';

// ── Public API ───────────────────────────────────────────────

/**
 * Extract a structured snapshot of the current page.
 * Pure DOM extraction, identical for every site.
 */
export async function serializePage(page: Page): Promise<PageStateSnapshot> {
  const [bodyText, interactiveElements] = await Promise.all([
    // A page mid-navigation may have no body yet
    page.innerText('body').then((t) => t, () => ''),
    page.evaluate(extractFromDOM),
  ]);

  return {
    url: page.url(),
    interactiveElements,
    visibleText: splitVisibleText(bodyText),
  };
}

export function splitVisibleText(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, TOKEN_GUARDS.MAX_VISIBLE_TEXT_LINES);
}

// ── Browser-context extraction ───────────────────────────────
// This function is serialized and executed inside the browser.
// It must NOT reference any outer-scope variables.

function extractFromDOM(): InteractiveElement[] {
  function attr(el: Element, name: string): string | undefined {
    return el.getAttribute(name) ?? undefined;
  }

  function textOf(el: Element): string {
    const inner = el instanceof HTMLElement ? el.innerText : el.textContent;
    return (inner ?? '').replace(/\s+/g, ' ').trim();
  }

  function isVisible(el: Element): boolean {
    if (!(el instanceof HTMLElement)) return true;
    if (el.hidden) return false;
    return el.getClientRects().length > 0;
  }

  function getLabel(el: Element): string {
    const ariaLabel = el.getAttribute('aria-label');
    if (ariaLabel) return ariaLabel.trim();

    const placeholder = el.getAttribute('placeholder');
    if (placeholder) return placeholder.trim();

    const id = el.getAttribute('id');
    if (id) {
      const labelEl = document.querySelector(`label[for="${CSS.escape(id)}"]`);
      const labelText = labelEl?.textContent?.trim();
      if (labelText) return labelText;
    }

    const parent = el.closest('label');
    return parent?.textContent?.trim() ?? '';
  }

  function hintOf(el: Element): string | undefined {
    return attr(el, 'data-testid') ?? attr(el, 'name') ?? attr(el, 'id') ?? attr(el, 'href');
  }

  const seen = new Set<Element>();
  const elements: InteractiveElement[] = [];

  function add(el: Element, data: InteractiveElement): void {
    if (seen.has(el) || !isVisible(el)) return;
    seen.add(el);
    if (!data.accessibleText && !data.identifierHint) return;
    elements.push(data);
  }

  // Buttons (native + ARIA role)
  document.querySelectorAll('button, [role="button"], input[type="submit"]').forEach((el) => {
    const text = textOf(el) || attr(el, 'aria-label') || attr(el, 'value') || '';
    add(el, { role: 'button', accessibleText: text, identifierHint: hintOf(el) });
  });

  // Links
  document.querySelectorAll('a[href]').forEach((el) => {
    add(el, {
      role: 'link',
      accessibleText: textOf(el) || attr(el, 'aria-label') || '',
      identifierHint: hintOf(el),
    });
  });

  // Inputs (text, password, email, ...)
  document.querySelectorAll('input').forEach((el) => {
    if (el.type === 'hidden' || el.type === 'submit') return;
    add(el, {
      role: 'input',
      accessibleText: getLabel(el),
      identifierHint: hintOf(el),
      inputType: el.type || 'text',
    });
  });

  // Textareas + contenteditable textboxes
  document.querySelectorAll('textarea, [role="textbox"], [contenteditable="true"]').forEach((el) => {
    add(el, {
      role: el.tagName.toLowerCase() === 'textarea' ? 'textarea' : 'textbox',
      accessibleText: getLabel(el),
      identifierHint: hintOf(el),
    });
  });

  // Selects
  document.querySelectorAll('select').forEach((el) => {
    add(el, {
      role: 'select',
      accessibleText: getLabel(el),
      identifierHint: hintOf(el),
    });
  });

  return elements;
}
