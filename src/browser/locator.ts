import type { ElementHandleRef, LocatorQuery } from './types.js';

const HAS_TEXT_SUFFIX = /:has-text\((?:'([^']*)'|"([^"]*)")\)\s*$/;

/**
 * Parses one locator pattern: a CSS selector with an optional trailing `:has-text('…')` that
 * keeps only elements whose visible text contains the given substring (case-insensitive).
 */
export function parseLocatorPattern(pattern: string): LocatorQuery {
  const trimmed = pattern.trim();
  if (!trimmed) {
    throw new Error('Locator pattern is empty.');
  }
  const match = HAS_TEXT_SUFFIX.exec(trimmed);
  if (!match) {
    if (trimmed.includes(':has-text(')) {
      throw new Error(`Unsupported :has-text() placement in "${pattern}"; it must close the pattern.`);
    }
    return { selector: trimmed };
  }
  const selector = trimmed.slice(0, match.index).trim() || '*';
  if (selector.includes(':has-text(')) {
    throw new Error(`Only one :has-text() filter is supported in "${pattern}".`);
  }
  const hasText = match[1] ?? match[2] ?? '';
  if (!hasText) {
    throw new Error(`:has-text() needs a non-empty argument in "${pattern}".`);
  }
  return { selector, hasText };
}

export function formatLocatorQuery(query: LocatorQuery): string {
  return query.hasText ? `${query.selector}:has-text(${JSON.stringify(query.hasText)})` : query.selector;
}

/** Page-side helper that returns the matches of a query in document order. */
function buildMatchCollector(query: LocatorQuery): string {
  return `const collectMatches = () => {
      const selector = ${JSON.stringify(query.selector)};
      const needle = ${JSON.stringify(query.hasText?.toLowerCase() ?? null)};
      const nodes = Array.from(document.querySelectorAll(selector));
      if (!needle) return nodes;
      return nodes.filter((node) => ((node.innerText ?? node.textContent) || '').toLowerCase().includes(needle));
    };`;
}

const VISIBILITY_HELPERS = `const isVisible = (node) => {
      if (!(node instanceof Element)) return false;
      const style = window.getComputedStyle(node);
      if (style.visibility === 'hidden' || style.display === 'none') return false;
      const rect = node.getBoundingClientRect();
      return rect.width > 0 && rect.height > 0;
    };
    const isEnabled = (node) => {
      if (node.hasAttribute('disabled')) return false;
      if (node.getAttribute('aria-disabled') === 'true') return false;
      return !node.closest('fieldset[disabled]');
    };
    const readText = (node) => {
      if (node instanceof HTMLInputElement || node instanceof HTMLTextAreaElement) return node.value ?? '';
      return (node.innerText ?? node.textContent) || '';
    };`;

export function buildProbeExpression(query: LocatorQuery): string {
  return `(() => {
    ${buildMatchCollector(query)}
    ${VISIBILITY_HELPERS}
    return collectMatches().map((node, index) => ({
      index,
      tag: node.tagName.toLowerCase(),
      visible: isVisible(node),
      enabled: isEnabled(node),
      text: readText(node).trim(),
      label: node.getAttribute('aria-label') || '',
      placeholder: node.getAttribute('placeholder') || '',
      className: typeof node.className === 'string' ? node.className : node.getAttribute('class') || '',
    }));
  })()`;
}

/**
 * Scrolls the referenced element into view and reports the viewport point to click. Returns
 * `{ found: false }` when the handle went stale.
 */
export function buildClickTargetExpression(handle: ElementHandleRef): string {
  return `(() => {
    ${buildMatchCollector(handle.query)}
    const node = collectMatches()[${handle.index}];
    if (!node) return { found: false };
    node.scrollIntoView({ block: 'center', inline: 'center', behavior: 'instant' });
    const rect = node.getBoundingClientRect();
    return { found: true, x: rect.left + rect.width / 2, y: rect.top + rect.height / 2, width: rect.width, height: rect.height };
  })()`;
}

/** Synthetic pointer/mouse sequence for elements with no usable box. */
export function buildDomClickExpression(handle: ElementHandleRef): string {
  return `(() => {
    ${buildMatchCollector(handle.query)}
    const node = collectMatches()[${handle.index}];
    if (!node) return false;
    const types = ['pointerdown', 'mousedown', 'pointerup', 'mouseup', 'click'];
    for (const type of types) {
      const EventCtor = type.startsWith('pointer') && typeof PointerEvent === 'function' ? PointerEvent : MouseEvent;
      node.dispatchEvent(new EventCtor(type, { bubbles: true, cancelable: true, view: window }));
    }
    return true;
  })()`;
}

/** Focuses the element, places the caret at the end and empties it. */
export function buildFocusAndClearExpression(handle: ElementHandleRef): string {
  return `(() => {
    ${buildMatchCollector(handle.query)}
    const node = collectMatches()[${handle.index}];
    if (!node) return { focused: false };
    if (typeof node.focus === 'function') node.focus();
    if (node instanceof HTMLInputElement || node instanceof HTMLTextAreaElement) {
      node.value = '';
      node.dispatchEvent(new InputEvent('input', { bubbles: true, data: '', inputType: 'deleteContentBackward' }));
      return { focused: document.activeElement === node };
    }
    node.textContent = '';
    node.dispatchEvent(new InputEvent('input', { bubbles: true, data: '', inputType: 'deleteContentBackward' }));
    const selection = node.ownerDocument?.getSelection?.();
    if (selection) {
      const range = node.ownerDocument.createRange();
      range.selectNodeContents(node);
      range.collapse(false);
      selection.removeAllRanges();
      selection.addRange(range);
    }
    return { focused: node.contains(document.activeElement) || document.activeElement === node };
  })()`;
}
