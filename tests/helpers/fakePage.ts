import type { ElementHandleRef, ElementProbe, LocatorQuery, PageDriver, RolePatternTable } from '../../src/browser/types.js';
import type { BrowserLogger } from '../../src/browser/types.js';

/** One element of the fake DOM; `selectors` are the exact pattern strings it answers to. */
export interface FakeElement {
  selectors: string[];
  text?: string | (() => string);
  visible?: boolean;
  enabled?: boolean;
  tag?: string;
  label?: string;
  placeholder?: string;
  className?: string;
  onClick?: (page: FakePage) => void;
}

export const TEST_PATTERNS: RolePatternTable = {
  voiceButton: ['#voice'],
  exitVoiceButton: ['#exit-voice'],
  textInput: ['#input'],
  responseContainer: ['.message'],
  newChatButton: ['#new-chat'],
  errorBanner: ['#alert'],
};

export class FakePage implements PageDriver {
  elements: FakeElement[];
  url: string;
  readonly clicks: string[] = [];
  readonly typed: Array<{ selector: string; text: string }> = [];
  readonly navigations: string[] = [];
  enterPresses = 0;
  reloads = 0;
  onEnter?: (page: FakePage) => void;
  onNavigate?: (page: FakePage) => void;
  onReload?: (page: FakePage) => void;
  failQueries = false;

  constructor(elements: FakeElement[] = [], url = 'https://grok.com/') {
    this.elements = elements;
    this.url = url;
  }

  add(element: FakeElement): FakeElement {
    this.elements.push(element);
    return element;
  }

  remove(element: FakeElement): void {
    this.elements = this.elements.filter((candidate) => candidate !== element);
  }

  async queryAll(query: LocatorQuery): Promise<ElementProbe[]> {
    if (this.failQueries) {
      throw new Error('page is gone');
    }
    return this.matches(query).map((element, index) => ({
      index,
      tag: element.tag ?? 'div',
      visible: element.visible ?? true,
      enabled: element.enabled ?? true,
      text: readText(element),
      label: element.label ?? '',
      placeholder: element.placeholder ?? '',
      className: element.className ?? '',
    }));
  }

  async click(handle: ElementHandleRef): Promise<void> {
    const element = this.elementFor(handle);
    this.clicks.push(handle.query.selector);
    element.onClick?.(this);
  }

  async fill(handle: ElementHandleRef, text: string): Promise<void> {
    const element = this.elementFor(handle);
    this.typed.push({ selector: handle.query.selector, text });
    element.text = text;
  }

  async pressEnter(): Promise<void> {
    this.enterPresses += 1;
    this.onEnter?.(this);
  }

  async currentUrl(): Promise<string> {
    return this.url;
  }

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    this.url = url;
    this.onNavigate?.(this);
  }

  async reload(): Promise<void> {
    this.reloads += 1;
    this.onReload?.(this);
  }

  private matches(query: LocatorQuery): FakeElement[] {
    const pattern = query.hasText === undefined ? query.selector : `${query.selector}:has-text('${query.hasText}')`;
    return this.elements.filter((element) => element.selectors.includes(pattern));
  }

  private elementFor(handle: ElementHandleRef): FakeElement {
    const element = this.matches(handle.query)[handle.index];
    if (!element) {
      throw new Error(`no element for ${handle.query.selector} [${handle.index}]`);
    }
    return element;
  }
}

function readText(element: FakeElement): string {
  return typeof element.text === 'function' ? element.text() : element.text ?? '';
}

export function createRecordingLogger(verbose = false): BrowserLogger & { lines: string[] } {
  const lines: string[] = [];
  const logger = Object.assign((message: string) => {
    lines.push(message);
  }, { lines, verbose });
  return logger;
}

/** Instant timers: `sleep` advances the fake clock and records every pause. */
export function createFakeClock(onSleep?: (ms: number, clock: { now: number }) => void) {
  const state = { now: 0 };
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => state.now,
    sleep: async (ms: number) => {
      state.now += ms;
      sleeps.push(ms);
      onSleep?.(ms, state);
    },
  };
}
