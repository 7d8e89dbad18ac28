import type CDP from 'chrome-remote-interface';

export type ChromeClient = Awaited<ReturnType<typeof CDP>>;

export type BrowserLogger = ((message: string) => void) & {
  verbose?: boolean;
};

export const ROLES = [
  'voiceButton',
  'exitVoiceButton',
  'textInput',
  'responseContainer',
  'newChatButton',
  'errorBanner',
] as const;

export type Role = (typeof ROLES)[number];

export type RolePatternTable = Record<Role, readonly string[]>;

/** A parsed locator pattern: a CSS selector, optionally narrowed by visible text. */
export interface LocatorQuery {
  selector: string;
  hasText?: string;
}

/** Reference to the `index`-th match of `query`; stale after navigation or reload. */
export interface ElementHandleRef {
  query: LocatorQuery;
  index: number;
}

/** What the page reports about one match of a query. */
export interface ElementProbe {
  index: number;
  tag: string;
  visible: boolean;
  enabled: boolean;
  text: string;
  label: string;
  placeholder: string;
  className: string;
}

export interface ResolvedElement {
  role: Role;
  pattern: string;
  handle: ElementHandleRef;
  visible: boolean;
  enabled: boolean;
  tag: string;
  label: string;
  text: string;
}

export type ConversationState = 'empty' | 'populated' | 'unknown';

/**
 * The narrow slice of page automation the resolver and actions need. The CDP binding lives in
 * `cdpPageDriver.ts`; tests drive an in-process fake.
 */
export interface PageDriver {
  queryAll(query: LocatorQuery): Promise<ElementProbe[]>;
  click(handle: ElementHandleRef): Promise<void>;
  /** Focus the element, clear it, then type `text` literally. */
  fill(handle: ElementHandleRef, text: string): Promise<void>;
  pressEnter(): Promise<void>;
  currentUrl(): Promise<string>;
  navigate(url: string): Promise<void>;
  reload(): Promise<void>;
}
