import type { RolePatternTable } from './types.js';

export const GROK_URL = 'https://grok.com/';
export const DEFAULT_CHROME_PORT = 9222;
export const DEFAULT_CHROME_HOST = '127.0.0.1';

// Grok's markup is unversioned, so every role carries overlapping heuristics. Order is priority:
// the selectors proven by UI discovery first, then semantic, test-id, class and text fallbacks.
export const ROLE_PATTERNS: RolePatternTable = {
  voiceButton: [
    "[aria-label*='voice']",
    "[aria-label*='Voice']",
    "button[title*='voice']",
    "button[title*='Voice']",
    "[data-testid*='voice']",
    "button:has-text('voice')",
    "[class*='voice']",
  ],
  exitVoiceButton: [
    "[aria-label='Exit voice mode']",
    "button[aria-label*='Exit voice']",
    "button[aria-label*='End voice']",
    "button:has-text('Exit voice')",
  ],
  textInput: [
    "[contenteditable='true']",
    'textarea',
    "[role='textbox']",
    "textarea[placeholder*='Ask']",
    "textarea[placeholder*='Message']",
    "input[type='text']",
  ],
  responseContainer: [
    "[class*='message']",
    "[class*='response']",
    "[role='log']",
    "[data-testid*='message']",
    "[data-testid*='response']",
  ],
  newChatButton: [
    "a[href='/']",
    "a[href='https://grok.com']",
    "[aria-label*='New']",
    "[aria-label*='new']",
    "button:has-text('New')",
    "[class*='new']",
  ],
  errorBanner: ["[role='alert']", "[class*='error']", "[class*='Error']", "[aria-label*='error']"],
};

export const RATE_LIMIT_MARKERS = ['rate limit', 'too many'];
export const DEFAULT_BENIGN_ERROR_MARKER = 'grok';

export const ENTER_KEY_EVENT = {
  key: 'Enter',
  code: 'Enter',
  windowsVirtualKeyCode: 13,
  nativeVirtualKeyCode: 13,
} as const;
export const ENTER_KEY_TEXT = '\r';
