import { describe, expect, test } from 'vitest';
import { detectUiError, isBenignBanner, isRateLimitMessage } from '../../src/browser/actions/uiErrors.js';
import { RoleResolver } from '../../src/browser/roleResolver.js';
import { FakePage, TEST_PATTERNS } from '../helpers/fakePage.js';

describe('banner classification', () => {
  test('benign marker matches case-insensitively; an empty marker never matches', () => {
    expect(isBenignBanner('Grok can make mistakes', 'grok')).toBe(true);
    expect(isBenignBanner('Network error', 'grok')).toBe(false);
    expect(isBenignBanner('Grok can make mistakes', '  ')).toBe(false);
  });

  test('rate-limit wording', () => {
    expect(isRateLimitMessage('You have hit the Rate Limit')).toBe(true);
    expect(isRateLimitMessage('Too many requests, slow down')).toBe(true);
    expect(isRateLimitMessage('Something went wrong')).toBe(false);
  });
});

describe('detectUiError', () => {
  test('returns the first visible, non-empty, non-benign banner text', async () => {
    const page = new FakePage([
      { selectors: ['#alert'], text: '   ' },
      { selectors: ['#alert'], text: 'Grok may display inaccurate info' },
      { selectors: ['#alert'], text: 'Hidden failure', visible: false },
      { selectors: ['#alert'], text: '  Connection lost  ' },
    ]);
    const resolver = new RoleResolver(page, TEST_PATTERNS);

    expect(await detectUiError(resolver, 'grok')).toBe('Connection lost');
  });

  test('null when only benign banners show', async () => {
    const page = new FakePage([{ selectors: ['#alert'], text: 'Grok can make mistakes' }]);
    expect(await detectUiError(new RoleResolver(page, TEST_PATTERNS), 'grok')).toBeNull();
  });
});
