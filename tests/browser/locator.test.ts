import { describe, expect, test } from 'vitest';
import { buildProbeExpression, formatLocatorQuery, parseLocatorPattern } from '../../src/browser/locator.js';
import { ROLE_PATTERNS } from '../../src/browser/constants.js';
import { ROLES } from '../../src/browser/types.js';

describe('parseLocatorPattern', () => {
  test('plain CSS passes through trimmed', () => {
    expect(parseLocatorPattern("  [aria-label*='voice'] ")).toEqual({ selector: "[aria-label*='voice']" });
  });

  test('splits a trailing :has-text filter', () => {
    expect(parseLocatorPattern("button:has-text('Exit voice')")).toEqual({ selector: 'button', hasText: 'Exit voice' });
    expect(parseLocatorPattern('button:has-text("New")')).toEqual({ selector: 'button', hasText: 'New' });
  });

  test('a bare :has-text matches any element', () => {
    expect(parseLocatorPattern(":has-text('Retry')")).toEqual({ selector: '*', hasText: 'Retry' });
  });

  test('rejects empty patterns and misplaced filters', () => {
    expect(() => parseLocatorPattern('   ')).toThrow('Locator pattern is empty.');
    expect(() => parseLocatorPattern("button:has-text('a') > span")).toThrow(/must close the pattern/);
    expect(() => parseLocatorPattern("div:has-text('a') button:has-text('b')")).toThrow(/Only one :has-text/);
    expect(() => parseLocatorPattern("button:has-text('')")).toThrow(/non-empty argument/);
  });

  test('every built-in pattern parses', () => {
    for (const role of ROLES) {
      for (const pattern of ROLE_PATTERNS[role]) {
        expect(() => parseLocatorPattern(pattern)).not.toThrow();
      }
    }
  });
});

describe('page expressions', () => {
  test('format shows the text filter quoted', () => {
    expect(formatLocatorQuery({ selector: 'button', hasText: 'New' })).toBe('button:has-text("New")');
    expect(formatLocatorQuery({ selector: 'textarea' })).toBe('textarea');
  });

  test('probe expression embeds the selector and lower-cased needle as JSON literals', () => {
    const expression = buildProbeExpression({ selector: "[aria-label*='Voice']", hasText: 'Exit Voice' });
    expect(expression).toContain(`const selector = "[aria-label*='Voice']";`);
    expect(expression).toContain('const needle = "exit voice";');
  });
});
