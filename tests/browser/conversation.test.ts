import { describe, expect, test } from 'vitest';
import { ensureFreshConversation, readConversationState, type ConversationOptions } from '../../src/browser/actions/conversation.js';
import { RoleResolver } from '../../src/browser/roleResolver.js';
import { FakePage, TEST_PATTERNS, createFakeClock, createRecordingLogger, type FakeElement } from '../helpers/fakePage.js';

const options: ConversationOptions = {
  siteUrl: 'https://grok.com/',
  maxRetries: 3,
  retryDelayMs: 500,
  newConversationWaitMs: 2_000,
};

function threadPage(url = 'https://grok.com/c/abc123') {
  const page = new FakePage([], url);
  const reply: FakeElement = page.add({ selectors: ['.message'], text: 'An earlier answer' });
  page.add({ selectors: ['#input'], tag: 'textarea', text: '' });
  return { page, reply };
}

describe('readConversationState', () => {
  test('visible replies mean populated', async () => {
    const { page } = threadPage();
    expect(await readConversationState(new RoleResolver(page, TEST_PATTERNS))).toBe('populated');
  });

  test('no replies and an empty input mean empty', async () => {
    const page = new FakePage([{ selectors: ['#input'], text: '' }]);
    expect(await readConversationState(new RoleResolver(page, TEST_PATTERNS))).toBe('empty');
  });

  test('no replies and a drafted input is unknown', async () => {
    const page = new FakePage([{ selectors: ['#input'], text: 'half-typed draft' }]);
    expect(await readConversationState(new RoleResolver(page, TEST_PATTERNS))).toBe('unknown');
  });
});

describe('ensureFreshConversation', () => {
  test('an empty conversation needs no action', async () => {
    const page = new FakePage([{ selectors: ['#input'], text: '' }, { selectors: ['#new-chat'] }]);
    const clock = createFakeClock();

    const fresh = await ensureFreshConversation(page, new RoleResolver(page, TEST_PATTERNS), options, createRecordingLogger(), clock);

    expect(fresh).toBe(true);
    expect(page.clicks).toEqual([]);
    expect(clock.sleeps).toEqual([]);
  });

  test('clicking new chat until the thread clears', async () => {
    const { page, reply } = threadPage();
    page.add({ selectors: ['#new-chat'], onClick: (target) => target.remove(reply) });
    const clock = createFakeClock();
    const logger = createRecordingLogger();

    const fresh = await ensureFreshConversation(page, new RoleResolver(page, TEST_PATTERNS), options, logger, clock);

    expect(fresh).toBe(true);
    expect(page.clicks).toEqual(['#new-chat']);
    expect(clock.sleeps).toEqual([2_000]);
    expect(logger.lines).toEqual(['Started new conversation']);
  });

  test('landing on the site root counts as success', async () => {
    const { page } = threadPage();
    page.add({
      selectors: ['#new-chat'],
      onClick: (target) => {
        target.url = 'https://grok.com/';
      },
    });
    const logger = createRecordingLogger();

    const fresh = await ensureFreshConversation(page, new RoleResolver(page, TEST_PATTERNS), options, logger, createFakeClock());

    expect(fresh).toBe(true);
    expect(logger.lines).toEqual(['Navigated to main page']);
  });

  test('falls back to direct navigation when there is no new-chat control', async () => {
    const { page, reply } = threadPage();
    page.onNavigate = (target) => target.remove(reply);
    const clock = createFakeClock();

    const fresh = await ensureFreshConversation(page, new RoleResolver(page, TEST_PATTERNS), options, createRecordingLogger(), clock);

    expect(fresh).toBe(true);
    expect(page.navigations).toEqual(['https://grok.com/']);
    expect(clock.sleeps).toEqual([500, 500, 2_000]);
  });

  test('returns false after clicks, two navigations and a reload all fail', async () => {
    const { page } = threadPage();
    page.add({ selectors: ['#new-chat'] });
    const clock = createFakeClock();
    const logger = createRecordingLogger();

    const fresh = await ensureFreshConversation(page, new RoleResolver(page, TEST_PATTERNS), options, logger, clock);

    expect(fresh).toBe(false);
    expect(page.clicks).toEqual(['#new-chat', '#new-chat', '#new-chat']);
    expect(page.navigations).toEqual(['https://grok.com/', 'https://grok.com/']);
    expect(page.reloads).toBe(1);
    expect(logger.lines.at(-1)).toBe('Warning: could not start a new conversation');
  });
});
