import type { BrowserLogger, ConversationState, PageDriver } from '../types.js';
import type { RoleResolver } from '../roleResolver.js';
import { delay, isSiteRoot } from '../utils.js';
import { describeError } from '../../errors.js';

export interface ConversationOptions {
  siteUrl: string;
  maxRetries: number;
  retryDelayMs: number;
  newConversationWaitMs: number;
  /** Pause after a navigation or reload before re-reading the state. */
  navigationSettleMs?: number;
  navigationAttempts?: number;
}

export interface ConversationDeps {
  sleep?: (ms: number) => Promise<void>;
}

export async function readConversationState(resolver: RoleResolver): Promise<ConversationState> {
  const responses = await resolver.resolveAll('responseContainer');
  if (responses.length > 0) {
    return 'populated';
  }
  const input = await resolver.resolve('textInput', { requireEnabled: false });
  if (input && input.text.trim() === '') {
    return 'empty';
  }
  return 'unknown';
}

/**
 * Gets the page to an empty conversation: new-chat control first, then direct navigation to
 * the site root, then a reload. Resolves `false` when none worked; callers carry on.
 */
export async function ensureFreshConversation(
  page: PageDriver,
  resolver: RoleResolver,
  options: ConversationOptions,
  logger: BrowserLogger,
  deps: ConversationDeps = {},
): Promise<boolean> {
  const { sleep = delay } = deps;
  const settleMs = options.navigationSettleMs ?? 2_000;
  const navigationAttempts = options.navigationAttempts ?? 2;

  if ((await readConversationState(resolver)) === 'empty') {
    logger('Already in a new conversation');
    return true;
  }

  for (let attempt = 1; attempt <= options.maxRetries; attempt += 1) {
    const button = await resolver.resolve('newChatButton');
    if (button) {
      try {
        await page.click(button.handle);
        await sleep(options.newConversationWaitMs);
        if ((await readConversationState(resolver)) === 'empty') {
          logger('Started new conversation');
          return true;
        }
        if (isSiteRoot(await page.currentUrl(), options.siteUrl)) {
          logger('Navigated to main page');
          return true;
        }
      } catch (error) {
        logger(`New chat button failed: ${describeError(error)}`);
      }
    } else {
      logger('New chat button not found');
    }
    if (attempt < options.maxRetries) {
      await sleep(options.retryDelayMs);
    }
  }

  logger('Trying direct navigation...');
  for (let attempt = 1; attempt <= navigationAttempts; attempt += 1) {
    try {
      await page.navigate(options.siteUrl);
      await sleep(settleMs);
      if ((await readConversationState(resolver)) !== 'populated') {
        logger('Navigation successful');
        return true;
      }
    } catch (error) {
      logger(`Navigation attempt ${attempt} failed: ${describeError(error)}`);
    }
  }

  logger('Trying page reload...');
  try {
    await page.reload();
    await sleep(settleMs);
    if ((await readConversationState(resolver)) !== 'populated') {
      logger('Reload produced an empty conversation');
      return true;
    }
  } catch (error) {
    logger(`Reload failed: ${describeError(error)}`);
  }

  logger('Warning: could not start a new conversation');
  return false;
}
