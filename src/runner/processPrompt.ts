import chalk from 'chalk';
import type { BrowserLogger, PageDriver } from '../browser/types.js';
import type { RoleResolver } from '../browser/roleResolver.js';
import type { PromptInput } from '../browser/actions/promptInput.js';
import type { RunConfig } from '../config.js';
import type { PromptRecord, ResultRecord } from '../results.js';
import { ensureFreshConversation } from '../browser/actions/conversation.js';
import { detectUiError } from '../browser/actions/uiErrors.js';
import { formatReply, isErrorReply, waitForReply } from '../browser/actions/replyWatcher.js';
import { delay, previewText } from '../browser/utils.js';
import { describeError } from '../errors.js';

/** Everything a prompt needs from the attached tab. */
export interface PromptSession {
  page: PageDriver;
  resolver: RoleResolver;
  input: Pick<PromptInput, 'submit' | 'exitVoiceMode'>;
}

export interface ProcessPromptDeps {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const RELOAD_SETTLE_MS = 2_000;

/**
 * Runs one prompt end to end with up to `maxRetries` attempts. Never throws: every failure ends
 * up as an `Error: ...` reply in the returned record.
 */
export async function processPrompt(
  prompt: PromptRecord,
  session: PromptSession,
  config: RunConfig,
  logger: BrowserLogger,
  deps: ProcessPromptDeps = {},
): Promise<ResultRecord> {
  const { sleep = delay, now = Date.now } = deps;
  const { page, resolver, input } = session;
  const record = (reply: string): ResultRecord => ({ id: prompt.id, prompt: prompt.text, reply });
  const attempts = config.maxRetries;

  logger(`Processing prompt ${prompt.id}: ${previewText(prompt.text, 50)}`);
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    const lastAttempt = attempt === attempts;
    try {
      const uiError = await detectUiError(resolver, config.benignErrorMarker);
      if (uiError) {
        logger(chalk.yellow(`Pre-prompt UI error: ${uiError}`));
        if (lastAttempt) {
          return record(`Error: Persistent UI error - ${uiError}`);
        }
        await page.reload();
        await sleep(RELOAD_SETTLE_MS);
        continue;
      }

      const fresh = await ensureFreshConversation(page, resolver, config, logger, { sleep });
      if (!fresh) {
        if (!lastAttempt) {
          logger('Retrying new conversation...');
          await sleep(config.retryDelayMs);
          continue;
        }
        logger(chalk.yellow('Proceeding without a confirmed new conversation'));
      }

      const submitted = await input.submit(prompt.text);
      if (!submitted.ok) {
        if (lastAttempt) {
          return record(`Error: ${submitted.reason}`);
        }
        logger('Input failed, retrying...');
        await sleep(config.retryDelayMs);
        continue;
      }

      const reply = formatReply(await waitForReply(resolver, config, logger, { sleep, now }));
      if (isErrorReply(reply) && !lastAttempt) {
        logger(chalk.yellow(`Response error, retrying: ${reply}`));
        await sleep(config.retryDelayMs);
        continue;
      }

      if (submitted.channel === 'voice') {
        logger('Exiting voice mode after response...');
      }
      await input.exitVoiceMode();
      logger(chalk.green(`Completed prompt ${prompt.id}`));
      return record(reply);
    } catch (error) {
      logger(chalk.red(`Error processing prompt ${prompt.id} (attempt ${attempt}): ${describeError(error)}`));
      if (!lastAttempt) {
        await sleep(config.retryDelayMs);
      }
    }
  }
  return record(`Error: Failed after ${attempts} attempts`);
}
