import type { BrowserLogger } from '../browser/types.js';
import type { RunConfig } from '../config.js';
import type { PromptRecord, ResultRecord, ResultsSink } from '../results.js';
import { isErrorReply } from '../browser/actions/replyWatcher.js';
import { delay } from '../browser/utils.js';
import { formatPromptBanner, formatSummary, type RunSummary } from './progress.js';

export type { RunSummary } from './progress.js';

export interface RunPromptsOptions {
  prompts: PromptRecord[];
  sink: ResultsSink;
  resume: boolean;
  config: RunConfig;
  /** Produces the record for one prompt; `processPrompt` bound to a live session in production. */
  handlePrompt: (prompt: PromptRecord) => Promise<ResultRecord>;
  logger: BrowserLogger;
}

export interface RunPromptsDeps {
  sleep?: (ms: number) => Promise<void>;
}

const PAUSE_BETWEEN_PROMPTS_MS = 1_000;

/** Pending prompts in input order: the recorded id set is subtracted once, up front. */
export function selectPending(prompts: PromptRecord[], recorded: ReadonlySet<string>): PromptRecord[] {
  return prompts.filter((prompt) => !recorded.has(prompt.id));
}

/**
 * Processes pending prompts one at a time and appends each record before the next prompt
 * starts, so an interruption after prompt k leaves exactly k new rows.
 */
export async function runPrompts(options: RunPromptsOptions, deps: RunPromptsDeps = {}): Promise<RunSummary> {
  const { prompts, sink, resume, config, handlePrompt, logger } = options;
  const { sleep = delay } = deps;

  let pending = prompts;
  if (resume) {
    const recorded = await sink.readCompletedIds();
    if (recorded.size > 0) {
      logger(`Found ${recorded.size} already completed prompts in ${sink.location}`);
    }
    pending = selectPending(prompts, recorded);
    const skipped = prompts.length - pending.length;
    if (skipped > 0) {
      logger(`Skipping ${skipped} already completed prompts`);
    }
    if (pending.length === 0) {
      logger('All prompts already completed!');
    }
  }

  const summary: RunSummary = {
    total: pending.length,
    processed: 0,
    errors: 0,
    skipped: prompts.length - pending.length,
    resultsPath: sink.location,
  };

  for (const [index, prompt] of pending.entries()) {
    for (const line of formatPromptBanner({
      current: index + 1,
      total: pending.length,
      id: prompt.id,
      text: prompt.text,
      barLength: config.progressBarLength,
    })) {
      logger(line);
    }
    const result = await handlePrompt(prompt);
    await sink.append(result);
    summary.processed += 1;
    if (isErrorReply(result.reply)) {
      summary.errors += 1;
    }
    if (index < pending.length - 1) {
      await sleep(PAUSE_BETWEEN_PROMPTS_MS);
    }
  }

  if (pending.length > 0) {
    for (const line of formatSummary(summary)) {
      logger(line);
    }
  }
  return summary;
}
