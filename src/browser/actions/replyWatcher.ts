import type { BrowserLogger } from '../types.js';
import type { RoleResolver } from '../roleResolver.js';
import { delay } from '../utils.js';
import { detectUiError, isRateLimitMessage } from './uiErrors.js';

export type ReplyPhase = 'awaiting-start' | 'growing' | 'stable' | 'rate-limited' | 'timed-out' | 'error-detected';

const INITIAL_PHASE: ReplyPhase = 'awaiting-start';

export type ReplyErrorReason = 'ui-error' | 'lost-thread' | 'no-response' | 'rate-limited';

export type ReplyOutcome =
  | { kind: 'complete'; text: string }
  | { kind: 'truncated'; text: string }
  /** Wait budget ran out while the reply was still changing; best-effort text. */
  | { kind: 'partial'; text: string }
  | { kind: 'error'; reason: ReplyErrorReason; message: string };

export interface ReplyWatcherOptions {
  minResponseLength: number;
  requiredStableChecks: number;
  pollIntervalMs: number;
  maxResponseChars: number;
  maxWaitMs: number;
  rateLimitCooldownMs: number;
  /** Back-to-back cooldowns allowed before the throttling banner counts as an error. */
  maxRateLimitCooldowns: number;
  benignErrorMarker: string;
}

export interface ReplyWatcherDeps {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  onPhase?: (phase: ReplyPhase) => void;
}

/**
 * Polls the last visible response container until its text holds still for
 * `requiredStableChecks` consecutive ticks. Equality, not a stop in growth, ends the wait so
 * slow streaming is not cut short; the character cap stops runaway repetition.
 */
export async function waitForReply(
  resolver: RoleResolver,
  options: ReplyWatcherOptions,
  logger: BrowserLogger,
  deps: ReplyWatcherDeps = {},
): Promise<ReplyOutcome> {
  const { sleep = delay, now = Date.now, onPhase } = deps;
  const startedAt = now();
  let pausedMs = 0;
  let cooldowns = 0;
  let lastText = '';
  let stableCount = 0;
  let phase: ReplyPhase = INITIAL_PHASE;
  const enter = (next: ReplyPhase) => {
    if (next !== phase) {
      phase = next;
      onPhase?.(next);
    }
  };
  const elapsed = () => now() - startedAt - pausedMs;

  logger('Waiting for response...');
  while (elapsed() < options.maxWaitMs) {
    const uiError = await detectUiError(resolver, options.benignErrorMarker);
    if (uiError) {
      if (isRateLimitMessage(uiError)) {
        if (cooldowns >= options.maxRateLimitCooldowns) {
          enter('error-detected');
          return {
            kind: 'error',
            reason: 'rate-limited',
            message: `Rate limit persisted after ${cooldowns} cooldowns: ${uiError}`,
          };
        }
        cooldowns += 1;
        const resumePhase = phase;
        enter('rate-limited');
        logger(`Rate limit detected ("${uiError}"); cooling down for ${Math.round(options.rateLimitCooldownMs / 1000)}s`);
        const pauseStart = now();
        await sleep(options.rateLimitCooldownMs);
        pausedMs += now() - pauseStart;
        enter(resumePhase);
        continue;
      }
      enter('error-detected');
      return { kind: 'error', reason: 'ui-error', message: uiError };
    }
    cooldowns = 0;

    const responses = await resolver.resolveAll('responseContainer');
    if (responses.length === 0 && phase === 'growing') {
      enter('error-detected');
      return { kind: 'error', reason: 'lost-thread', message: 'Lost thread view during response' };
    }
    const current = responses.at(-1)?.text ?? '';

    if (current.length > options.minResponseLength) {
      enter('growing');
      const charCount = Array.from(current).length;
      if (charCount >= options.maxResponseChars) {
        logger(`Character limit reached: ${charCount} chars, truncating to ${options.maxResponseChars}`);
        enter('stable');
        return { kind: 'truncated', text: truncateChars(current, options.maxResponseChars) };
      }
      if (current === lastText) {
        stableCount += 1;
        if (stableCount >= options.requiredStableChecks) {
          logger(`Response captured: ${current.length} chars`);
          enter('stable');
          return { kind: 'complete', text: current };
        }
      } else {
        stableCount = 0;
        lastText = current;
        logger(`Response growing: ${current.length} chars`);
      }
    }

    await sleep(options.pollIntervalMs);
  }

  enter('timed-out');
  if (lastText.length > options.minResponseLength) {
    logger('Max wait time reached; keeping the latest captured text');
    return { kind: 'partial', text: truncateChars(lastText, options.maxResponseChars) };
  }
  return { kind: 'error', reason: 'no-response', message: 'No response received' };
}

/** Cuts by code point so an astral character is never split into a lone surrogate. */
export function truncateChars(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}

/** Text stored in the results table for an outcome. */
export function formatReply(outcome: ReplyOutcome): string {
  return outcome.kind === 'error' ? `Error: ${outcome.message}` : outcome.text;
}

export function isErrorReply(reply: string): boolean {
  return reply.startsWith('Error:');
}
