import fs from 'node:fs/promises';
import path from 'node:path';
import JSON5 from 'json5';
import { z } from 'zod';
import { DEFAULT_BENIGN_ERROR_MARKER, DEFAULT_CHROME_HOST, DEFAULT_CHROME_PORT, GROK_URL, ROLE_PATTERNS } from './browser/constants.js';
import type { RolePatternTable } from './browser/types.js';
import { parseLocatorPattern } from './browser/locator.js';
import { normalizeSiteUrl } from './browser/utils.js';
import { AutomationError, describeError, systemErrorCode } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'config.json';

export type InputMode = 'voice' | 'text';

/** Immutable run settings, built once at startup and passed to every component. */
export interface RunConfig {
  chromePort: number;
  chromeHost: string;
  siteUrl: string;
  maxRetries: number;
  retryDelayMs: number;
  audioWaitMs: number;
  transcriptionWaitMs: number;
  inputSettleMs: number;
  newConversationWaitMs: number;
  inputMode: InputMode;
  ttsVoice: string;
  ttsRate: string;
  audioPlayer: string | null;
  minResponseLength: number;
  requiredStableChecks: number;
  pollIntervalMs: number;
  maxResponseChars: number;
  maxWaitMs: number;
  rateLimitCooldownMs: number;
  maxRateLimitCooldowns: number;
  benignErrorMarker: string;
  progressBarLength: number;
  rolePatterns: RolePatternTable;
}

const seconds = z.number().finite().nonnegative();
const patternList = z
  .array(z.string())
  .min(1)
  .superRefine((patterns, ctx) => {
    for (const pattern of patterns) {
      try {
        parseLocatorPattern(pattern);
      } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(error) });
      }
    }
  });

const rawConfigSchema = z.object({
  chrome_port: z.number().int().min(1).max(65_535).default(DEFAULT_CHROME_PORT),
  chrome_host: z.string().min(1).default(DEFAULT_CHROME_HOST),
  site_url: z.string().default(GROK_URL),
  max_retries: z.number().int().min(1).default(3),
  retry_delay: seconds.default(2),
  audio_wait_seconds: seconds.default(3),
  transcription_wait_seconds: seconds.default(3),
  input_settle_seconds: seconds.default(1),
  new_conversation_wait: seconds.default(2),
  input_mode: z.enum(['voice', 'text']).default('voice'),
  tts_voice: z.string().min(1).default('en-US-JennyNeural'),
  tts_rate: z
    .string()
    .regex(/^[+-]?\d+%$/, 'tts_rate must be a percentage such as "+0%" or "-10%"')
    .default('+0%'),
  audio_player: z.string().min(1).nullable().default(null),
  min_response_length: z.number().int().nonnegative().default(10),
  required_stable_checks: z.number().int().min(1).default(3),
  stabilization_check_interval: z.number().finite().positive().default(2),
  max_response_chars: z.number().int().min(1).default(4000),
  max_wait_time: z.number().finite().positive().default(120),
  rate_limit_cooldown_seconds: seconds.default(30),
  max_rate_limit_cooldowns: z.number().int().min(1).default(4),
  benign_error_marker: z.string().default(DEFAULT_BENIGN_ERROR_MARKER),
  progress_bar_length: z.number().int().min(1).default(30),
  role_patterns: z
    .object({
      voice_button: patternList.optional(),
      exit_voice_button: patternList.optional(),
      text_input: patternList.optional(),
      response_container: patternList.optional(),
      new_chat_button: patternList.optional(),
      error_banner: patternList.optional(),
    })
    .strict()
    .default({}),
});

export type RawRunConfig = z.input<typeof rawConfigSchema>;

const KNOWN_KEYS = new Set(Object.keys(rawConfigSchema.shape));

export function resolveRunConfig(raw: unknown = {}): RunConfig {
  const parsed = rawConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new AutomationError(`Invalid run configuration: ${issues.join('; ')}`, {
      stage: 'config',
      code: 'invalid-config',
      details: { issues },
    });
  }
  const value = parsed.data;
  let siteUrl: string;
  try {
    siteUrl = normalizeSiteUrl(value.site_url, GROK_URL);
  } catch (error) {
    throw new AutomationError(describeError(error), { stage: 'config', code: 'invalid-config' }, error);
  }
  const patterns = value.role_patterns;
  const rolePatterns: RolePatternTable = {
    voiceButton: patterns.voice_button ?? ROLE_PATTERNS.voiceButton,
    exitVoiceButton: patterns.exit_voice_button ?? ROLE_PATTERNS.exitVoiceButton,
    textInput: patterns.text_input ?? ROLE_PATTERNS.textInput,
    responseContainer: patterns.response_container ?? ROLE_PATTERNS.responseContainer,
    newChatButton: patterns.new_chat_button ?? ROLE_PATTERNS.newChatButton,
    errorBanner: patterns.error_banner ?? ROLE_PATTERNS.errorBanner,
  };
  const ms = (secondsValue: number) => Math.round(secondsValue * 1000);
  return {
    chromePort: value.chrome_port,
    chromeHost: value.chrome_host,
    siteUrl,
    maxRetries: value.max_retries,
    retryDelayMs: ms(value.retry_delay),
    audioWaitMs: ms(value.audio_wait_seconds),
    transcriptionWaitMs: ms(value.transcription_wait_seconds),
    inputSettleMs: ms(value.input_settle_seconds),
    newConversationWaitMs: ms(value.new_conversation_wait),
    inputMode: value.input_mode,
    ttsVoice: value.tts_voice,
    ttsRate: value.tts_rate,
    audioPlayer: value.audio_player,
    minResponseLength: value.min_response_length,
    requiredStableChecks: value.required_stable_checks,
    pollIntervalMs: ms(value.stabilization_check_interval),
    maxResponseChars: value.max_response_chars,
    maxWaitMs: ms(value.max_wait_time),
    rateLimitCooldownMs: ms(value.rate_limit_cooldown_seconds),
    maxRateLimitCooldowns: value.max_rate_limit_cooldowns,
    benignErrorMarker: value.benign_error_marker,
    progressBarLength: value.progress_bar_length,
    rolePatterns,
  };
}

export const DEFAULT_RUN_CONFIG: RunConfig = resolveRunConfig({});

export interface LoadConfigResult {
  config: RunConfig;
  path: string;
  loaded: boolean;
  /** Keys present in the file that this tool does not read. */
  unknownKeys: string[];
}

/**
 * Reads the JSON5 run configuration. A missing file means defaults; an unreadable, malformed or
 * invalid file is an error.
 */
export async function loadRunConfig(
  configPath: string = DEFAULT_CONFIG_FILE,
  overrides: RawRunConfig = {},
): Promise<LoadConfigResult> {
  const resolvedPath = path.resolve(configPath);
  let raw: string | null = null;
  try {
    raw = await fs.readFile(resolvedPath, 'utf8');
  } catch (error) {
    if (systemErrorCode(error) !== 'ENOENT') {
      throw new AutomationError(`Failed to read ${resolvedPath}: ${describeError(error)}`, { stage: 'config' }, error);
    }
  }
  if (raw === null) {
    return { config: resolveRunConfig(overrides), path: resolvedPath, loaded: false, unknownKeys: [] };
  }
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (error) {
    throw new AutomationError(`Failed to parse ${resolvedPath}: ${describeError(error)}`, {
      stage: 'config',
      code: 'malformed-config',
    }, error);
  }
  if (!isPlainObject(parsed)) {
    throw new AutomationError(`${resolvedPath} must contain an object of settings.`, {
      stage: 'config',
      code: 'malformed-config',
    });
  }
  const unknownKeys = Object.keys(parsed).filter((key) => !KNOWN_KEYS.has(key));
  return {
    config: resolveRunConfig({ ...parsed, ...overrides }),
    path: resolvedPath,
    loaded: true,
    unknownKeys,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
