import path from 'node:path';
import chalk from 'chalk';
import type { BrowserLogger } from '../browser/types.js';
import { RoleResolver } from '../browser/roleResolver.js';
import { PromptInput } from '../browser/actions/promptInput.js';
import { connectToSiteTab, type SiteTabConnection, type SiteTabOptions } from '../browser/chromeLifecycle.js';
import { discoverUi, saveDiscoveryReport } from '../browser/discovery.js';
import { loadRunConfig, type LoadConfigResult, type RawRunConfig, type RunConfig } from '../config.js';
import { CsvResultsSink, findLatestResultsFile, generateResultsFilename, loadPrompts } from '../results.js';
import { processPrompt } from '../runner/processPrompt.js';
import { runPrompts, type RunSummary } from '../runner/run.js';
import { EdgeSpeechInjector, type SpeechInjector } from '../speech/index.js';
import { buildConfigOverrides, readEnvSettings, type RunCliOptions } from './options.js';

export interface CommandDeps {
  log?: (message: string) => void;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  loadConfig?: (configPath: string | undefined, overrides: RawRunConfig) => Promise<LoadConfigResult>;
  connect?: (options: SiteTabOptions, logger: BrowserLogger) => Promise<SiteTabConnection>;
  createSpeech?: (config: RunConfig, logger: BrowserLogger) => SpeechInjector;
  sleep?: (ms: number) => Promise<void>;
}

export function createLogger(log: (message: string) => void, verbose: boolean): BrowserLogger {
  const logger: BrowserLogger = (message: string) => {
    log(message);
  };
  logger.verbose = verbose;
  return logger;
}

async function resolveConfig(
  options: Pick<RunCliOptions, 'config' | 'port' | 'textOnly'>,
  logger: BrowserLogger,
  deps: CommandDeps,
): Promise<RunConfig> {
  const env = readEnvSettings(deps.env ?? process.env);
  const overrides = buildConfigOverrides(options, env);
  const configPath = options.config ?? env.configPath;
  const load = deps.loadConfig ?? ((file, extra) => loadRunConfig(file, extra));
  const result = await load(configPath, overrides);
  if (result.loaded) {
    logger(`Loaded config from ${result.path}`);
  } else {
    logger(chalk.yellow(`No config file at ${result.path}; using defaults`));
  }
  if (result.unknownKeys.length > 0) {
    logger(chalk.yellow(`Ignoring unknown config keys: ${result.unknownKeys.join(', ')}`));
  }
  if (logger.verbose) {
    logger(chalk.dim(`[verbose] config ${JSON.stringify(result.config)}`));
  }
  return result.config;
}

/** Explicit `--output`, else on resume the newest timestamped file in `cwd`, else a new timestamped name. */
export async function resolveOutputPath(
  options: Pick<RunCliOptions, 'output' | 'resume'>,
  cwd: string,
  now: Date,
): Promise<{ path: string; reused: boolean }> {
  if (options.output) {
    return { path: path.resolve(cwd, options.output), reused: false };
  }
  if (options.resume) {
    const latest = await findLatestResultsFile(cwd);
    if (latest) {
      return { path: latest, reused: true };
    }
  }
  return { path: path.join(cwd, generateResultsFilename(now)), reused: false };
}

/**
 * The `run` command. Config, prompt loading and connection failures throw (exit 1 upstream);
 * per-prompt failures are recorded as `Error:` rows and never abort the run.
 */
export async function performRun(options: RunCliOptions, deps: CommandDeps = {}): Promise<RunSummary> {
  const log = deps.log ?? console.log;
  const cwd = deps.cwd ?? process.cwd();
  const logger = createLogger(log, Boolean(options.verbose));
  logger(chalk.bold('Starting grok-voice-bench...'));

  const config = await resolveConfig(options, logger, deps);

  const promptsPath = path.resolve(cwd, options.input);
  logger(`Loading prompts from ${promptsPath}`);
  const prompts = await loadPrompts(promptsPath);
  logger(`Loaded ${prompts.length} prompts`);

  const output = await resolveOutputPath(options, cwd, (deps.now ?? (() => new Date()))());
  if (output.reused) {
    logger(`Resuming into latest results file: ${output.path}`);
  } else if (!options.output) {
    logger(`Using timestamped results file: ${output.path}`);
  }
  const sink = new CsvResultsSink(output.path);

  const connect = deps.connect ?? ((connectOptions, connectLogger) => connectToSiteTab(connectOptions, connectLogger, { sleep: deps.sleep }));
  const connection = await connect(config, logger);
  try {
    const resolver = new RoleResolver(connection.driver, config.rolePatterns, logger);
    const speech =
      config.inputMode === 'voice'
        ? (deps.createSpeech ?? defaultSpeech)(config, logger)
        : null;
    const input = new PromptInput(connection.driver, resolver, speech, config, logger, { sleep: deps.sleep });
    const session = { page: connection.driver, resolver, input };
    return await runPrompts(
      {
        prompts,
        sink,
        resume: Boolean(options.resume),
        config,
        handlePrompt: (prompt) => processPrompt(prompt, session, config, logger, { sleep: deps.sleep }),
        logger,
      },
      { sleep: deps.sleep },
    );
  } finally {
    await connection.close();
  }
}

function defaultSpeech(config: RunConfig, logger: BrowserLogger): SpeechInjector {
  return new EdgeSpeechInjector({ voice: config.ttsVoice, rate: config.ttsRate, audioPlayer: config.audioPlayer }, logger);
}

export interface DiscoverCliOptions {
  config?: string;
  port?: number;
  outDir?: string;
  verbose?: boolean;
}

/** The `discover` command: probes every role pattern on the current tab and saves a JSON report. */
export async function performDiscover(options: DiscoverCliOptions, deps: CommandDeps = {}): Promise<string> {
  const log = deps.log ?? console.log;
  const cwd = deps.cwd ?? process.cwd();
  const logger = createLogger(log, Boolean(options.verbose));
  const config = await resolveConfig(options, logger, deps);
  const connect = deps.connect ?? ((connectOptions, connectLogger) => connectToSiteTab(connectOptions, connectLogger, { sleep: deps.sleep }));
  const connection = await connect(config, logger);
  try {
    const resolver = new RoleResolver(connection.driver, config.rolePatterns, logger);
    const now = deps.now ?? (() => new Date());
    const report = await discoverUi(connection.driver, resolver, logger, now);
    const filePath = await saveDiscoveryReport(report, path.resolve(cwd, options.outDir ?? '.'), now());
    logger(chalk.green(`Findings saved to: ${filePath}`));
    return filePath;
  } finally {
    await connection.close();
  }
}

export interface SayCliOptions {
  config?: string;
  verbose?: boolean;
}

/** The `say` command: plays one phrase through the TTS path to check audio routing. */
export async function performSay(text: string, options: SayCliOptions, deps: CommandDeps = {}): Promise<void> {
  const log = deps.log ?? console.log;
  const logger = createLogger(log, Boolean(options.verbose));
  const config = await resolveConfig(options, logger, deps);
  const speech = (deps.createSpeech ?? defaultSpeech)(config, logger);
  await speech.speak(text);
  logger(chalk.green('TTS playback complete'));
}
