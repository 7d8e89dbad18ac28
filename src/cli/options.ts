import { InvalidArgumentError } from 'commander';
import type { RawRunConfig } from '../config.js';

export interface RunCliOptions {
  input: string;
  output?: string;
  resume?: boolean;
  config?: string;
  port?: number;
  textOnly?: boolean;
  verbose?: boolean;
}

export function parsePortOption(value: string): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65_535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return parsed;
}

export interface EnvSettings {
  configPath?: string;
  port?: number;
}

/** Environment fallbacks for flags; only the CLI layer reads the environment. */
export function readEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const settings: EnvSettings = {};
  const configPath = env.GROK_VOICE_CONFIG?.trim();
  if (configPath) {
    settings.configPath = configPath;
  }
  const rawPort = env.GROK_VOICE_CHROME_PORT?.trim();
  if (rawPort) {
    try {
      settings.port = parsePortOption(rawPort);
    } catch {
      throw new InvalidArgumentError(`GROK_VOICE_CHROME_PORT must be an integer between 1 and 65535 (got "${rawPort}").`);
    }
  }
  return settings;
}

/** Flags win over the environment, which wins over the config file. */
export function buildConfigOverrides(options: Pick<RunCliOptions, 'port' | 'textOnly'>, env: EnvSettings): RawRunConfig {
  const overrides: RawRunConfig = {};
  const port = options.port ?? env.port;
  if (port !== undefined) {
    overrides.chrome_port = port;
  }
  if (options.textOnly) {
    overrides.input_mode = 'text';
  }
  return overrides;
}
