import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { AutomationError, describeError, systemErrorCode } from '../errors.js';

const execFileAsync = promisify(execFile);

export interface PlayerCommand {
  command: string;
  args: string[];
}

/** Players tried in order when no `audio_player` is configured. */
export function defaultPlayerCandidates(platform: NodeJS.Platform = process.platform): PlayerCommand[] {
  const ffplay: PlayerCommand = { command: 'ffplay', args: ['-nodisp', '-autoexit', '-loglevel', 'quiet'] };
  if (platform === 'darwin') {
    return [{ command: 'afplay', args: [] }, ffplay];
  }
  if (platform === 'win32') {
    return [ffplay];
  }
  return [ffplay, { command: 'mpg123', args: ['-q'] }, { command: 'mpv', args: ['--no-video', '--really-quiet'] }];
}

/** Splits a configured player string such as `"mpv --really-quiet"` into command and args. */
export function parsePlayerCommand(raw: string): PlayerCommand {
  const [command = '', ...args] = raw.trim().split(/\s+/);
  if (!command) {
    throw new AutomationError('audio_player must name a command', { stage: 'config', code: 'invalid-config' });
  }
  return { command, args };
}

export type PlayFile = (filePath: string) => Promise<void>;

/**
 * Plays a file through the system audio output and resolves once playback ends. Missing players
 * are skipped; a player that starts and fails is an error.
 */
export function createPlayer(configured: string | null): PlayFile {
  const candidates = configured ? [parsePlayerCommand(configured)] : defaultPlayerCandidates();
  return async (filePath) => {
    for (const candidate of candidates) {
      try {
        await execFileAsync(candidate.command, [...candidate.args, filePath]);
        return;
      } catch (error) {
        if (systemErrorCode(error) === 'ENOENT') {
          continue;
        }
        throw new AutomationError(
          `Audio playback with ${candidate.command} failed: ${describeError(error)}`,
          { stage: 'speech', code: 'playback-failed' },
          error,
        );
      }
    }
    throw new AutomationError(
      `No audio player found (tried ${candidates.map((candidate) => candidate.command).join(', ')}). Set audio_player in the config.`,
      { stage: 'speech', code: 'no-player' },
    );
  };
}
