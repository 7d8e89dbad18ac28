#!/usr/bin/env node
import 'dotenv/config';
import { once } from 'node:events';
import { Command } from 'commander';
import chalk from 'chalk';
import { applyHelpStyling } from '../src/cli/help.js';
import { parsePortOption, type RunCliOptions } from '../src/cli/options.js';
import { performDiscover, performRun, performSay, type DiscoverCliOptions, type SayCliOptions } from '../src/cli/runCommand.js';
import { CONNECT_TROUBLESHOOTING } from '../src/browser/chromeLifecycle.js';
import { collectCauseMessages, isAutomationError } from '../src/errors.js';
import { getCliVersion } from '../src/version.js';

const VERSION = getCliVersion();
const isTty = Boolean(process.stdout.isTTY) && chalk.level > 0;

const program = new Command();
applyHelpStyling(program, VERSION, isTty);

program
  .name('grok-voice-bench')
  .description('Speak or type each prompt of a CSV into Grok through a running Chrome and record the replies.')
  .version(VERSION)
  .showHelpAfterError();

program
  .command('run', { isDefault: true })
  .description('Process every prompt in the input CSV and append replies to the results CSV.')
  .option('-i, --input <path>', 'prompts CSV with id and text columns', 'prompts.csv')
  .option('-o, --output <path>', 'results CSV (default: results_YYYY-MM-DD_HH-MM.csv)')
  .option('-r, --resume', 'skip ids already recorded in the results file', false)
  .option('--config <path>', 'JSON5 config file (default: config.json, or GROK_VOICE_CONFIG)')
  .option('--port <number>', 'Chrome DevTools port (overrides config and GROK_VOICE_CHROME_PORT)', parsePortOption)
  .option('--text-only', 'type prompts instead of speaking them', false)
  .option('-v, --verbose', 'log selector probes and the resolved config', false)
  .action(async (options: RunCliOptions) => {
    await performRun(options);
  });

program
  .command('discover')
  .description('Report which role patterns match visible elements on the current tab.')
  .option('--config <path>', 'JSON5 config file')
  .option('--port <number>', 'Chrome DevTools port', parsePortOption)
  .option('--out-dir <path>', 'directory for the JSON report', '.')
  .option('-v, --verbose', 'log selector probes', false)
  .action(async (options: DiscoverCliOptions) => {
    await performDiscover(options);
  });

program
  .command('say')
  .description('Speak a phrase through the TTS path to check audio routing.')
  .argument('[text...]', 'phrase to speak', ['Testing voice input, one two three.'])
  .option('--config <path>', 'JSON5 config file')
  .option('-v, --verbose', 'verbose logging', false)
  .action(async (words: string[], options: SayCliOptions) => {
    await performSay(words.join(' '), options);
  });

async function main(): Promise<void> {
  const parsePromise = program.parseAsync(process.argv);
  const sigintPromise = once(process, 'SIGINT').then(() => 'sigint' as const);
  const result = await Promise.race([parsePromise.then(() => 'parsed' as const), sigintPromise]);
  if (result === 'sigint') {
    console.log(chalk.yellow('\nInterrupted. Completed replies are already saved; rerun with --resume.'));
    process.exit(130);
  }
}

void main().catch((error: unknown) => {
  if (error instanceof Error) {
    console.error(chalk.red('✖'), error.message);
    for (const cause of collectCauseMessages(error).slice(1)) {
      console.error(chalk.dim(`  caused by: ${cause}`));
    }
    if (isAutomationError(error) && error.stage === 'connect') {
      console.error('\nTroubleshooting tips:');
      CONNECT_TROUBLESHOOTING.forEach((tip, index) => console.error(`${index + 1}. ${tip}`));
    }
  } else {
    console.error(chalk.red('✖'), error);
  }
  process.exitCode = 1;
});
