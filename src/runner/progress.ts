import chalk from 'chalk';
import { previewText } from '../browser/utils.js';

export const RULE = '-'.repeat(60);

/** `[######----] 60.0%`; the bar counts the prompt about to run as done. */
export function formatProgressBar(current: number, total: number, length: number): string {
  const ratio = total > 0 ? current / total : 1;
  const filled = Math.min(length, Math.floor(length * ratio));
  return `[${'#'.repeat(filled)}${'-'.repeat(length - filled)}] ${(ratio * 100).toFixed(1)}%`;
}

export interface PromptBannerInput {
  current: number;
  total: number;
  id: string;
  text: string;
  barLength: number;
}

export function formatPromptBanner({ current, total, id, text, barLength }: PromptBannerInput): string[] {
  return [
    '',
    RULE,
    chalk.bold(`PROMPT ${current}/${total} | ID: ${id} | ${total - current} remaining`),
    `Progress: ${formatProgressBar(current, total, barLength)}`,
    `Text: ${previewText(text, 80)}`,
    RULE,
  ];
}

export interface RunSummary {
  total: number;
  processed: number;
  errors: number;
  skipped: number;
  resultsPath: string;
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    '',
    RULE,
    chalk.green('AUTOMATION COMPLETE'),
    `Results saved to: ${summary.resultsPath}`,
    `Successfully processed: ${summary.processed - summary.errors}/${summary.total} prompts`,
  ];
  if (summary.errors > 0) {
    lines.push(chalk.yellow(`Recorded errors: ${summary.errors}`));
  }
  if (summary.skipped > 0) {
    lines.push(`Skipped (already recorded): ${summary.skipped}`);
  }
  lines.push(RULE);
  return lines;
}
