import fs from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { AutomationError, describeError, systemErrorCode } from './errors.js';

export interface PromptRecord {
  id: string;
  text: string;
}

export interface ResultRecord {
  id: string;
  prompt: string;
  reply: string;
}

export const RESULT_COLUMNS = ['id', 'prompt', 'grok_reply'] as const;

const rowsSchema = z.array(z.record(z.string(), z.string()));

function parseRows(content: string, source: string, stage: 'load-prompts' | 'results'): Record<string, string>[] {
  let rows: unknown;
  try {
    rows = parse(content, { columns: true, bom: true, skip_empty_lines: true });
  } catch (error) {
    throw new AutomationError(`Failed to parse ${source}: ${describeError(error)}`, { stage, code: 'malformed-csv' }, error);
  }
  return rowsSchema.parse(rows);
}

function headerOf(content: string): string[] {
  const header: unknown = parse(content, { bom: true, to_line: 1 });
  const parsed = z.array(z.array(z.string())).safeParse(header);
  return parsed.success ? (parsed.data[0] ?? []).map((column) => column.trim()) : [];
}

/** Reads the prompts table; rows keep file order. */
export async function loadPrompts(filePath: string): Promise<PromptRecord[]> {
  const resolved = path.resolve(filePath);
  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    const reason = systemErrorCode(error) === 'ENOENT' ? 'file not found' : describeError(error);
    throw new AutomationError(`Cannot read prompts from ${resolved}: ${reason}`, { stage: 'load-prompts', code: 'unreadable' }, error);
  }
  const columns = headerOf(content);
  const missing = ['id', 'text'].filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new AutomationError(`CSV must have 'id' and 'text' columns (missing: ${missing.join(', ')})`, {
      stage: 'load-prompts',
      code: 'missing-columns',
      details: { columns },
    });
  }
  const rows = parseRows(content, resolved, 'load-prompts');
  const seen = new Set<string>();
  return rows.map((row, index) => {
    const line = index + 2;
    const id = (row.id ?? '').trim();
    if (!id) {
      throw new AutomationError(`Row ${line} has an empty id`, { stage: 'load-prompts', code: 'empty-id' });
    }
    if (seen.has(id)) {
      throw new AutomationError(`Duplicate prompt id "${id}" on row ${line}`, { stage: 'load-prompts', code: 'duplicate-id' });
    }
    seen.add(id);
    return { id, text: row.text ?? '' };
  });
}

/** Append-only destination for results; `readCompletedIds` feeds resume. */
export interface ResultsSink {
  readonly location: string;
  readCompletedIds(): Promise<Set<string>>;
  append(record: ResultRecord): Promise<void>;
}

export class CsvResultsSink implements ResultsSink {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async readCompletedIds(): Promise<Set<string>> {
    let content: string;
    try {
      content = await fs.readFile(this.location, 'utf8');
    } catch (error) {
      if (systemErrorCode(error) === 'ENOENT') {
        return new Set();
      }
      throw new AutomationError(`Cannot read results from ${this.location}: ${describeError(error)}`, { stage: 'results' }, error);
    }
    if (!content.trim()) {
      return new Set();
    }
    const rows = parseRows(content, this.location, 'results');
    return new Set(rows.map((row) => (row.id ?? '').trim()).filter((id) => id.length > 0));
  }

  /** Writes the header only when the file is new or empty. */
  async append(record: ResultRecord): Promise<void> {
    const header = !(await hasContent(this.location));
    const line = stringify([[record.id, record.prompt, record.reply]], {
      header,
      columns: header ? [...RESULT_COLUMNS] : undefined,
    });
    try {
      await fs.mkdir(path.dirname(this.location), { recursive: true });
      await fs.appendFile(this.location, line, 'utf8');
    } catch (error) {
      throw new AutomationError(`Failed to write result ${record.id}: ${describeError(error)}`, { stage: 'results' }, error);
    }
  }
}

async function hasContent(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size > 0;
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

const pad = (value: number) => String(value).padStart(2, '0');

/** `results_YYYY-MM-DD_HH-MM.csv` in local time. */
export function generateResultsFilename(date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}`;
  return `results_${day}_${time}.csv`;
}

const RESULTS_FILE_PATTERN = /^results_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}\.csv$/;

/** Newest timestamped results file in `dir`; the name sorts chronologically. */
export async function findLatestResultsFile(dir: string): Promise<string | null> {
  const entries = await fs.readdir(dir).catch((error: unknown) => {
    if (systemErrorCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  });
  const matches = entries.filter((entry) => RESULTS_FILE_PATTERN.test(entry)).sort();
  const latest = matches.at(-1);
  return latest ? path.join(dir, latest) : null;
}
