import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { CsvResultsSink, findLatestResultsFile, generateResultsFilename, loadPrompts } from '../src/results.js';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'grok-voice-results-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function writeCsv(name: string, content: string): Promise<string> {
  const file = path.join(dir, name);
  await fs.writeFile(file, content, 'utf8');
  return file;
}

describe('loadPrompts', () => {
  test('keeps file order, trims ids, tolerates a BOM and quoted fields', async () => {
    const file = await writeCsv('prompts.csv', '\uFEFFid,text,notes\n1,"Hello, world",x\n 2 ,"Line one\nLine two",y\n');

    expect(await loadPrompts(file)).toEqual([
      { id: '1', text: 'Hello, world' },
      { id: '2', text: 'Line one\nLine two' },
    ]);
  });

  test('a header-only file has no prompts', async () => {
    expect(await loadPrompts(await writeCsv('empty.csv', 'id,text\n'))).toEqual([]);
  });

  test('missing columns, empty ids and duplicate ids abort loading', async () => {
    await expect(loadPrompts(await writeCsv('cols.csv', 'id,prompt\n1,hi\n'))).rejects.toMatchObject({
      stage: 'load-prompts',
      code: 'missing-columns',
      message: "CSV must have 'id' and 'text' columns (missing: text)",
    });
    await expect(loadPrompts(await writeCsv('blank.csv', 'id,text\n,orphan\n'))).rejects.toMatchObject({
      code: 'empty-id',
      message: 'Row 2 has an empty id',
    });
    await expect(loadPrompts(await writeCsv('dupes.csv', 'id,text\n1,a\n1,b\n'))).rejects.toMatchObject({
      code: 'duplicate-id',
      message: 'Duplicate prompt id "1" on row 3',
    });
  });

  test('an unreadable file is a load error', async () => {
    await expect(loadPrompts(path.join(dir, 'nope.csv'))).rejects.toMatchObject({ stage: 'load-prompts', code: 'unreadable' });
  });
});

describe('CsvResultsSink', () => {
  test('writes the header once and appends each record', async () => {
    const file = path.join(dir, 'out', 'results.csv');
    const sink = new CsvResultsSink(file);

    await sink.append({ id: '1', prompt: 'Hello', reply: 'Hi there' });
    await sink.append({ id: '2', prompt: 'Comma, please', reply: 'Line1\nLine2' });

    expect(await fs.readFile(file, 'utf8')).toBe(
      'id,prompt,grok_reply\n1,Hello,Hi there\n2,"Comma, please","Line1\nLine2"\n',
    );
    expect(await sink.readCompletedIds()).toEqual(new Set(['1', '2']));
  });

  test('appends without a header to an existing file', async () => {
    const file = await writeCsv('results.csv', 'id,prompt,grok_reply\n1,a,b\n');
    await new CsvResultsSink(file).append({ id: '2', prompt: 'c', reply: 'Error: No response received' });

    expect(await fs.readFile(file, 'utf8')).toBe('id,prompt,grok_reply\n1,a,b\n2,c,Error: No response received\n');
  });

  test('a missing results file has no completed ids', async () => {
    expect(await new CsvResultsSink(path.join(dir, 'fresh.csv')).readCompletedIds()).toEqual(new Set());
  });
});

describe('results file naming', () => {
  test('timestamped name uses local time to the minute', () => {
    expect(generateResultsFilename(new Date(2026, 0, 5, 9, 7, 45))).toBe('results_2026-01-05_09-07.csv');
  });

  test('finds the newest timestamped results file', async () => {
    for (const name of ['results_2026-01-05_09-07.csv', 'results_2026-02-01_08-00.csv', 'results_final.csv', 'notes.txt']) {
      await writeCsv(name, '');
    }
    expect(await findLatestResultsFile(dir)).toBe(path.join(dir, 'results_2026-02-01_08-00.csv'));
    expect(await findLatestResultsFile(path.join(dir, 'missing'))).toBeNull();
  });
});
