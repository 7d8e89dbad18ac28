import type { ResultRecord, ResultsSink } from '../../src/results.js';

export class MemorySink implements ResultsSink {
  readonly location = 'memory://results.csv';
  readonly rows: ResultRecord[];

  constructor(initial: ResultRecord[] = []) {
    this.rows = [...initial];
  }

  async readCompletedIds(): Promise<Set<string>> {
    return new Set(this.rows.map((row) => row.id));
  }

  async append(record: ResultRecord): Promise<void> {
    this.rows.push(record);
  }
}
