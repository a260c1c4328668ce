import { appendFileSync, mkdirSync } from 'fs';
import path from 'path';
import { HistoryRecord, StageName } from '../types/index.js';

/**
 * Append-only log of completed stage runs, one JSON object per line.
 * The harvester only ever writes to it.
 */
export class HistoryLog {
  constructor(private readonly filePath: string) {}

  append(
    stage: StageName,
    stats: Record<string, number>,
    options: { scoped?: boolean; now?: Date } = {}
  ): HistoryRecord {
    const record: HistoryRecord = {
      timestamp: (options.now ?? new Date()).toISOString(),
      event: 'stage_completed',
      stage,
      scoped: options.scoped ?? false,
      stats: { ...stats },
    };

    mkdirSync(path.dirname(this.filePath), { recursive: true });
    appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, 'utf-8');
    return record;
  }
}
