import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { HistoryLog } from './history-log.js';

describe('HistoryLog', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'history-'));
    file = path.join(dir, 'logs', 'history.jsonl');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should append one JSON line per completed stage', () => {
    const log = new HistoryLog(file);

    log.append('entities', { pages: 2, entities_written: 40 }, { now: new Date('2024-03-01T10:00:00.000Z') });
    log.append('child_items', { entities: 40 }, { scoped: true, now: new Date('2024-03-01T11:00:00.000Z') });

    const lines = fs.readFileSync(file, 'utf-8').trim().split('\n');
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      {
        timestamp: '2024-03-01T10:00:00.000Z',
        event: 'stage_completed',
        stage: 'entities',
        scoped: false,
        stats: { pages: 2, entities_written: 40 },
      },
      {
        timestamp: '2024-03-01T11:00:00.000Z',
        event: 'stage_completed',
        stage: 'child_items',
        scoped: true,
        stats: { entities: 40 },
      },
    ]);
  });

  it('should copy the stats it records', () => {
    const stats = { items: 1 };
    const record = new HistoryLog(file).append('candidates', stats);
    stats.items = 5;

    expect(record.stats).toEqual({ items: 1 });
  });
});
