import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Harvester, runFullCrawl } from './harvester.js';
import { CatalogStore } from './database/catalog-store.js';
import { openCatalogDatabase } from './database/client.js';
import { StageName, StageStatus, StageSummary } from './types/index.js';
import { loadConfig } from './utils/config.js';
import { createLogger } from './utils/logger.js';

function summary(stage: StageName, status: StageStatus = 'completed'): StageSummary {
  return { stage, status, scoped: false, units: 1, failures: [], stats: {} };
}

describe('Harvester', () => {
  let dir: string;
  let harvester: Harvester;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvester-'));
    const config = loadConfig({
      HARVEST_BASE_URL: 'https://catalog.example.com',
      HARVEST_COOKIE_FILE: path.join(dir, 'cookie.json'),
      HARVEST_CHECKPOINT_FILE: path.join(dir, 'checkpoints.json'),
      HARVEST_HISTORY_FILE: path.join(dir, 'history.jsonl'),
      HARVEST_PICKS_DIR: path.join(dir, 'picks'),
    });
    const catalog = new CatalogStore(openCatalogDatabase({ dbPath: ':memory:' }));
    harvester = new Harvester({ config, logger: createLogger({ silent: true }) }, catalog);
  });

  afterEach(() => {
    harvester.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read credentials from the configured cookie file', () => {
    expect(() => harvester.coordinator()).toThrow(/cookie\.json could not be read/);

    fs.writeFileSync(path.join(dir, 'cookie.json'), JSON.stringify({ over18: '1' }), 'utf-8');
    expect(() => harvester.coordinator()).not.toThrow();
  });

  it('should report counts and checkpoints', () => {
    harvester.checkpoints.save('child_items', { entity_index: 1, entity_key: 'A' }, new Date('2024-03-01T00:00:00Z'));

    expect(harvester.status()).toEqual({
      counts: { entities: 0, childItems: 0, candidates: 0 },
      checkpoints: {
        child_items: { cursor: { entity_index: 1, entity_key: 'A' }, updated_at: '2024-03-01T00:00:00.000Z' },
      },
    });
  });

  describe('runFullCrawl', () => {
    it('should run every stage in order and then select', async () => {
      const coordinator = harvester.coordinator({ credentials: { over18: '1' } });
      const calls: string[] = [];
      vi.spyOn(coordinator, 'runEntityStage').mockImplementation(async () => {
        calls.push('entities');
        return summary('entities');
      });
      vi.spyOn(coordinator, 'runChildItemStage').mockImplementation(async (options) => {
        calls.push(`child_items:${options?.scope?.join(',')}:${options?.tags?.join(',')}`);
        return summary('child_items', 'incomplete');
      });
      vi.spyOn(coordinator, 'runCandidateStage').mockImplementation(async () => {
        calls.push('candidates');
        return summary('candidates');
      });

      const result = await runFullCrawl(harvester, coordinator, { scope: ['A'], tags: ['s'] });

      expect(calls).toEqual(['entities', 'child_items:A:s', 'candidates']);
      expect(result.stages.map((stage) => stage.status)).toEqual(['completed', 'incomplete', 'completed']);
      expect(result.selection).toEqual({ entities: 0, picked: 0, added: 0 });
    });

    it('should stop after an aborted stage', async () => {
      const coordinator = harvester.coordinator({ credentials: { over18: '1' } });
      vi.spyOn(coordinator, 'runEntityStage').mockResolvedValue(summary('entities', 'aborted'));
      const items = vi.spyOn(coordinator, 'runChildItemStage');

      const result = await runFullCrawl(harvester, coordinator);

      expect(result.stages).toHaveLength(1);
      expect(result.selection).toBeNull();
      expect(items).not.toHaveBeenCalled();
    });

    it('should honor the skip flags', async () => {
      const coordinator = harvester.coordinator({ credentials: { over18: '1' } });
      const entities = vi.spyOn(coordinator, 'runEntityStage');
      const items = vi.spyOn(coordinator, 'runChildItemStage');
      vi.spyOn(coordinator, 'runCandidateStage').mockResolvedValue(summary('candidates'));

      const result = await runFullCrawl(harvester, coordinator, {
        skipEntities: true,
        skipItems: true,
        skipSelect: true,
      });

      expect(entities).not.toHaveBeenCalled();
      expect(items).not.toHaveBeenCalled();
      expect(result.stages.map((stage) => stage.stage)).toEqual(['candidates']);
      expect(result.selection).toBeNull();
    });
  });
});
