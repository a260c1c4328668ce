import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CheckpointStore } from './checkpoint-store.js';
import { createLogger } from '../utils/logger.js';

describe('CheckpointStore', () => {
  const logger = createLogger({ silent: true });
  let dir: string;
  let file: string;
  let store: CheckpointStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'checkpoints-'));
    file = path.join(dir, 'nested', 'checkpoints.json');
    store = new CheckpointStore(file, logger);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return null when nothing was saved', () => {
    expect(store.load('child_items')).toBeNull();
    expect(store.all()).toEqual({});
  });

  it('should persist the cursor with its timestamp', () => {
    const now = new Date('2024-03-01T10:00:00.000Z');
    store.save('child_items', { entity_index: 3, entity_key: 'Aoi' }, now);

    const reopened = new CheckpointStore(file, logger);
    expect(reopened.load('child_items')).toEqual({
      cursor: { entity_index: 3, entity_key: 'Aoi' },
      updated_at: '2024-03-01T10:00:00.000Z',
    });
  });

  it('should overwrite only the saved stage', () => {
    store.save('child_items', { entity_index: 1, entity_key: 'A' });
    store.save('candidates', { entity_index: 0, entity_key: 'A', item_index: 2, item_key: 'X-2' });
    store.save('child_items', { entity_index: 2, entity_key: 'B' });

    expect(store.load('child_items')?.cursor).toEqual({ entity_index: 2, entity_key: 'B' });
    expect(store.load('candidates')?.cursor).toEqual({
      entity_index: 0,
      entity_key: 'A',
      item_index: 2,
      item_key: 'X-2',
    });
  });

  it('should clear a stage and keep the others', () => {
    store.save('entities', { next_url: 'https://catalog.example.com/list?page=3', page: 3 });
    store.save('candidates', { entity_index: 0, entity_key: 'A', item_index: 1, item_key: 'X-1' });

    store.clear('entities');

    expect(store.load('entities')).toBeNull();
    expect(Object.keys(store.all())).toEqual(['candidates']);
  });

  it('should not leave temporary files behind', () => {
    store.save('entities', { next_url: 'https://catalog.example.com/list?page=2', page: 2 });

    expect(fs.readdirSync(path.dirname(file))).toEqual(['checkpoints.json']);
  });

  it('should treat an unreadable document as empty and warn', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '{ not json', 'utf-8');
    const warn = vi.spyOn(logger, 'warn');

    expect(store.load('entities')).toBeNull();
    expect(warn).toHaveBeenCalledWith('Checkpoint file is not valid JSON, ignoring it', { file });
  });

  it('should ignore a document that is not an object', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify([{ cursor: { page: 2 }, updated_at: '2024-03-01T10:00:00.000Z' }]), 'utf-8');
    const warn = vi.spyOn(logger, 'warn');

    expect(store.all()).toEqual({});
    expect(warn).toHaveBeenCalledWith('Checkpoint file has an unexpected shape, ignoring it', { file });
  });

  it('should reject cursors holding anything but strings and numbers', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(
      file,
      JSON.stringify({
        candidates: { cursor: { entity_index: 0, entity_key: { name: 'A' } }, updated_at: '2024-03-01T10:00:00.000Z' },
        child_items: { cursor: { entity_index: 1, entity_key: 'A' }, updated_at: 5 },
      }),
      'utf-8'
    );
    const warn = vi.spyOn(logger, 'warn');

    expect(store.all()).toEqual({});
    expect(warn).toHaveBeenCalledWith('Ignoring malformed checkpoint entry', { file, stage: 'child_items' });
    expect(warn).toHaveBeenCalledWith('Ignoring malformed checkpoint entry', { file, stage: 'candidates' });
  });

  it('should drop malformed entries and keep valid ones', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(
      file,
      JSON.stringify({
        entities: { cursor: 'page-3' },
        child_items: { cursor: { entity_index: 4, entity_key: 'D' }, updated_at: '2024-03-01T10:00:00.000Z' },
        unknown_stage: { cursor: {}, updated_at: '2024-03-01T10:00:00.000Z' },
      }),
      'utf-8'
    );

    expect(store.all()).toEqual({
      child_items: { cursor: { entity_index: 4, entity_key: 'D' }, updated_at: '2024-03-01T10:00:00.000Z' },
    });
  });
});
