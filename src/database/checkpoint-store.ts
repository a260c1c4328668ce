import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { Checkpoint, CheckpointDocument, Cursor, StageName } from '../types/index.js';
import { Logger } from '../utils/logger.js';

const STAGES: readonly StageName[] = ['entities', 'child_items', 'candidates'];

const CursorSchema = z.record(z.union([z.string(), z.number()]));

const CheckpointSchema = z.object({
  cursor: CursorSchema,
  updated_at: z.string(),
});

/** Top level of the file; entries are validated per stage */
const CheckpointFileSchema = z.record(z.unknown());

/**
 * Stage checkpoints kept in one JSON document.
 *
 * Layout: `{ [stage]: { cursor, updated_at } }`. Every update rewrites the
 * whole document through a temporary file and a rename, so a crash leaves
 * either the previous or the new document on disk.
 */
export class CheckpointStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger
  ) {}

  load(stage: StageName): Checkpoint | null {
    return this.readDocument()[stage] ?? null;
  }

  /**
   * Overwrites the cursor of a stage with the position just completed.
   */
  save(stage: StageName, cursor: Cursor, now: Date = new Date()): Checkpoint {
    const document = this.readDocument();
    const checkpoint: Checkpoint = { cursor: { ...cursor }, updated_at: now.toISOString() };
    document[stage] = checkpoint;
    this.writeDocument(document);
    return checkpoint;
  }

  clear(stage: StageName): void {
    const document = this.readDocument();
    if (!(stage in document)) return;
    delete document[stage];
    this.writeDocument(document);
  }

  all(): CheckpointDocument {
    return this.readDocument();
  }

  private readDocument(): CheckpointDocument {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn('Checkpoint file is not valid JSON, ignoring it', { file: this.filePath });
      return {};
    }
    const file = CheckpointFileSchema.safeParse(parsed);
    if (!file.success) {
      this.logger.warn('Checkpoint file has an unexpected shape, ignoring it', { file: this.filePath });
      return {};
    }

    const document: CheckpointDocument = {};
    for (const stage of STAGES) {
      const entry = file.data[stage];
      if (entry === undefined) continue;
      const checkpoint = CheckpointSchema.safeParse(entry);
      if (checkpoint.success) {
        document[stage] = checkpoint.data;
      } else {
        this.logger.warn('Ignoring malformed checkpoint entry', { file: this.filePath, stage });
      }
    }
    return document;
  }

  private writeDocument(document: CheckpointDocument): void {
    mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      writeFileSync(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
      renameSync(tempPath, this.filePath);
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw error;
    }
  }
}
