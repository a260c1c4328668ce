/**
 * Catalog Store
 * Idempotent persistence for the entity -> child item -> candidate hierarchy.
 *
 * Every mutating call runs in a single transaction: a failure rolls back all of
 * that call's writes, so readers never see a half-written entity, item or
 * candidate set.
 */

import Database from 'better-sqlite3';
import {
  CandidateRecord,
  CandidateRow,
  CatalogCounts,
  ChildItemRecord,
  ChildItemRow,
  EntityRecord,
  EntityRow,
} from '../types/index.js';
import { CatalogDatabase } from './client.js';

export type ChildItemInput = Pick<ChildItemRecord, 'code' | 'title' | 'href'>;
export type CandidateInput = Pick<CandidateRecord, 'uri' | 'tags' | 'sizeText'>;
export type EntityInput = Pick<EntityRecord, 'key' | 'href'>;

export interface ChildItemGroup {
  entity: EntityRow;
  items: ChildItemRow[];
}

/** entity name -> item code -> candidates in first-seen order */
export type GroupedCandidates = Map<string, Map<string, CandidateRow[]>>;

const TAG_SEPARATOR = ', ';

export function serializeTags(tags: readonly string[]): string | null {
  const cleaned = tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
  return cleaned.length > 0 ? cleaned.join(TAG_SEPARATOR) : null;
}

export function deserializeTags(tags: string | null): string[] {
  if (!tags) return [];
  return tags
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

interface NormalizedChildItem {
  code: string;
  title: string | null;
  href: string;
}

interface NormalizedCandidate {
  uri: string;
  tags: string | null;
  sizeText: string | null;
}

function normalizeChildItem(item: ChildItemInput): NormalizedChildItem | null {
  const code = item.code.trim();
  const href = item.href.trim();
  if (!code || !href) return null;
  const title = item.title.trim();
  return { code, href, title: title || null };
}

function normalizeCandidates(candidates: readonly CandidateInput[]): NormalizedCandidate[] {
  const seen = new Set<string>();
  const normalized: NormalizedCandidate[] = [];
  for (const candidate of candidates) {
    const uri = candidate.uri.trim();
    if (!uri || seen.has(uri)) continue;
    seen.add(uri);
    const sizeText = candidate.sizeText.trim();
    normalized.push({ uri, tags: serializeTags(candidate.tags), sizeText: sizeText || null });
  }
  return normalized;
}

interface GroupedItemRow extends ChildItemRow {
  entity_name: string;
  entity_href: string | null;
}

interface GroupedCandidateRow extends CandidateRow {
  entity_name: string;
  code: string;
}

export class CatalogStore {
  private readonly upsertEntityStmt: Database.Statement<[string, string | null], { id: number }>;
  private readonly upsertChildItemStmt: Database.Statement<[number, string, string | null, string]>;
  private readonly deleteCandidatesStmt: Database.Statement<[number]>;
  private readonly insertCandidateStmt: Database.Statement<[number, string, string | null, string | null]>;

  constructor(private readonly db: CatalogDatabase) {
    this.upsertEntityStmt = db.prepare<[string, string | null], { id: number }>(`
      INSERT INTO entities (name, href)
      VALUES (?, ?)
      ON CONFLICT(name) DO UPDATE SET href = COALESCE(excluded.href, entities.href)
      RETURNING id
    `);
    this.upsertChildItemStmt = db.prepare<[number, string, string | null, string]>(`
      INSERT INTO child_items (entity_id, code, title, href)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(entity_id, code) DO UPDATE SET
        title = excluded.title,
        href = excluded.href
    `);
    this.deleteCandidatesStmt = db.prepare<[number]>('DELETE FROM candidates WHERE child_item_id = ?');
    this.insertCandidateStmt = db.prepare<[number, string, string | null, string | null]>(`
      INSERT INTO candidates (child_item_id, uri, tags, size_text)
      VALUES (?, ?, ?, ?)
    `);
  }

  // --- Entities ---------------------------------------------------------

  /**
   * Insert-or-update by unique name. An empty href never overwrites a stored one.
   * @returns the stable entity id
   */
  upsertEntity(name: string, href: string): number {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new Error('Entity name must not be empty');
    }
    return this.db.transaction(() => this.writeEntity(trimmed, href))();
  }

  /**
   * Upserts a batch of entity records in one transaction. Nameless records are skipped.
   * @returns number of records written
   */
  upsertEntities(records: readonly EntityInput[]): number {
    const valid = records
      .map((record) => ({ name: record.key.trim(), href: record.href }))
      .filter((record) => record.name.length > 0);
    if (valid.length === 0) return 0;

    this.db.transaction(() => {
      for (const record of valid) {
        this.writeEntity(record.name, record.href);
      }
    })();
    return valid.length;
  }

  listEntities(): EntityRow[] {
    return this.db
      .prepare<[], EntityRow>('SELECT id, name, href FROM entities ORDER BY LOWER(name), name')
      .all();
  }

  findEntityByName(name: string): EntityRow | null {
    const row = this.db
      .prepare<[string], EntityRow>('SELECT id, name, href FROM entities WHERE name = ?')
      .get(name.trim());
    return row ?? null;
  }

  private writeEntity(name: string, href: string): number {
    const row = this.upsertEntityStmt.get(name, href.trim() || null);
    if (!row) {
      throw new Error(`Upsert of entity ${name} returned no row`);
    }
    return row.id;
  }

  // --- Child items ------------------------------------------------------

  /**
   * Insert-or-update by (entity, code). Items missing a code or href are
   * skipped and not counted.
   */
  upsertChildItems(entityId: number, items: readonly ChildItemInput[]): number {
    const normalized = items
      .map(normalizeChildItem)
      .filter((item): item is NormalizedChildItem => item !== null);
    if (normalized.length === 0) return 0;

    this.db.transaction(() => {
      for (const item of normalized) {
        this.upsertChildItemStmt.run(entityId, item.code, item.title, item.href);
      }
    })();
    return normalized.length;
  }

  /**
   * Codes already stored for an entity; seeds the early-stop set.
   */
  knownChildItemKeys(entityId: number): Set<string> {
    const rows = this.db
      .prepare<[number], { code: string }>('SELECT code FROM child_items WHERE entity_id = ?')
      .all(entityId);
    return new Set(rows.map((row) => row.code));
  }

  /**
   * Every child item grouped by owning entity. Entities are ordered
   * case-insensitively by name and items by code; entities without items
   * are absent.
   */
  allChildItemsGroupedByEntity(): Map<string, ChildItemGroup> {
    const rows = this.db
      .prepare<[], GroupedItemRow>(`
        SELECT c.id, c.entity_id, c.code, c.title, c.href,
               e.name AS entity_name, e.href AS entity_href
        FROM child_items c
        JOIN entities e ON e.id = c.entity_id
        ORDER BY LOWER(e.name), e.name, c.code
      `)
      .all();

    const grouped = new Map<string, ChildItemGroup>();
    for (const row of rows) {
      let group = grouped.get(row.entity_name);
      if (!group) {
        group = { entity: { id: row.entity_id, name: row.entity_name, href: row.entity_href }, items: [] };
        grouped.set(row.entity_name, group);
      }
      group.items.push({ id: row.id, entity_id: row.entity_id, code: row.code, title: row.title, href: row.href });
    }
    return grouped;
  }

  // --- Candidates -------------------------------------------------------

  /**
   * Replaces the stored candidate snapshot of a child item: all existing rows
   * are deleted and the given set inserted. An empty set is a valid snapshot
   * ("no candidates found") and still clears previous rows.
   * @returns number of candidates written
   */
  replaceCandidates(childItemId: number, candidates: readonly CandidateInput[]): number {
    const normalized = normalizeCandidates(candidates);

    this.db.transaction(() => {
      this.deleteCandidatesStmt.run(childItemId);
      for (const candidate of normalized) {
        this.insertCandidateStmt.run(childItemId, candidate.uri, candidate.tags, candidate.sizeText);
      }
    })();
    return normalized.length;
  }

  groupedCandidatesByEntityAndItem(): GroupedCandidates {
    const rows = this.db
      .prepare<[], GroupedCandidateRow>(`
        SELECT m.id, m.child_item_id, m.uri, m.tags, m.size_text,
               e.name AS entity_name, c.code
        FROM candidates m
        JOIN child_items c ON c.id = m.child_item_id
        JOIN entities e ON e.id = c.entity_id
        ORDER BY LOWER(e.name), e.name, c.code, m.id
      `)
      .all();

    const grouped: GroupedCandidates = new Map();
    for (const row of rows) {
      let items = grouped.get(row.entity_name);
      if (!items) {
        items = new Map();
        grouped.set(row.entity_name, items);
      }
      let bucket = items.get(row.code);
      if (!bucket) {
        bucket = [];
        items.set(row.code, bucket);
      }
      bucket.push({
        id: row.id,
        child_item_id: row.child_item_id,
        uri: row.uri,
        tags: row.tags,
        size_text: row.size_text,
      });
    }
    return grouped;
  }

  // --- Misc -------------------------------------------------------------

  counts(): CatalogCounts {
    const count = (table: 'entities' | 'child_items' | 'candidates'): number => {
      const row = this.db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get();
      return row?.total ?? 0;
    };
    return {
      entities: count('entities'),
      childItems: count('child_items'),
      candidates: count('candidates'),
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
