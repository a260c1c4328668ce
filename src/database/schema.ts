/**
 * Catalog schema. Applied on every open; all statements are idempotent.
 */
export const CATALOG_SCHEMA = `
CREATE TABLE IF NOT EXISTS entities (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  href TEXT
);

CREATE TABLE IF NOT EXISTS child_items (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  entity_id INTEGER NOT NULL,
  code TEXT NOT NULL,
  title TEXT,
  href TEXT,
  UNIQUE(entity_id, code),
  FOREIGN KEY(entity_id) REFERENCES entities(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS candidates (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  child_item_id INTEGER NOT NULL,
  uri TEXT NOT NULL,
  tags TEXT,
  size_text TEXT,
  UNIQUE(child_item_id, uri),
  FOREIGN KEY(child_item_id) REFERENCES child_items(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_child_items_entity ON child_items(entity_id);
CREATE INDEX IF NOT EXISTS idx_candidates_child_item ON candidates(child_item_id);
`;
