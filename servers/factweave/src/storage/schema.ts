/**
 * SQLite DDL for the fact graph.
 * Executed every time the database is opened; every statement is idempotent.
 */
export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS facts (
  id         TEXT PRIMARY KEY,
  content    TEXT NOT NULL,
  metadata   TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
);

-- One edge per ordered (source, target) pair
CREATE TABLE IF NOT EXISTS relationships (
  source_id  TEXT NOT NULL REFERENCES facts(id) ON DELETE CASCADE,
  target_id  TEXT NOT NULL REFERENCES facts(id) ON DELETE CASCADE,
  type       TEXT NOT NULL CHECK (type IN ('supports', 'contradicts', 'neutral')),
  confidence REAL NOT NULL,
  metadata   TEXT NOT NULL DEFAULT '{}',
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
  PRIMARY KEY (source_id, target_id)
);

CREATE INDEX IF NOT EXISTS idx_relationships_target ON relationships(target_id);
CREATE INDEX IF NOT EXISTS idx_relationships_type ON relationships(type);
`;
