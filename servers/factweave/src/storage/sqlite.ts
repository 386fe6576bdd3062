import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { SCHEMA_DDL } from './schema.js';
import { parseMetadata, serializeMetadata } from './metadata.js';
import { FactGraphError } from '../errors.js';
import { parseRelationshipType } from '../types/index.js';
import type {
  Fact,
  FactStorage,
  Relationship,
  RelationshipType,
} from '../types/index.js';

// ---- helpers ----

interface FactRow {
  id: string;
  content: string;
  metadata: string;
}

interface RelationshipRow {
  source_id: string;
  target_id: string;
  type: string;
  confidence: number;
  metadata: string;
}

function rowToFact(row: FactRow): Fact {
  return {
    id: row.id,
    content: row.content,
    metadata: parseMetadata(row.metadata),
  };
}

function rowToRelationship(row: RelationshipRow): Relationship | null {
  const type = parseRelationshipType(row.type);
  if (!type) {
    console.error(
      `Skipping edge ${row.source_id} -> ${row.target_id} with unknown type "${row.type}"`
    );
    return null;
  }
  return {
    sourceId: row.source_id,
    targetId: row.target_id,
    type,
    confidence: row.confidence,
    metadata: parseMetadata(row.metadata),
  };
}

function isForeignKeyViolation(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    error.code === 'SQLITE_CONSTRAINT_FOREIGNKEY'
  );
}

// ---- implementation ----

/**
 * Single-file backend on better-sqlite3. Calls are synchronous under the hood;
 * each write runs as its own statement so it is atomic on its own.
 * Edges require both endpoints to exist (foreign keys are enforced).
 */
export class SqliteStorage implements FactStorage {
  private db!: Database.Database;
  private dbPath: string;

  constructor(dbPath?: string) {
    this.dbPath =
      dbPath ??
      process.env.FACTWEAVE_DB_PATH ??
      path.join(
        process.env.HOME ?? process.env.USERPROFILE ?? '.',
        '.factweave',
        'facts.db'
      );
  }

  // ---------- lifecycle ----------

  initialize(): void {
    if (this.dbPath !== ':memory:') {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA_DDL);
  }

  close(): void {
    this.db?.close();
  }

  // ---------- facts ----------

  async addFact(fact: Fact): Promise<string> {
    this.db
      .prepare<{ id: string; content: string; metadata: string }>(`
        INSERT INTO facts (id, content, metadata)
        VALUES (@id, @content, @metadata)
        ON CONFLICT(id) DO UPDATE SET
          content  = excluded.content,
          metadata = excluded.metadata
      `)
      .run({
        id: fact.id,
        content: fact.content,
        metadata: serializeMetadata(fact.metadata),
      });
    return fact.id;
  }

  async getFact(factId: string): Promise<Fact | null> {
    const row = this.db
      .prepare<[string], FactRow>('SELECT id, content, metadata FROM facts WHERE id = ?')
      .get(factId);
    return row ? rowToFact(row) : null;
  }

  async getAllFacts(): Promise<Fact[]> {
    return this.db
      .prepare<[], FactRow>('SELECT id, content, metadata FROM facts ORDER BY rowid')
      .all()
      .map(rowToFact);
  }

  // ---------- relationships ----------

  async addRelationship(relationship: Relationship): Promise<void> {
    const upsert = this.db.prepare<{
      sourceId: string;
      targetId: string;
      type: string;
      confidence: number;
      metadata: string;
    }>(`
      INSERT INTO relationships (source_id, target_id, type, confidence, metadata)
      VALUES (@sourceId, @targetId, @type, @confidence, @metadata)
      ON CONFLICT(source_id, target_id) DO UPDATE SET
        type       = excluded.type,
        confidence = excluded.confidence,
        metadata   = excluded.metadata,
        updated_at = strftime('%Y-%m-%dT%H:%M:%fZ','now')
    `);

    try {
      upsert.run({
        sourceId: relationship.sourceId,
        targetId: relationship.targetId,
        type: relationship.type,
        confidence: relationship.confidence,
        metadata: serializeMetadata(relationship.metadata),
      });
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw FactGraphError.notFound(
          'Relationship endpoint',
          `${relationship.sourceId} -> ${relationship.targetId}`
        );
      }
      throw error;
    }
  }

  async getRelationships(factId?: string): Promise<Relationship[]> {
    const columns = 'source_id, target_id, type, confidence, metadata';
    const rows =
      factId === undefined
        ? this.db
            .prepare<[], RelationshipRow>(
              `SELECT ${columns} FROM relationships ORDER BY updated_at, rowid`
            )
            .all()
        : this.db
            .prepare<[string, string], RelationshipRow>(
              `SELECT ${columns} FROM relationships
               WHERE source_id = ? OR target_id = ?
               ORDER BY updated_at, rowid`
            )
            .all(factId, factId);

    const relationships: Relationship[] = [];
    for (const row of rows) {
      const relationship = rowToRelationship(row);
      if (relationship) relationships.push(relationship);
    }
    return relationships;
  }

  async updateRelationship(
    sourceId: string,
    targetId: string,
    type: RelationshipType,
    confidence: number
  ): Promise<void> {
    await this.addRelationship({ sourceId, targetId, type, confidence, metadata: {} });
  }
}
