import neo4j, { Driver as Neo4jDriver, Integer } from 'neo4j-driver';
import { parseMetadata } from './metadata.js';
import { FactGraphError } from '../errors.js';
import { parseRelationshipType } from '../types/index.js';
import type {
  Fact,
  FactStorage,
  Metadata,
  Relationship,
  RelationshipType,
} from '../types/index.js';

type FactRecord = {
  id: string;
  content: string;
  metadata: string | null;
};

type RelationshipRecord = {
  sourceId: string;
  targetId: string;
  type: string;
  confidence: number | Integer;
  metadata: string | null;
};

const FACT_PROJECTION = 'f.id AS id, f.content AS content, f.metadata AS metadata';

const RELATIONSHIP_PROJECTION = `
  source.id AS sourceId, target.id AS targetId,
  r.type AS type, r.confidence AS confidence, r.metadata AS metadata
`;

// Neo4j properties cannot hold maps, so metadata is stored as a JSON string (or null when empty)
function metadataProperty(metadata: Metadata): string | null {
  return Object.keys(metadata).length > 0 ? JSON.stringify(metadata) : null;
}

function toFact(record: FactRecord): Fact {
  return {
    id: record.id,
    content: record.content,
    metadata: parseMetadata(record.metadata),
  };
}

function toRelationship(record: RelationshipRecord): Relationship | null {
  const type = parseRelationshipType(record.type);
  if (!type) {
    console.error(
      `Skipping RELATES_TO ${record.sourceId} -> ${record.targetId} with unknown type "${record.type}"`
    );
    return null;
  }
  return {
    sourceId: record.sourceId,
    targetId: record.targetId,
    type,
    confidence: neo4j.isInt(record.confidence)
      ? record.confidence.toNumber()
      : record.confidence,
    metadata: parseMetadata(record.metadata),
  };
}

/**
 * Neo4j-backed storage.
 *
 * Facts map to `(:Fact {id, content, metadata, createdAt})` nodes and every
 * relationship to a single `[:RELATES_TO {type, confidence, metadata, updatedAt}]`
 * edge per ordered pair. Each call opens its own session and runs in one
 * managed transaction; the driver's I/O is asynchronous so callers never block.
 */
export class Neo4jStorage implements FactStorage {
  constructor(private neo4jDriver: Neo4jDriver) { }

  /**
   * Create a driver, verify the uniqueness constraint and return a ready backend
   */
  static async connect(uri: string, username: string, password: string): Promise<Neo4jStorage> {
    const driver = neo4j.driver(uri, neo4j.auth.basic(username, password));
    const storage = new Neo4jStorage(driver);
    try {
      await storage.initialize();
    } catch (error) {
      await driver.close();
      throw error;
    }
    return storage;
  }

  /**
   * Idempotent: the store does not enforce id uniqueness on its own
   */
  async initialize(): Promise<void> {
    const session = this.neo4jDriver.session();
    try {
      await session.run(
        'CREATE CONSTRAINT fact_id IF NOT EXISTS FOR (f:Fact) REQUIRE f.id IS UNIQUE'
      );
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.neo4jDriver.close();
  }

  async addFact(fact: Fact): Promise<string> {
    const session = this.neo4jDriver.session();
    try {
      const res = await session.executeWrite(tx => tx.run<{ id: string }>(`
        MERGE (f:Fact {id: $id})
        ON CREATE SET f.createdAt = datetime()
        SET f.content = $content, f.metadata = $metadata
        RETURN f.id AS id
      `, { id: fact.id, content: fact.content, metadata: metadataProperty(fact.metadata) }));

      return res.records[0]?.get('id') ?? fact.id;
    } finally {
      await session.close();
    }
  }

  async getFact(factId: string): Promise<Fact | null> {
    const session = this.neo4jDriver.session();
    try {
      const res = await session.executeRead(tx => tx.run<FactRecord>(
        `MATCH (f:Fact {id: $id}) RETURN ${FACT_PROJECTION}`,
        { id: factId }
      ));
      const record = res.records[0];
      return record ? toFact(record.toObject()) : null;
    } finally {
      await session.close();
    }
  }

  async getAllFacts(): Promise<Fact[]> {
    const session = this.neo4jDriver.session();
    try {
      const res = await session.executeRead(tx => tx.run<FactRecord>(
        `MATCH (f:Fact) RETURN ${FACT_PROJECTION} ORDER BY f.createdAt`
      ));
      return res.records.map(record => toFact(record.toObject()));
    } finally {
      await session.close();
    }
  }

  async addRelationship(relationship: Relationship): Promise<void> {
    const session = this.neo4jDriver.session();
    try {
      // MERGE on the bare pattern keeps one edge per ordered pair; SET overwrites it whole
      const res = await session.executeWrite(tx => tx.run<{ type: string }>(`
        MATCH (source:Fact {id: $sourceId}), (target:Fact {id: $targetId})
        MERGE (source)-[r:RELATES_TO]->(target)
        SET r.type = $type,
            r.confidence = $confidence,
            r.metadata = $metadata,
            r.updatedAt = datetime()
        RETURN r.type AS type
      `, {
        sourceId: relationship.sourceId,
        targetId: relationship.targetId,
        type: relationship.type,
        confidence: relationship.confidence,
        metadata: metadataProperty(relationship.metadata),
      }));

      if (res.records.length === 0) {
        throw FactGraphError.notFound(
          'Relationship endpoint',
          `${relationship.sourceId} -> ${relationship.targetId}`
        );
      }
    } finally {
      await session.close();
    }
  }

  async getRelationships(factId?: string): Promise<Relationship[]> {
    const session = this.neo4jDriver.session();
    try {
      const res = await session.executeRead(tx => tx.run<RelationshipRecord>(`
        MATCH (source:Fact)-[r:RELATES_TO]->(target:Fact)
        WHERE $factId IS NULL OR source.id = $factId OR target.id = $factId
        RETURN ${RELATIONSHIP_PROJECTION}
        ORDER BY r.updatedAt
      `, { factId: factId ?? null }));

      const relationships: Relationship[] = [];
      for (const record of res.records) {
        const relationship = toRelationship(record.toObject());
        if (relationship) relationships.push(relationship);
      }
      return relationships;
    } finally {
      await session.close();
    }
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
