import type {
  Fact,
  FactStorage,
  Relationship,
  RelationshipType,
} from '../types/index.js';

function pairKey(sourceId: string, targetId: string): string {
  return JSON.stringify([sourceId, targetId]);
}

/**
 * Process-local backend. Facts are keyed by id, edges by their ordered
 * (source, target) pair, so replacing an edge is a single map write.
 * Values are cloned on the way in and out; callers never share an object
 * with the store.
 * No referential checks: edges may point at ids that were never stored.
 */
export class MemoryStorage implements FactStorage {
  private facts = new Map<string, Fact>();
  private relationships = new Map<string, Relationship>();

  async addFact(fact: Fact): Promise<string> {
    this.facts.set(fact.id, structuredClone(fact));
    return fact.id;
  }

  async getFact(factId: string): Promise<Fact | null> {
    const fact = this.facts.get(factId);
    return fact ? structuredClone(fact) : null;
  }

  async getAllFacts(): Promise<Fact[]> {
    return [...this.facts.values()].map((fact) => structuredClone(fact));
  }

  async addRelationship(relationship: Relationship): Promise<void> {
    const key = pairKey(relationship.sourceId, relationship.targetId);
    // delete first so the latest write iterates last
    this.relationships.delete(key);
    this.relationships.set(key, structuredClone(relationship));
  }

  async getRelationships(factId?: string): Promise<Relationship[]> {
    const all = [...this.relationships.values()];
    const matching =
      factId === undefined
        ? all
        : all.filter((r) => r.sourceId === factId || r.targetId === factId);
    return matching.map((r) => structuredClone(r));
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
