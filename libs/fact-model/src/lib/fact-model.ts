

export enum RelationshipType {
  SUPPORTS = 'supports',
  CONTRADICTS = 'contradicts',
  NEUTRAL = 'neutral',
}

export const RELATIONSHIP_TYPES: readonly RelationshipType[] = [
  RelationshipType.SUPPORTS,
  RelationshipType.CONTRADICTS,
  RelationshipType.NEUTRAL,
];

/**
 * Map a free-form string ("Supports", "contradicts", ...) onto a RelationshipType.
 * Returns undefined for anything outside the closed set.
 */
export function parseRelationshipType(value: string): RelationshipType | undefined {
  const normalized = value.trim().toLowerCase();
  return RELATIONSHIP_TYPES.find((type) => type === normalized);
}

export type Metadata = Record<string, unknown>;

export interface Fact {
  id: string;
  content: string;
  metadata: Metadata;
}

// Directed edge: source bears `type` relation to target
export interface Relationship {
  sourceId: string;
  targetId: string;
  type: RelationshipType;
  confidence: number;
  metadata: Metadata;
}

export interface DetectedRelationship {
  targetId: string;
  type: RelationshipType;
  confidence: number;
}

export interface NetworkStats {
  totalFacts: number;
  totalRelationships: number;
  supportRelationships: number;
  contradictionRelationships: number;
  neutralRelationships: number;
}

// The FactStorage interface contains all operations a persistence backend must provide
export interface FactStorage {

  addFact(fact: Fact): Promise<string>;

  getFact(factId: string): Promise<Fact | null>;

  getAllFacts(): Promise<Fact[]>;

  // Replaces any edge already stored for the same (sourceId, targetId) pair
  addRelationship(relationship: Relationship): Promise<void>;

  getRelationships(factId?: string): Promise<Relationship[]>;

  updateRelationship(
    sourceId: string,
    targetId: string,
    type: RelationshipType,
    confidence: number
  ): Promise<void>;

  close?(): Promise<void> | void;

}

// Detectors never reject: delegate failures resolve to an empty list
export interface RelationshipDetector {

  detect(newFact: Fact, existingFacts: readonly Fact[]): Promise<DetectedRelationship[]>;

}
