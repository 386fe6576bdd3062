export {
  RelationshipType,
  RELATIONSHIP_TYPES,
  parseRelationshipType,
} from '@factweave/fact-model';

export type {
  Fact,
  Metadata,
  Relationship,
  DetectedRelationship,
  NetworkStats,
  FactStorage,
  RelationshipDetector,
} from '@factweave/fact-model';

// ---------- Orchestrator ----------

export interface KnowledgeGraphOptions {
  /** Upper bound for one detection round, in milliseconds. */
  detectionTimeoutMs?: number;
  /** How long close() waits for the background worker to exit. */
  closeTimeoutMs?: number;
}

// ---------- Detectors ----------

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<FetchResponseLike>;

export interface OpenAIDetectorOptions {
  apiKey: string;
  model?: string;
  maxFactsPerRequest?: number;
  baseUrl?: string;
  fetch?: FetchLike;
}

// ---------- Visualization ----------

export interface DotRenderOptions {
  maxLabelLength?: number;
  showLabels?: boolean;
  title?: string;
}
