export * from './types/index.js';
export { FactGraphError, isFactGraphError } from './errors.js';
export type { FactGraphErrorCode } from './errors.js';
export {
  KnowledgeGraph,
  ProcessingQueue,
  DEFAULT_DETECTION_TIMEOUT_MS,
  DEFAULT_CLOSE_TIMEOUT_MS,
} from './knowledge-graph/index.js';
export { MemoryStorage, SqliteStorage, Neo4jStorage } from './storage/index.js';
export {
  OpenAIRelationshipDetector,
  CustomDetector,
  parseDetectorResponse,
  buildDetectionPrompt,
  MIN_DETECTION_CONFIDENCE,
} from './detectors/index.js';
export type { DetectFunction } from './detectors/index.js';
export { renderDot, NetworkVisualizer } from './visualization/index.js';
export { loadConfig, createStorage, createDetector } from './config/index.js';
export type { FactweaveConfig, StorageConfig, DetectorConfig } from './config/index.js';
