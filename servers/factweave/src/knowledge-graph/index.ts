export {
  KnowledgeGraph,
  DEFAULT_DETECTION_TIMEOUT_MS,
  DEFAULT_CLOSE_TIMEOUT_MS,
} from './knowledge-graph.js';
export { ProcessingQueue } from './processing-queue.js';
