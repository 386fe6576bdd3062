export {
  OpenAIRelationshipDetector,
  parseDetectorResponse,
  MIN_DETECTION_CONFIDENCE,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_MAX_FACTS_PER_REQUEST,
} from './openai.js';
export { CustomDetector } from './custom.js';
export type { DetectFunction } from './custom.js';
export { buildDetectionPrompt } from './prompts.js';
