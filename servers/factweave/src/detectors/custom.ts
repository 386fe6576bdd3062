import { errorMessage } from '../errors.js';
import type {
  DetectedRelationship,
  Fact,
  RelationshipDetector,
} from '../types/index.js';

export type DetectFunction = (
  newFact: Fact,
  existingFacts: Fact[]
) => DetectedRelationship[] | Promise<DetectedRelationship[]>;

/**
 * Wraps a caller-supplied function as a RelationshipDetector. Useful for tests
 * and for bespoke logic that needs no external service.
 */
export class CustomDetector implements RelationshipDetector {
  constructor(private detectFunction: DetectFunction) { }

  async detect(newFact: Fact, existingFacts: readonly Fact[]): Promise<DetectedRelationship[]> {
    if (existingFacts.length === 0) return [];

    try {
      // copies keep the caller's function from mutating our inputs
      const result = await this.detectFunction(
        structuredClone(newFact),
        existingFacts.map((fact) => structuredClone(fact))
      );
      return [...result];
    } catch (error) {
      console.error(`Error in custom relationship detection: ${errorMessage(error)}`);
      return [];
    }
  }
}
