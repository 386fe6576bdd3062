import type { Fact } from '../types/index.js';

export function buildDetectionPrompt(newFact: Fact, existingFacts: readonly Fact[]): string {
  const listing = existingFacts
    .map((fact, index) => `${index + 1}. ID: ${fact.id}, Content: ${fact.content}`)
    .join('\n');

  return `
Compare the NEW FACT with each of the EXISTING FACTS listed below.

NEW FACT: ${newFact.content}

EXISTING FACTS:
${listing}

For every existing fact decide whether the new fact:
- SUPPORTS it (gives evidence for it, confirms or reinforces it)
- CONTRADICTS it (argues against it, disproves it or conflicts with it)
- is NEUTRAL towards it (no clear bearing either way)

Answer with a JSON array only. Each element must contain:
- "fact_id": the ID of the existing fact
- "relationship": "supports", "contradicts" or "neutral"
- "confidence": a number between 0.0 and 1.0
- "reasoning": one short sentence

Leave out anything with confidence of 0.3 or lower. Answer [] when nothing qualifies.

Example:
[
  {
    "fact_id": "fact_123",
    "relationship": "supports",
    "confidence": 0.85,
    "reasoning": "Both describe the same measurement with consistent results"
  }
]
`;
}
