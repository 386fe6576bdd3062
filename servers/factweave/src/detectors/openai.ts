import fetch from 'node-fetch';
import { z } from 'zod';
import { buildDetectionPrompt } from './prompts.js';
import { FactGraphError, errorMessage } from '../errors.js';
import { parseRelationshipType } from '../types/index.js';
import type {
  DetectedRelationship,
  Fact,
  FetchLike,
  OpenAIDetectorOptions,
  RelationshipDetector,
} from '../types/index.js';

/** Detections at or below this confidence are dropped, whatever the model says. */
export const MIN_DETECTION_CONFIDENCE = 0.3;

export const DEFAULT_OPENAI_MODEL = 'gpt-4';
export const DEFAULT_MAX_FACTS_PER_REQUEST = 20;

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

const DetectionItemSchema = z.object({
  fact_id: z.string(),
  relationship: z.string(),
  confidence: z.coerce.number(),
});

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/**
 * Turn the model's answer into detections against the given candidates.
 * Unknown ids, unknown relationship names and low-confidence items are skipped;
 * an unreadable document yields no detections at all.
 */
export function parseDetectorResponse(
  response: string,
  candidates: readonly Fact[]
): DetectedRelationship[] {
  let text = response.trim();
  const fenced = CODE_FENCE.exec(text);
  if (fenced) text = fenced[1];

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    console.error(`Error parsing relationship detector response: ${errorMessage(error)}`);
    return [];
  }

  if (!Array.isArray(document)) {
    console.error('Error parsing relationship detector response: expected a JSON array');
    return [];
  }

  const candidateIds = new Set(candidates.map((fact) => fact.id));
  const detected: DetectedRelationship[] = [];

  for (const item of document) {
    const parsed = DetectionItemSchema.safeParse(item);
    if (!parsed.success) continue;

    const { fact_id: targetId, relationship, confidence } = parsed.data;
    if (!candidateIds.has(targetId)) continue;

    const type = parseRelationshipType(relationship);
    if (!type) continue;

    if (confidence > MIN_DETECTION_CONFIDENCE) {
      detected.push({ targetId, type, confidence });
    }
  }

  return detected;
}

/**
 * Relationship detector backed by the OpenAI chat-completions API.
 *
 * Existing facts are sent in chunks of `maxFactsPerRequest` to stay within
 * the request size limits; the chunks run one after another and their results
 * are concatenated. A chunk that fails contributes nothing.
 */
export class OpenAIRelationshipDetector implements RelationshipDetector {
  private apiKey: string;
  private model: string;
  private maxFactsPerRequest: number;
  private baseUrl: string;
  private fetchImpl: FetchLike;

  constructor(options: OpenAIDetectorOptions) {
    if (!options.apiKey) {
      throw FactGraphError.validation('OpenAI relationship detector requires an API key');
    }
    const maxFactsPerRequest = options.maxFactsPerRequest ?? DEFAULT_MAX_FACTS_PER_REQUEST;
    if (!Number.isInteger(maxFactsPerRequest) || maxFactsPerRequest < 1) {
      throw FactGraphError.validation('maxFactsPerRequest must be a positive integer');
    }

    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_OPENAI_MODEL;
    this.maxFactsPerRequest = maxFactsPerRequest;
    this.baseUrl = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async detect(newFact: Fact, existingFacts: readonly Fact[]): Promise<DetectedRelationship[]> {
    if (existingFacts.length === 0) return [];

    const detected: DetectedRelationship[] = [];
    for (let i = 0; i < existingFacts.length; i += this.maxFactsPerRequest) {
      const batch = existingFacts.slice(i, i + this.maxFactsPerRequest);
      detected.push(...(await this.processBatch(newFact, batch)));
    }
    return detected;
  }

  private async processBatch(newFact: Fact, batch: readonly Fact[]): Promise<DetectedRelationship[]> {
    try {
      const content = await this.complete(buildDetectionPrompt(newFact, batch));
      return parseDetectorResponse(content, batch);
    } catch (error) {
      console.error(`Error in AI relationship detection: ${errorMessage(error)}`);
      return [];
    }
  }

  private async complete(prompt: string): Promise<string> {
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0.1,
        max_tokens: 1000
      })
    });

    if (!response.ok) {
      const body = await response.text();
      throw FactGraphError.dependency(`OpenAI API error ${response.status}: ${body}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw FactGraphError.dependency(
        `Unexpected OpenAI response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`
      );
    }

    return parsed.data.choices[0].message.content ?? '';
  }
}
