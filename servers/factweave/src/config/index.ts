import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { FactGraphError } from '../errors.js';
import { MemoryStorage, Neo4jStorage, SqliteStorage } from '../storage/index.js';
import { OpenAIRelationshipDetector } from '../detectors/index.js';
import type { FactStorage, RelationshipDetector } from '../types/index.js';

// Blank variables count as unset
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

const positiveInt = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().positive().default(fallback)
  );

export const EnvSchema = z
  .object({
    FACTWEAVE_STORAGE: z.enum(['memory', 'sqlite', 'neo4j']).default('memory'),
    FACTWEAVE_DB_PATH: optionalString,
    NEO4J_URI: optionalString,
    NEO4J_USERNAME: optionalString,
    NEO4J_PASSWORD: optionalString,
    FACTWEAVE_DETECTOR: z.enum(['none', 'openai']).default('none'),
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: optionalString,
    FACTWEAVE_MAX_FACTS_PER_REQUEST: positiveInt(20),
    FACTWEAVE_DETECTION_TIMEOUT_MS: positiveInt(60_000),
    FACTWEAVE_CLOSE_TIMEOUT_MS: positiveInt(5_000),
  })
  .superRefine((env, ctx) => {
    if (env.FACTWEAVE_STORAGE === 'neo4j') {
      if (!env.NEO4J_URI) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['NEO4J_URI'], message: 'required for neo4j storage' });
      }
      if (!env.NEO4J_PASSWORD) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['NEO4J_PASSWORD'], message: 'required for neo4j storage' });
      }
    }
    if (env.FACTWEAVE_DETECTOR === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['OPENAI_API_KEY'], message: 'required for the openai detector' });
    }
  });

export type StorageConfig =
  | { kind: 'memory' }
  | { kind: 'sqlite'; dbPath: string }
  | { kind: 'neo4j'; uri: string; username: string; password: string };

export type DetectorConfig =
  | { kind: 'none' }
  | { kind: 'openai'; apiKey: string; model: string; maxFactsPerRequest: number };

export interface FactweaveConfig {
  storage: StorageConfig;
  detector: DetectorConfig;
  detectionTimeoutMs: number;
  closeTimeoutMs: number;
}

/**
 * Read and validate configuration from environment variables.
 * Throws a `validation` FactGraphError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FactweaveConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw FactGraphError.validation(`Invalid configuration: ${problems}`);
  }
  const vars = parsed.data;

  let storage: StorageConfig;
  switch (vars.FACTWEAVE_STORAGE) {
    case 'sqlite':
      storage = {
        kind: 'sqlite',
        dbPath: vars.FACTWEAVE_DB_PATH ?? path.join(os.homedir(), '.factweave', 'facts.db'),
      };
      break;
    case 'neo4j':
      storage = {
        kind: 'neo4j',
        uri: vars.NEO4J_URI ?? '',
        username: vars.NEO4J_USERNAME ?? 'neo4j',
        password: vars.NEO4J_PASSWORD ?? '',
      };
      break;
    default:
      storage = { kind: 'memory' };
  }

  const detector: DetectorConfig =
    vars.FACTWEAVE_DETECTOR === 'openai'
      ? {
          kind: 'openai',
          apiKey: vars.OPENAI_API_KEY ?? '',
          model: vars.OPENAI_MODEL ?? 'gpt-4',
          maxFactsPerRequest: vars.FACTWEAVE_MAX_FACTS_PER_REQUEST,
        }
      : { kind: 'none' };

  return {
    storage,
    detector,
    detectionTimeoutMs: vars.FACTWEAVE_DETECTION_TIMEOUT_MS,
    closeTimeoutMs: vars.FACTWEAVE_CLOSE_TIMEOUT_MS,
  };
}

export async function createStorage(config: StorageConfig): Promise<FactStorage> {
  switch (config.kind) {
    case 'sqlite': {
      const storage = new SqliteStorage(config.dbPath);
      storage.initialize();
      return storage;
    }
    case 'neo4j':
      return Neo4jStorage.connect(config.uri, config.username, config.password);
    case 'memory':
      return new MemoryStorage();
  }
}

export function createDetector(config: DetectorConfig): RelationshipDetector | undefined {
  if (config.kind === 'none') return undefined;
  return new OpenAIRelationshipDetector({
    apiKey: config.apiKey,
    model: config.model,
    maxFactsPerRequest: config.maxFactsPerRequest,
  });
}
