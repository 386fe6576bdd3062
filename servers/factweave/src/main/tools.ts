import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { FactGraphError } from '../errors.js';
import { RelationshipType } from '../types/index.js';
import { NetworkVisualizer } from '../visualization/index.js';
import type { KnowledgeGraph } from '../knowledge-graph/index.js';

const relationshipTypeProperty = {
  type: 'string',
  enum: [RelationshipType.SUPPORTS, RelationshipType.CONTRADICTS, RelationshipType.NEUTRAL],
};

export const TOOLS: Tool[] = [
  {
    name: 'add_fact',
    description:
      'Add a fact to the graph. When relationship detection is enabled the fact is queued and related to the existing facts in the background.',
    inputSchema: {
      type: 'object',
      properties: {
        content: { type: 'string', description: 'The fact, in plain language' },
        id: { type: 'string', description: 'Optional id; generated when omitted' },
        metadata: { type: 'object', description: 'Optional free-form metadata' },
      },
      required: ['content'],
    },
  },
  {
    name: 'get_fact',
    description: 'Look up a single fact by id.',
    inputSchema: {
      type: 'object',
      properties: {
        factId: { type: 'string' },
      },
      required: ['factId'],
    },
  },
  {
    name: 'add_relationship',
    description:
      'Create or replace the relationship from one fact to another. Bypasses background detection.',
    inputSchema: {
      type: 'object',
      properties: {
        sourceId: { type: 'string', description: 'Fact that bears the relation' },
        targetId: { type: 'string', description: 'Fact the relation points at' },
        type: relationshipTypeProperty,
        confidence: { type: 'number', description: 'Confidence between 0.0 and 1.0 (default 1.0)' },
        metadata: { type: 'object' },
      },
      required: ['sourceId', 'targetId', 'type'],
    },
  },
  {
    name: 'get_relationships',
    description:
      'List relationships, optionally only those touching a fact and/or of one type.',
    inputSchema: {
      type: 'object',
      properties: {
        factId: { type: 'string' },
        type: relationshipTypeProperty,
      },
    },
  },
  {
    name: 'get_supporting_facts',
    description: 'Facts that support the given fact.',
    inputSchema: {
      type: 'object',
      properties: {
        factId: { type: 'string' },
      },
      required: ['factId'],
    },
  },
  {
    name: 'get_contradicting_facts',
    description: 'Facts that contradict the given fact.',
    inputSchema: {
      type: 'object',
      properties: {
        factId: { type: 'string' },
      },
      required: ['factId'],
    },
  },
  {
    name: 'get_network_stats',
    description: 'Counts of facts and relationships by type.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'wait_for_processing',
    description: 'Wait until every queued fact has been through relationship detection.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'render_graph',
    description: 'Render the whole graph as a Graphviz DOT document.',
    inputSchema: {
      type: 'object',
      properties: {
        maxLabelLength: { type: 'number', description: 'Truncate fact labels (default 30)' },
        showLabels: { type: 'boolean' },
      },
    },
  },
];

const MetadataInput = z.record(z.unknown()).optional();

const AddFactInput = z.object({
  content: z.string(),
  id: z.string().min(1).optional(),
  metadata: MetadataInput,
});

const FactIdInput = z.object({ factId: z.string().min(1) });

const AddRelationshipInput = z.object({
  sourceId: z.string().min(1),
  targetId: z.string().min(1),
  type: z.nativeEnum(RelationshipType),
  confidence: z.number().optional(),
  metadata: MetadataInput,
});

const GetRelationshipsInput = z.object({
  factId: z.string().min(1).optional(),
  type: z.nativeEnum(RelationshipType).optional(),
});

const RenderGraphInput = z.object({
  maxLabelLength: z.number().int().positive().optional(),
  showLabels: z.boolean().optional(),
});

function parseArgs<T>(
  tool: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: unknown
): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw FactGraphError.validation(`Invalid arguments for ${tool}: ${problems}`);
  }
  return parsed.data;
}

/**
 * Run one tool against the graph and return the text handed back to the client
 */
export async function handleToolCall(
  graph: KnowledgeGraph,
  name: string,
  args: unknown
): Promise<string> {
  let result: unknown;

  switch (name) {
    case 'add_fact': {
      const input = parseArgs(name, AddFactInput, args);
      result = await graph.addFact(input.content, input.id, input.metadata);
      break;
    }

    case 'get_fact': {
      const input = parseArgs(name, FactIdInput, args);
      const fact = await graph.getFact(input.factId);
      result = fact ?? `No fact with id "${input.factId}"`;
      break;
    }

    case 'add_relationship': {
      const input = parseArgs(name, AddRelationshipInput, args);
      result = await graph.addManualRelationship(
        input.sourceId,
        input.targetId,
        input.type,
        input.confidence ?? 1.0,
        input.metadata
      );
      break;
    }

    case 'get_relationships': {
      const input = parseArgs(name, GetRelationshipsInput, args);
      result = await graph.getRelationships(input.factId, input.type);
      break;
    }

    case 'get_supporting_facts': {
      const input = parseArgs(name, FactIdInput, args);
      result = await graph.getSupportingFacts(input.factId);
      break;
    }

    case 'get_contradicting_facts': {
      const input = parseArgs(name, FactIdInput, args);
      result = await graph.getContradictingFacts(input.factId);
      break;
    }

    case 'get_network_stats':
      result = await graph.getNetworkStats();
      break;

    case 'wait_for_processing':
      await graph.waitForProcessing();
      result = { pendingFacts: graph.pendingFacts };
      break;

    case 'render_graph': {
      const input = parseArgs(name, RenderGraphInput, args);
      result = await new NetworkVisualizer(graph).toDot(input);
      break;
    }

    default:
      throw FactGraphError.validation(`Unknown tool: ${name}`);
  }

  return typeof result === 'string' ? result : JSON.stringify(result, null, 2);
}

export function setupTools(server: Server, graph: KnowledgeGraph): void {
  console.error('Setting up fact graph tools');

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const text = await handleToolCall(graph, name, args);
    return {
      content: [
        {
          type: 'text',
          text,
        },
      ],
    };
  });

  console.error('All tools have been registered successfully');
}
