import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { GetPromptRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { loadConfig, createStorage, createDetector } from '../config/index.js';
import { KnowledgeGraph } from '../knowledge-graph/index.js';
import { setupTools } from './tools.js';
import { SYSTEM_PROMPT, TOOL_PROMPTS } from './prompts.js';

export async function main() {
  console.error('Starting factweave server...');

  const config = loadConfig();
  const storage = await createStorage(config.storage);
  console.error(`Using ${config.storage.kind} storage`);

  const detector = createDetector(config.detector);
  console.error(
    detector
      ? `Relationship detection enabled (${config.detector.kind})`
      : 'Relationship detection disabled'
  );

  const graph = new KnowledgeGraph(storage, detector, {
    detectionTimeoutMs: config.detectionTimeoutMs,
    closeTimeoutMs: config.closeTimeoutMs,
  });

  const server = new Server(
    { name: 'factweave', version: '0.1.0' },
    { capabilities: { tools: {}, prompts: {} } }
  );

  setupTools(server, graph);

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const promptName = request.params.name || 'system';
    const promptContent = TOOL_PROMPTS[promptName] || SYSTEM_PROMPT;
    return {
      messages: [
        { role: 'assistant', content: { type: 'text', text: promptContent } },
      ],
    };
  });

  const shutdown = (signal: string) => {
    console.error(`Received ${signal}, shutting down...`);
    graph
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  console.error('Starting server...');
  await server.connect(transport);
  console.error('Server started!');
}

main().catch((error) => {
  console.error('Error in main:', error);
  process.exit(1);
});
