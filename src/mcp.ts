#!/usr/bin/env node
/**
 * mcp.ts — MCP server entry point using StdioServerTransport.
 *
 *   MARVEL_PUBLIC_KEY=... MARVEL_PRIVATE_KEY=... npx tsx src/mcp.ts
 *
 * Configuration comes from the environment (or a .env file); see config.ts.
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { MarvelClient } from './client/MarvelClient.js';
import { loadConfig } from './config.js';
import { getLogger } from './logger.js';
import { createTools } from './tools/tools.js';

const logger = getLogger('mcp');

async function main() {
  const client = new MarvelClient(loadConfig());
  const server = createTools(client);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info({ baseUrl: client.baseUrl, maxRetries: client.maxRetries }, 'Marvel catalog MCP server running on stdio');

  // stdin keeps the process alive until SIGINT
  process.on('SIGINT', () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Failed to close MCP server');
        process.exit(1);
      },
    );
  });
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'MCP server failed to start');
  process.exit(1);
});
