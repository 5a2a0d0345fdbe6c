#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import {
  FileSourceReader,
  LoggingService,
  configuredLogLevel,
  loadConfig,
  validateConfig,
} from '@manforge/core';
import { handleToolCall } from './handlers.js';
import type { Services } from './handlers.js';
import { tools } from './tools.js';

// Configuration
const config = loadConfig();
const logger = new LoggingService(configuredLogLevel(config));
const configErrors = validateConfig(config);
if (configErrors.length > 0) {
  logger.warn('Configuration errors:', configErrors);
}

const services: Services = {
  config,
  reader: new FileSourceReader(),
  logger,
};

const server = new Server(
  {
    name: 'manforge-mcp-server',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  logger.debug(`Tool call: ${name}`);
  return handleToolCall(name, args ?? {}, services);
});

// Start server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`manforge MCP server running on stdio (workspace: ${config.workspaceRoot})`);
}

main().catch((error) => {
  logger.error('Fatal error', error instanceof Error ? error : undefined);
  process.exit(1);
});
