#!/usr/bin/env node

import 'dotenv/config';

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { type Runtime, createRuntime } from './runtime.js';
import { SERVER_NAME, SERVER_VERSION } from './tools/about.js';
import { TOOLS, callTool } from './tools/shared-tools.js';

let runtimeInstance: Runtime | null = null;

function getRuntime(): Runtime {
  if (!runtimeInstance) {
    const config = loadConfig();
    runtimeInstance = createRuntime(config, createLogger(config.logLevel));
  }
  return runtimeInstance;
}

function closeRuntime(): void {
  if (!runtimeInstance) {
    return;
  }
  runtimeInstance.close();
  runtimeInstance = null;
}

const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    const result = await callTool(getRuntime(), name, args ?? {});
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result, null, 2),
        },
      ],
    };
  } catch (error) {
    return {
      content: [
        {
          type: 'text',
          text: `Error executing ${name}: ${errorMessage(error)}`,
        },
      ],
      isError: true,
    };
  }
});

async function main(): Promise<void> {
  const transport = new StdioServerTransport();

  process.on('SIGINT', () => {
    closeRuntime();
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    closeRuntime();
    process.exit(0);
  });

  await server.connect(transport);
}

main().catch((error) => {
  console.error(`[${SERVER_NAME}] Fatal error:`, error);
  closeRuntime();
  process.exit(1);
});
