#!/usr/bin/env node

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getTools, handleToolCall } from './tools/index.js';
import { getToolMode } from './config.js';
import { runInspectCli } from './cli.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { installStdioHygiene, logInfo } from './utils/logging.js';

export function createServer(): Server {
  const toolMode = getToolMode();
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getTools(toolMode) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return handleToolCall(request.params.name, request.params.arguments ?? {}, toolMode);
  });

  return server;
}

async function main() {
  if (process.argv[2] === 'inspect') {
    runInspectCli(process.argv.slice(3));
    return;
  }

  installStdioHygiene();
  const transport = new StdioServerTransport();
  await createServer().connect(transport);
  logInfo(`Server started (tool mode: ${getToolMode()})`);
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    const modulePath = fileURLToPath(import.meta.url);
    return entryPath === modulePath;
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  main().catch(err => {
    logInfo('Fatal:', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
