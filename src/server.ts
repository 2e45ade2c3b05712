import process from 'node:process';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { config } from './config.js';
import { destroyAgents } from './fetch.js';
import { logError, logInfo, setMcpServer } from './observability.js';
import { createToolServices, registerTools, type ToolServices } from './tools.js';

export function createMcpServer(
  services: ToolServices = createToolServices()
): McpServer {
  const server = new McpServer(
    {
      name: config.server.name,
      version: config.server.version,
    },
    {
      capabilities: {
        tools: { listChanged: false },
        logging: {},
      },
      instructions: `pageExtract MCP server v${config.server.version}. Fetches URLs and returns readable text: main-content Markdown for HTML pages, extracted text for PDFs, decoded text otherwise. Binary content is refused with a structured error.`,
    }
  );

  registerTools(server, services);

  return server;
}

async function shutdown(server: McpServer, signal: string): Promise<void> {
  logInfo('Shutting down pageExtract MCP server', { signal });
  setMcpServer(undefined);
  try {
    await server.close();
    await destroyAgents();
  } catch (error: unknown) {
    logError(
      'Error during shutdown',
      error instanceof Error ? error : { error: String(error) }
    );
  }
}

export async function startStdioServer(): Promise<void> {
  const server = createMcpServer();
  const transport = new StdioServerTransport();

  server.server.onerror = (error) => {
    logError('[MCP Error]', error);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(server, signal).finally(() => {
        process.exit(0);
      });
    });
  }

  await server.connect(transport);
  setMcpServer(server);
  logInfo('pageExtract MCP server running on stdio');
}
