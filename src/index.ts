#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { parseCliOverrides } from './cli.js';
import { loadConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { createArchiveMcpServer } from './server.js';

async function runStdio(server: McpServer, logger: Logger): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('sda-mcp-server running on stdio');
}

async function main(): Promise<void> {
  const config = loadConfig(parseCliOverrides(process.argv));
  const logger = createLogger(config.logLevel);
  logger.info('starting sda-mcp-server', { apiBaseUrl: config.apiBaseUrl, requestTimeoutMs: config.requestTimeoutMs });

  const server = createArchiveMcpServer(config, { logger });
  await runStdio(server, logger);
}

main().catch((error) => {
  console.error('Fatal server error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
