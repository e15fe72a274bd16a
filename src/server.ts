import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ArchiveApiClient, type FetchLike } from './archive-api.js';
import type { AppConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { registerAccessionTools } from './server/register-accession-tools.js';
import { registerSubjectTools } from './server/register-subject-tools.js';
import { registerResources } from './server/resources.js';
import { TOOL_NAMES } from './server/tool-descriptions.js';
import { ToolRegistry } from './server/tool-runtime.js';

export const SERVER_NAME = 'sda-mcp-server';
export const SERVER_VERSION = '0.1.0';

const SERVER_INSTRUCTIONS =
  'Use these tools to browse and curate the digital archive: list and inspect accessions (archived web ' +
  'captures), update their metadata, and manage the metadata subjects used to classify them. Prefer read ' +
  'tools before write tools and confirm intent before deleting a subject. No argument is optional: ' +
  'pass -1, "" or [] to leave a value unspecified.';

export interface ServerOptions {
  logger?: Logger;
  fetch?: FetchLike;
}

/** Builds the full tool catalogue and checks it against {@link TOOL_NAMES}. */
export function createToolRegistry(api: ArchiveApiClient, logger?: Logger): ToolRegistry {
  const registry = new ToolRegistry(logger);
  registerAccessionTools(registry, api);
  registerSubjectTools(registry, api);
  registry.assertCatalogue(TOOL_NAMES);
  return registry;
}

export function createArchiveMcpServer(config: AppConfig, options: ServerOptions = {}): McpServer {
  const logger = options.logger ?? createLogger(config.logLevel);
  const api = new ArchiveApiClient(config, options.fetch, logger);

  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      title: 'Digital Archive MCP Server',
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  registerResources(server, config);
  createToolRegistry(api, logger).attach(server);

  return server;
}
