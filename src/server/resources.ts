import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppConfig } from '../config.js';
import { stringify } from './tool-runtime.js';

export function registerResources(server: McpServer, config: AppConfig): void {
  server.registerResource(
    'sda_server_defaults',
    'sda://server/defaults',
    {
      title: 'Archive MCP Defaults',
      description: 'Runtime defaults for archive API access. The API key is never exposed.',
      mimeType: 'application/json',
    },
    async () => {
      const payload = {
        apiBaseUrl: config.apiBaseUrl,
        requestTimeoutMs: config.requestTimeoutMs,
        logLevel: config.logLevel,
      };

      return {
        contents: [
          {
            uri: 'sda://server/defaults',
            mimeType: 'application/json',
            text: stringify(payload),
          },
        ],
      };
    },
  );

  server.registerResource(
    'sda_agent_quickstart',
    'sda://agent/quickstart',
    {
      title: 'Archive MCP Agent Quickstart',
      description: 'Recommended call order and argument conventions for the archive tools.',
      mimeType: 'text/markdown',
    },
    async () => {
      const quickstart = [
        '# Archive MCP Agent Quickstart',
        '',
        '1. Resolve subject IDs with `list_subjects`.',
        '2. Find accessions with `list_accessions` (or `list_private_accessions`) using subject, text, URL and date filters.',
        '3. Fetch one record with `get_accession` / `get_private_accession` to obtain its WACZ download URL.',
        '4. Change metadata with `update_accession`, setting only the fields that should change.',
        '5. Manage tags with `create_subject` and `delete_subject`; confirm with the user before deleting.',
        '',
        'Argument conventions:',
        '- All arguments are required. Use -1, "" or [] to leave a value unspecified.',
        '- Unspecified values are omitted from the archive request, never sent as placeholders.',
        '- Private records are only reachable through the `*_private_*` tools.',
      ].join('\n');

      return {
        contents: [
          {
            uri: 'sda://agent/quickstart',
            mimeType: 'text/markdown',
            text: quickstart,
          },
        ],
      };
    },
  );
}
