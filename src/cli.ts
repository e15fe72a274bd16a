import { Command } from 'commander';
import type { ConfigOverrides } from './config.js';
import { SERVER_NAME, SERVER_VERSION } from './server.js';

interface CliOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: string;
  logLevel?: string;
}

export function createProgram(): Command {
  return new Command()
    .name(SERVER_NAME)
    .description('Serves the digital archive API as MCP tools over stdio.')
    .version(SERVER_VERSION)
    .option('--api-key <key>', 'archive API key (env: API_KEY)')
    .option('--base-url <url>', 'archive API base URL (env: SDA_API_BASE_URL)')
    .option('--timeout-ms <ms>', 'per-request timeout in milliseconds (env: SDA_API_TIMEOUT_MS)')
    .option('--log-level <level>', 'error | warn | info | debug (env: SDA_LOG_LEVEL)')
    .allowExcessArguments(false);
}

/**
 * Parses command-line flags into config overrides. Commander prints help/version and
 * exits on its own for `--help` and `--version`.
 */
export function parseCliOverrides(argv: readonly string[], program: Command = createProgram()): ConfigOverrides {
  program.parse([...argv]);
  const options = program.opts<CliOptions>();

  const overrides: ConfigOverrides = {};
  if (options.apiKey !== undefined) {
    overrides.apiKey = options.apiKey;
  }
  if (options.baseUrl !== undefined) {
    overrides.baseUrl = options.baseUrl;
  }
  if (options.timeoutMs !== undefined) {
    overrides.timeoutMs = options.timeoutMs;
  }
  if (options.logLevel !== undefined) {
    overrides.logLevel = options.logLevel;
  }
  return overrides;
}
