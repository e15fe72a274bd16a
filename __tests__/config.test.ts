import { CommanderError } from 'commander';
import { describe, expect, it } from 'vitest';
import { createProgram, parseCliOverrides } from '../src/cli.js';
import { DEFAULT_API_BASE_URL, loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';

describe('loadConfig', () => {
  it('applies defaults when only the API key is set', () => {
    const config = loadConfig({}, { API_KEY: 'test-secret' });

    expect(config).toEqual({
      apiBaseUrl: DEFAULT_API_BASE_URL,
      apiKey: 'test-secret',
      requestTimeoutMs: 30000,
      logLevel: 'info',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('prefers command-line values over the environment', () => {
    const config = loadConfig(
      { apiKey: 'flag-key', baseUrl: 'http://localhost:8080/', logLevel: 'DEBUG' },
      { API_KEY: 'env-key', SDA_API_BASE_URL: 'https://other.test', SDA_LOG_LEVEL: 'warn' },
    );

    expect(config.apiKey).toBe('flag-key');
    expect(config.apiBaseUrl).toBe('http://localhost:8080');
    expect(config.logLevel).toBe('debug');
  });

  it('requires an API key', () => {
    expect(() => loadConfig({}, {})).toThrow(ConfigError);
    expect(() => loadConfig({ apiKey: '  ' }, {})).toThrow(
      'An archive API key is required. Pass --api-key or set the API_KEY environment variable.',
    );
  });

  it('falls back to the default timeout for out-of-range environment values', () => {
    expect(loadConfig({}, { API_KEY: 'k', SDA_API_TIMEOUT_MS: '50' }).requestTimeoutMs).toBe(30000);
    expect(loadConfig({}, { API_KEY: 'k', SDA_API_TIMEOUT_MS: 'soon' }).requestTimeoutMs).toBe(30000);
    expect(loadConfig({}, { API_KEY: 'k', SDA_API_TIMEOUT_MS: '5000' }).requestTimeoutMs).toBe(5000);
  });

  it('rejects an out-of-range timeout flag', () => {
    expect(() => loadConfig({ apiKey: 'k', timeoutMs: '50' }, {})).toThrow(
      '--timeout-ms must be an integer between 1000 and 120000, got "50".',
    );
  });

  it('rejects unusable base URLs and log levels', () => {
    expect(() => loadConfig({ apiKey: 'k', baseUrl: 'ftp://archive.test' }, {})).toThrow(
      'Archive API base URL must use http or https, got "ftp:".',
    );
    expect(() => loadConfig({ apiKey: 'k', baseUrl: 'not a url' }, {})).toThrow(ConfigError);
    expect(() => loadConfig({ apiKey: 'k', logLevel: 'verbose' }, {})).toThrow(
      'Unknown log level "verbose". Expected one of error, warn, info, debug.',
    );
  });
});

describe('parseCliOverrides', () => {
  it('collects only the flags that were passed', () => {
    expect(
      parseCliOverrides(['node', 'sda-mcp-server', '--api-key', 'test-secret', '--base-url', 'http://localhost:9000']),
    ).toEqual({ apiKey: 'test-secret', baseUrl: 'http://localhost:9000' });
  });

  it('rejects unknown flags', () => {
    const program = createProgram()
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    expect(() => parseCliOverrides(['node', 'sda-mcp-server', '--apikey', 'x'], program)).toThrow(CommanderError);
  });
});

describe('createLogger', () => {
  it('writes JSON lines at or above the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (line) => lines.push(line));

    logger.info('ignored');
    logger.debug('ignored');
    logger.warn('slow archive', { durationMs: 1200 });
    logger.error('archive down');

    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 'warn', msg: 'slow archive', durationMs: 1200 });
    expect(JSON.parse(lines[1] ?? '{}')).toMatchObject({ level: 'error', msg: 'archive down' });
  });

  it('redacts secret-looking fields', () => {
    const lines: string[] = [];
    const logger = createLogger('debug', (line) => lines.push(line));

    logger.info('config', { apiKey: 'test-secret', 'x-api-key': 'test-secret', apiBaseUrl: 'https://archive.test' });

    const entry = JSON.parse(lines[0] ?? '{}');
    expect(entry.apiKey).toBe('[redacted]');
    expect(entry['x-api-key']).toBe('[redacted]');
    expect(entry.apiBaseUrl).toBe('https://archive.test');
  });
});
