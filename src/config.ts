import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export const DEFAULT_API_BASE_URL = 'https://api.sudandigitalarchive.com/sda-api';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const MIN_REQUEST_TIMEOUT_MS = 1000;
export const MAX_REQUEST_TIMEOUT_MS = 120000;

/**
 * Process-wide settings, resolved once at startup and frozen.
 */
export interface AppConfig {
  readonly apiBaseUrl: string;
  readonly apiKey: string;
  readonly requestTimeoutMs: number;
  readonly logLevel: LogLevel;
}

/** Values given on the command line; they win over environment variables. */
export interface ConfigOverrides {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: string;
  logLevel?: string;
}

type Env = Record<string, string | undefined>;

function readNumberEnv(env: Env, name: string, fallback: number, min: number, max?: number): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) {
    return fallback;
  }

  if (value < min) {
    return fallback;
  }

  if (max !== undefined && value > max) {
    return fallback;
  }

  return value;
}

function parseTimeoutFlag(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < MIN_REQUEST_TIMEOUT_MS || value > MAX_REQUEST_TIMEOUT_MS) {
    throw new ConfigError(
      `--timeout-ms must be an integer between ${MIN_REQUEST_TIMEOUT_MS} and ${MAX_REQUEST_TIMEOUT_MS}, got "${raw}".`,
    );
  }
  return value;
}

export function normalizeBaseUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`Invalid archive API base URL "${raw}".`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`Archive API base URL must use http or https, got "${url.protocol}".`);
  }

  if (url.search || url.hash) {
    throw new ConfigError('Archive API base URL must not contain a query string or fragment.');
  }

  return url.toString().replace(/\/+$/, '');
}

function resolveLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (!value) {
    return 'info';
  }
  if (!isLogLevel(value)) {
    throw new ConfigError(`Unknown log level "${raw}". Expected one of error, warn, info, debug.`);
  }
  return value;
}

export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): AppConfig {
  const apiKey = overrides.apiKey?.trim() || env.API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError('An archive API key is required. Pass --api-key or set the API_KEY environment variable.');
  }

  const apiBaseUrl = normalizeBaseUrl(
    overrides.baseUrl?.trim() || env.SDA_API_BASE_URL?.trim() || DEFAULT_API_BASE_URL,
  );

  const requestTimeoutMs =
    overrides.timeoutMs !== undefined
      ? parseTimeoutFlag(overrides.timeoutMs)
      : readNumberEnv(
          env,
          'SDA_API_TIMEOUT_MS',
          DEFAULT_REQUEST_TIMEOUT_MS,
          MIN_REQUEST_TIMEOUT_MS,
          MAX_REQUEST_TIMEOUT_MS,
        );

  return Object.freeze({
    apiBaseUrl,
    apiKey,
    requestTimeoutMs,
    logLevel: resolveLogLevel(overrides.logLevel ?? env.SDA_LOG_LEVEL),
  });
}
