export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFields = Record<string, unknown>;

export interface Logger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
}

const SecretFieldPattern = /^(?:api[-_]?key|x-api-key|authorization|token|secret|password)$/i;
const REDACTED = '[redacted]';

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function redactFields(fields: LogFields): LogFields {
  const redacted: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    redacted[key] = SecretFieldPattern.test(key) ? REDACTED : value;
  }
  return redacted;
}

function renderLine(level: LogLevel, message: string, fields: LogFields | undefined): string {
  const entry = {
    time: new Date().toISOString(),
    level,
    msg: message,
    ...(fields ? redactFields(fields) : {}),
  };

  try {
    return JSON.stringify(entry);
  } catch {
    return JSON.stringify({ time: entry.time, level, msg: message });
  }
}

/**
 * Creates a leveled logger that writes one JSON object per line.
 *
 * The default sink is stderr: stdout belongs to the MCP stdio transport and must
 * only ever carry protocol frames.
 */
export function createLogger(
  level: LogLevel,
  sink: (line: string) => void = (line) => console.error(line),
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit = (entryLevel: LogLevel) => (message: string, fields?: LogFields) => {
    if (LOG_LEVELS.indexOf(entryLevel) > threshold) {
      return;
    }
    sink(renderLine(entryLevel, message, fields));
  };

  return {
    error: emit('error'),
    warn: emit('warn'),
    info: emit('info'),
    debug: emit('debug'),
  };
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};
