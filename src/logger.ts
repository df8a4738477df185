/**
 * Logger interfaces and implementations
 *
 * All output goes to stderr: stdout carries the MCP stdio transport.
 * Context values under credential-like keys (the Authorization header,
 * API keys) are replaced with `[REDACTED]` before anything is written.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  SILENT: LogLevel.SILENT,
};

const SENSITIVE_KEYS = new Set([
  'authorization',
  'apikey',
  'api_key',
  'x-api-key',
]);

export const REDACTED = '[REDACTED]';

/**
 * Parse a level name such as `debug` or `WARN`; unknown names fall back
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  return LEVEL_NAMES[value.trim().toUpperCase()] ?? fallback;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * Copy of `data` with credential-like keys masked, at any depth
 */
export function redactSensitive(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      redacted[key] = REDACTED;
    } else if (isPlainObject(value)) {
      redacted[key] = redactSensitive(value);
    } else if (Array.isArray(value)) {
      redacted[key] = value.map(item => (isPlainObject(item) ? redactSensitive(item) : item));
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

abstract class LevelLogger implements Logger {
  protected level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? parseLogLevel(process.env.LOG_LEVEL);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error
        ? { error: error.message, stack: error.stack, ...context }
        : context;
      this.write('error', message, errorContext);
    }
  }

  protected abstract write(level: string, message: string, context?: Record<string, unknown>): void;
}

/**
 * Human-readable logger, the default
 */
export class ConsoleLogger extends LevelLogger {
  protected write(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const ctx = context ? ` ${JSON.stringify(redactSensitive(context))}` : '';
    console.error(`[${timestamp}] ${level.toUpperCase()}: ${message}${ctx}`);
  }
}

/**
 * One JSON object per line, for log aggregation
 */
export class JsonLogger extends LevelLogger {
  protected write(level: string, message: string, context?: Record<string, unknown>): void {
    const log = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context ? redactSensitive(context) : {}),
    };
    console.error(JSON.stringify(log));
  }
}

/**
 * Logger selected by `LOG_FORMAT` (`json` or anything else for console)
 */
export function createLogger(format: string | undefined = process.env.LOG_FORMAT, level?: LogLevel): Logger {
  return format?.trim().toLowerCase() === 'json' ? new JsonLogger(level) : new ConsoleLogger(level);
}
