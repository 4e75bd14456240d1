/**
 * Structured logger injected into every component.
 *
 * Entries are single-line JSON objects so they can be shipped to any log
 * aggregator. There is no process-wide logger: callers construct one and
 * pass it in, or get `silentLogger` by default.
 */

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  /** Logger that merges `context` into every entry */
  child(context: LogContext): Logger;
}

export interface LogEntry {
  level: LogLevel;
  timestamp: string;
  service: string;
  message: string;
  context?: LogContext;
}

export interface ConsoleLoggerOptions {
  /** Most verbose level that is written. Default: "info" */
  level?: LogLevel;
  /** Value of the `service` field on every entry. Default: "orcabase-client" */
  serviceName?: string;
  /** Line sink. Default: console.error (stderr) */
  write?: (line: string) => void;
  /** Clock, for deterministic timestamps */
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Redaction
// ---------------------------------------------------------------------------

const REDACTED_KEYS = new Set(['password', 'token', 'apikey', 'authorization']);

export const REDACTED = '[REDACTED]';

/**
 * Copy `value`, replacing secrets under well-known keys at any depth.
 */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redact(item));
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  return redactRecord(value);
}

function redactRecord(record: object): LogContext {
  const out: LogContext = {};
  for (const [key, inner] of Object.entries(record)) {
    out[key] = REDACTED_KEYS.has(key.toLowerCase()) ? REDACTED : redact(inner);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Implementations
// ---------------------------------------------------------------------------

function levelPriority(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

function serializeError(err: Error): LogContext {
  return { name: err.name, message: err.message };
}

function normalizeContext(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = value instanceof Error ? serializeError(value) : value;
  }
  return out;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly threshold: number,
    private readonly serviceName: string,
    private readonly write: (line: string) => void,
    private readonly now: () => Date,
    private readonly bound: LogContext,
  ) {}

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger(this.threshold, this.serviceName, this.write, this.now, {
      ...this.bound,
      ...context,
    });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (levelPriority(level) > this.threshold) return;

    const merged = { ...this.bound, ...context };
    const entry: LogEntry = {
      level,
      timestamp: this.now().toISOString(),
      service: this.serviceName,
      message,
    };
    if (Object.keys(merged).length > 0) {
      entry.context = redactRecord(normalizeContext(merged));
    }
    this.write(JSON.stringify(entry));
  }
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return new ConsoleLogger(
    levelPriority(options.level ?? 'info'),
    options.serviceName ?? 'orcabase-client',
    options.write ?? ((line) => console.error(line)),
    options.now ?? (() => new Date()),
    {},
  );
}

export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
  child: () => silentLogger,
};
