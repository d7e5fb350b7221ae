/**
 * @module @corrective-rag/core/logging
 * Category logger used by every workflow node and adapter
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(prefix: string): Logger;
}

export type LogSink = (line: string) => void;

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  colors?: boolean;
  sink?: LogSink;
}

const MAX_STRING_LENGTH = 1000;
const MAX_ARRAY_LENGTH = 50;

/**
 * Console-based logger implementation
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly timestamps: boolean;
  private readonly colors: boolean;
  private readonly sink: LogSink;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.prefix = options.prefix ?? '';
    this.timestamps = options.timestamps ?? true;
    this.colors = options.colors ?? true;
    this.sink = options.sink ?? ((line) => console.log(line));
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.level <= LogLevel.DEBUG) {
      this.log('DEBUG', message, meta, '\x1b[36m');
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.level <= LogLevel.INFO) {
      this.log('INFO', message, meta, '\x1b[32m');
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.level <= LogLevel.WARN) {
      this.log('WARN', message, meta, '\x1b[33m');
    }
  }

  error(message: string, meta?: LogMeta): void {
    if (this.level <= LogLevel.ERROR) {
      this.log('ERROR', message, meta, '\x1b[31m');
    }
  }

  private log(level: string, message: string, meta: LogMeta | undefined, color: string): void {
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(this.colors ? `${color}${level}\x1b[0m` : level);

    if (this.prefix) {
      parts.push(`[${this.prefix}]`);
    }

    parts.push(message);

    if (meta && Object.keys(meta).length > 0) {
      // Compact JSON; passage text and prompts can be large
      parts.push(JSON.stringify(sanitizeMeta(meta)));
    }

    this.sink(parts.join(' '));
  }

  child(prefix: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      timestamps: this.timestamps,
      colors: this.colors,
      sink: this.sink,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * No-op logger for tests and silent mode
 */
export class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): SilentLogger {
    return this;
  }
}

/**
 * Truncate long strings, cap arrays and replace `text`/`content` fields with their length
 */
export function sanitizeMeta(meta: LogMeta): LogMeta {
  const sanitized: LogMeta = {};

  for (const [key, value] of Object.entries(meta)) {
    sanitized[key] = sanitizeValue(key, value);
  }

  return sanitized;
}

function sanitizeValue(key: string, value: unknown): unknown {
  if (value == null) {
    return value;
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (typeof value === 'string') {
    if ((key === 'text' || key === 'content') && value.length > 80) {
      return `[omitted: ${value.length} chars]`;
    }
    return value.length > MAX_STRING_LENGTH
      ? `${value.slice(0, MAX_STRING_LENGTH)}... [${value.length} chars]`
      : value;
  }

  if (Array.isArray(value)) {
    const limited: unknown[] = value.slice(0, MAX_ARRAY_LENGTH).map(item => sanitizeValue('', item));
    if (value.length > MAX_ARRAY_LENGTH) {
      limited.push(`... [${value.length - MAX_ARRAY_LENGTH} more items]`);
    }
    return limited;
  }

  if (typeof value === 'object') {
    return sanitizeMeta(Object.fromEntries(Object.entries(value)));
  }

  return value;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Create a logger based on environment
 */
export function createLogger(options?: ConsoleLoggerOptions): Logger {
  if (process.env.NODE_ENV === 'test' && options?.sink === undefined) {
    return new SilentLogger();
  }

  return new ConsoleLogger({
    ...options,
    level: options?.level ?? parseLogLevel(process.env.LOG_LEVEL),
  });
}

let rootLogger: Logger | null = null;

function resolveRootLogger(): Logger {
  rootLogger ??= createLogger();
  return rootLogger;
}

/**
 * Replace the root logger (e.g. to route output into a host application).
 * Loggers already handed out by `getLogger` switch over on their next call.
 */
export function setRootLogger(logger: Logger | null): void {
  rootLogger = logger;
}

/**
 * Logger bound to a category; re-derived from the root whenever the root changes
 */
class CategoryLogger implements Logger {
  private bound?: { root: Logger; logger: Logger };

  constructor(private readonly category: string) {}

  debug(message: string, meta?: LogMeta): void {
    this.current().debug(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.current().info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.current().warn(message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.current().error(message, meta);
  }

  child(prefix: string): Logger {
    return new CategoryLogger(`${this.category}:${prefix}`);
  }

  private current(): Logger {
    const root = resolveRootLogger();
    let bound = this.bound;
    if (!bound || bound.root !== root) {
      bound = { root, logger: root.child(this.category) };
      this.bound = bound;
    }
    return bound.logger;
  }
}

/**
 * Category logger, e.g. `getLogger('rag:orchestrator:grader')`
 */
export function getLogger(category: string): Logger {
  return new CategoryLogger(category);
}
