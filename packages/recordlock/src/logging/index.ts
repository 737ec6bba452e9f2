/**
 * recordlock Structured Logging Module
 *
 * Structured logging with trace IDs, log levels, JSON output, async
 * context propagation and configurable sinks.
 *
 * @packageDocumentation
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Log levels supported by the structured logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/**
 * Get log level from the LOG_LEVEL environment variable (default info)
 */
export function getLogLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Trace ID for correlating the entries of one unit of work */
  traceId: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: string;
    message: string;
    stack?: string;
  };
}

/**
 * Custom log sink interface
 */
export interface LogSink {
  write(entry: LogEntry): void;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output (default: LOG_LEVEL or info) */
  level?: LogLevel;
  /** Log sink (default: ConsoleSink) */
  sink?: LogSink;
  /** Fallback sink when the primary sink throws */
  fallbackSink?: LogSink;
  /** Whether to include stack traces (default true) */
  includeStackTraces?: boolean;
  /** Context merged into every entry */
  defaultContext?: Record<string, unknown>;
  /** Initial trace ID */
  traceId?: string;
}

/**
 * Structured logger interface
 */
export interface StructuredLogger {
  debug(message: string | (() => string), context?: Record<string, unknown>): void;
  info(message: string | (() => string), context?: Record<string, unknown>): void;
  warn(message: string | (() => string), context?: Record<string, unknown>): void;
  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): StructuredLogger;

  /** Trace ID of the surrounding trace context, else the logger's own */
  getTraceId(): string;
}

// =============================================================================
// Trace Context Propagation
// =============================================================================

interface TraceContextData {
  traceId: string;
}

/**
 * AsyncLocalStorage for trace context propagation
 */
export const LoggerAsyncStorage = new AsyncLocalStorage<TraceContextData>();

/**
 * Run a function with a specific trace context
 */
export async function withTraceContext<T>(
  traceId: string,
  fn: () => T | Promise<T>
): Promise<T> {
  return LoggerAsyncStorage.run({ traceId }, fn);
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Safely copy objects with circular reference handling
 */
function safeCopy(obj: unknown, seen = new WeakSet<object>()): unknown {
  if (obj === null || typeof obj !== 'object') {
    return typeof obj === 'bigint' ? obj.toString() : obj;
  }

  if (seen.has(obj)) {
    return '[Circular]';
  }
  seen.add(obj);

  if (Array.isArray(obj)) {
    return obj.map((item) => safeCopy(item, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = safeCopy(value, seen);
  }
  return result;
}

function copyContext(context: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>([context]);
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = safeCopy(value, seen);
  }
  return result;
}

/**
 * Format message with placeholder substitution. Template syntax: {fieldName}
 */
function formatMessage(template: string, context?: Record<string, unknown>): string {
  if (!context) return template;

  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => {
    if (key in context) {
      return String(context[key]);
    }
    return match;
  });
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// =============================================================================
// Logger Implementation
// =============================================================================

class Logger implements StructuredLogger {
  private level: LogLevel;
  private sink: LogSink;
  private fallbackSink?: LogSink;
  private defaultContext: Record<string, unknown>;
  private includeStackTraces: boolean;
  private traceId: string;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getLogLevelFromEnv();
    this.sink = config.sink ?? new ConsoleSink();
    this.fallbackSink = config.fallbackSink;
    this.defaultContext = config.defaultContext ?? {};
    this.includeStackTraces = config.includeStackTraces ?? true;
    this.traceId = config.traceId ?? randomUUID();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  private activeTraceId(): string {
    return LoggerAsyncStorage.getStore()?.traceId ?? this.traceId;
  }

  private log(
    level: LogLevel,
    messageOrFn: string | (() => string),
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const rawMessage = typeof messageOrFn === 'function' ? messageOrFn() : messageOrFn;

    const mergedContext = context
      ? { ...this.defaultContext, ...context }
      : this.defaultContext;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: formatMessage(rawMessage, mergedContext),
      traceId: this.activeTraceId(),
    };

    if (Object.keys(mergedContext).length > 0) {
      entry.context = copyContext(mergedContext);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
      };
      const code = errorCode(error);
      if (code) {
        entry.error.code = code;
      }
      if (this.includeStackTraces && error.stack) {
        entry.error.stack = error.stack;
      }
    }

    try {
      this.sink.write(entry);
    } catch (sinkError) {
      if (this.fallbackSink) {
        this.fallbackSink.write(entry);
      } else {
        process.stderr.write(`log sink failed: ${String(sinkError)}\n`);
      }
    }
  }

  debug(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      fallbackSink: this.fallbackSink,
      defaultContext: { ...this.defaultContext, ...context },
      includeStackTraces: this.includeStackTraces,
      traceId: this.traceId,
    });
  }

  getTraceId(): string {
    return this.activeTraceId();
  }
}

/**
 * Create a new structured logger
 */
export function createLogger(config?: LoggerConfig): StructuredLogger {
  return new Logger(config);
}

// =============================================================================
// Built-in Sinks
// =============================================================================

/**
 * Console sink: one JSON line per entry on stdout
 */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    console.log(JSON.stringify(entry));
  }
}

/**
 * JSON sink handing serialized entries to a write function
 */
export class JsonSink implements LogSink {
  private writeFn: (json: string) => void;

  constructor(options: { write: (json: string) => void }) {
    this.writeFn = options.write;
  }

  write(entry: LogEntry): void {
    this.writeFn(JSON.stringify(entry));
  }
}

/**
 * Sink that discards everything
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {
    // discard
  }
}

/**
 * Sink that keeps entries in memory, mostly for tests
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  /** Entries at the given level */
  atLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
