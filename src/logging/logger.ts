/**
 * Structured Logger
 *
 * JSON-structured logging with level filtering, context enrichment and
 * child loggers. Every alerting component takes a {@link Logger} so the
 * host process decides where entries go.
 *
 * @module logging/logger
 */

import { randomUUID } from 'node:crypto';

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  service?: string;
  /** Subsystem emitting the entry, e.g. "alert-manager". */
  component?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  component?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

// ─── Log Level Ordering ──────────────────────────────────────────────────────

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * Output sink for log entries. Defaults to stdout JSON.
 */
export type LogOutput = (entry: LogEntry) => void;

const defaultLogOutput: LogOutput = (entry: LogEntry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

/** Output that keeps entries in memory; handy for tests and diagnostics. */
export function createMemoryLogOutput(): { output: LogOutput; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    output: (entry) => {
      entries.push(entry);
    },
  };
}

// ─── Logger Options ──────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Service name included in every entry. Defaults to 'alert-relay'. */
  service?: string;
  /** Minimum level to emit. Defaults to 'info'. */
  level?: LogLevel;
  context?: LogContext;
  output?: LogOutput;
  /**
   * Fraction of debug entries to emit (0.0–1.0). Defaults to 1.
   * Levels above debug are never sampled.
   */
  debugSampleRate?: number;
  /** Random source in [0, 1) for sampling decisions. */
  randomFn?: () => number;
}

// ─── Implementation ──────────────────────────────────────────────────────────

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? 'alert-relay';
  const minLevel = options.level ?? 'info';
  const baseContext: LogContext = {
    ...options.context,
  };
  if (!baseContext.correlationId) {
    baseContext.correlationId = randomUUID();
  }
  if (!baseContext.service) {
    baseContext.service = service;
  }
  const output = options.output ?? defaultLogOutput;

  const debugSampleRate = Math.max(0, Math.min(1, options.debugSampleRate ?? 1));
  const randomFn = options.randomFn ?? Math.random;

  function shouldLog(level: LogLevel): boolean {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return false;
    if (level === 'debug' && debugSampleRate < 1) {
      if (debugSampleRate <= 0) return false;
      return randomFn() < debugSampleRate;
    }
    return true;
  }

  function buildEntry(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata?: LogMetadata,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: baseContext.service ?? service,
      correlationId: baseContext.correlationId ?? '',
    };

    if (baseContext.component) entry.component = baseContext.component;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: error.stack,
      };
    }

    return entry;
  }

  function log(level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (!shouldLog(level)) return;
    output(buildEntry(level, message, error, metadata));
  }

  return {
    debug(message: string, metadata?: LogMetadata): void {
      log('debug', message, undefined, metadata);
    },
    info(message: string, metadata?: LogMetadata): void {
      log('info', message, undefined, metadata);
    },
    warn(message: string, metadata?: LogMetadata): void {
      log('warn', message, undefined, metadata);
    },
    error(message: string, error?: Error, metadata?: LogMetadata): void {
      log('error', message, error, metadata);
    },
    fatal(message: string, error?: Error, metadata?: LogMetadata): void {
      log('fatal', message, error, metadata);
    },
    child(context: LogContext): Logger {
      return createLogger({
        service,
        level: minLevel,
        context: { ...baseContext, ...context },
        output,
        debugSampleRate,
        randomFn,
      });
    },
  };
}
