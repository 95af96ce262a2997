/**
 * Logger abstraction.
 *
 * Provides structured, level-based logging with context.
 * Configuration happens once, at startup, through initLogging(); request
 * handlers only ever write entries.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface LoggingOptions {
  level?: LogLevel;
  handler?: LogHandler;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Default log handler writes structured JSON to console. */
const defaultLogHandler: LogHandler = (entry: LogEntry) => {
  const output = {
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  };
  switch (entry.level) {
    case LogLevel.Error:
      console.error(JSON.stringify(output));
      break;
    case LogLevel.Warn:
      console.warn(JSON.stringify(output));
      break;
    default:
      console.log(JSON.stringify(output));
  }
};

let currentHandler: LogHandler = defaultLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;
let initialized = false;

/** Parse a level name, returning undefined for anything unknown. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

/**
 * Configure process-wide logging. Call once, before the server accepts
 * requests. Later calls leave the configuration untouched.
 */
export function initLogging(options: LoggingOptions = {}): void {
  if (initialized) {
    log(LogLevel.Warn, 'Logging already initialized; ignoring reconfiguration', { component: 'logger' });
    return;
  }
  currentHandler = options.handler ?? defaultLogHandler;
  currentMinLevel = options.level ?? LogLevel.Info;
  initialized = true;
}

/** Restore the default handler and level. Intended for test teardown. */
export function resetLogging(): void {
  currentHandler = defaultLogHandler;
  currentMinLevel = LogLevel.Info;
  initialized = false;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentMinLevel];
}

function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  });
}

/** Create a child logger with persistent context fields. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Root logger instance. */
export const logger = createLogger({ component: 'report-viewer' });
