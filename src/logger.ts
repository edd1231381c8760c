/**
 * Logger abstraction.
 *
 * Structured, level-based logging with context. Consumers can replace
 * the default JSON handler by calling setLogHandler().
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

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case LogLevel.Error:
      console.error(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

/** Default log handler writes structured JSON to console. */
export const jsonLogHandler: LogHandler = (entry: LogEntry) => {
  const output = {
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  };
  writeToConsole(entry.level, JSON.stringify(output));
};

/** Render a context value for the text format. */
function formatValue(value: unknown): string {
  if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value;
  return JSON.stringify(value) ?? String(value);
}

/**
 * Format an entry as `HH:MM:SS  LEVEL     message key=value ...`.
 * The `component` field is omitted; it is the same on every line.
 */
export function formatTextEntry(entry: LogEntry): string {
  const time = entry.timestamp.slice(11, 19);
  const fields = Object.entries(entry.context ?? {})
    .filter(([key, value]) => key !== 'component' && value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  const head = `${time}  ${entry.level.toUpperCase().padEnd(8)}  ${entry.message}`;
  return fields.length > 0 ? `${head}  ${fields.join(' ')}` : head;
}

/** Human-readable handler used by the CLI. */
export const textLogHandler: LogHandler = (entry: LogEntry) => {
  writeToConsole(entry.level, formatTextEntry(entry));
};

let currentHandler: LogHandler = jsonLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the active log handler (e.g., for testing or the CLI text format). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
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
export const logger = createLogger({ component: 'linkpage-pdf-flow' });
