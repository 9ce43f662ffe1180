/**
 * Structured logging.
 *
 * Every module logs through a child of the root `logger` so entries carry
 * their origin (`service`, `layer`). Output goes to one sink, a JSON line
 * per entry by default, configured once at startup from AppConfig and
 * swapped by tests to capture entries.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/** Settings accepted by configureLogger; AppConfig satisfies this shape. */
export interface LoggerSettings {
  logLevel?: LogLevel;
  handler?: LogHandler;
}

const writeJsonLine: LogHandler = ({ level, timestamp, message, context }) => {
  const line = JSON.stringify({ level, ts: timestamp, msg: message, ...context });
  if (level === LogLevel.Error) console.error(line);
  else if (level === LogLevel.Warn) console.warn(line);
  else console.log(line);
};

const sink = {
  minLevel: LogLevel.Info,
  handler: writeJsonLine,
};

/** Apply the given settings; fields left out keep their current value. */
export function configureLogger(settings: LoggerSettings): void {
  if (settings.logLevel) sink.minLevel = settings.logLevel;
  if (settings.handler) sink.handler = settings.handler;
}

/** Back to info level and JSON lines on the console. */
export function resetLogger(): void {
  sink.minLevel = LogLevel.Info;
  sink.handler = writeJsonLine;
}

/** Map a LOG_LEVEL value (case-insensitive) to a LogLevel. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

/** Context fields describing a thrown value. */
export function errorContext(err: unknown): LogContext {
  if (err instanceof Error) return { message: err.message, stack: err.stack };
  return { message: String(err) };
}

function emit(level: LogLevel, message: string, context: LogContext): void {
  if (SEVERITY[level] < SEVERITY[sink.minLevel]) return;
  sink.handler({ level, message, context, timestamp: new Date().toISOString() });
}

export function createLogger(base: LogContext = {}): Logger {
  const at = (level: LogLevel) => (message: string, context?: LogContext) =>
    emit(level, message, { ...base, ...context });
  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (context) => createLogger({ ...base, ...context }),
  };
}

export const logger = createLogger({ component: 'account-desk' });
