/**
 * Quire — Logger
 *
 * Structured logging for fetch cycles.
 * JSON lines in production, a compact human-readable line otherwise.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function levelFromEnv(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

let currentLevelNum = LOG_LEVELS[levelFromEnv()];

/**
 * Override the threshold read from LOG_LEVEL (used by `--quiet`).
 */
export function setLogLevel(level: LogLevel): void {
  currentLevelNum = LOG_LEVELS[level];
}

export function getLogLevel(): LogLevel {
  const levels: LogLevel[] = ['debug', 'info', 'warn', 'error'];
  return levels.find(level => LOG_LEVELS[level] === currentLevelNum) ?? 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevelNum;
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const formatted = formatEntry({
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  });

  // stdout is reserved for command output
  process.stderr.write(`${formatted}\n`);
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(defaultContext: LogContext): Logger;
}

function createLogger(defaultContext?: LogContext): Logger {
  const merge = (context?: LogContext): LogContext | undefined =>
    defaultContext ? { ...defaultContext, ...context } : context;

  return {
    debug: (message, context) => log('debug', message, merge(context)),
    info: (message, context) => log('info', message, merge(context)),
    warn: (message, context) => log('warn', message, merge(context)),
    error: (message, context) => log('error', message, merge(context)),
    child: (context) => createLogger({ ...defaultContext, ...context }),
  };
}

export const logger: Logger = createLogger();
