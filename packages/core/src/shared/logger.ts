export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/** Receives a formatted tag and the caller's arguments. */
export type LogSink = (level: LogLevel, tag: string, args: unknown[]) => void;

// Progress views own stdout, so every level goes to stderr.
const stderrSink: LogSink = (level, tag, args) => {
  if (level === 'warn') console.warn(tag, ...args);
  else console.error(tag, ...args);
};

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
let sink: LogSink = stderrSink;

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Replaces where log lines go; pass nothing to restore stderr. */
export function setLogSink(next?: LogSink) {
  sink = next ?? stderrSink;
}

export function formatTag(level: LogLevel, prefix: string, now: Date = new Date()): string {
  return `${now.toISOString()} [${level.toUpperCase().padEnd(5)}] [${prefix}]`;
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(prefix: string): Logger {
  const emit = (level: LogLevel) => (...args: unknown[]) => {
    if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;
    sink(level, formatTag(level, prefix), args);
  };
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
