export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 };

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(order, value);

function resolveLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'warn' : 'info')).toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

let activeLevel: LogLevel = resolveLevel();

export function setLogLevel(level: LogLevel) {
  activeLevel = level;
}

function shouldLog(level: LogLevel) {
  return order[level] >= order[activeLevel];
}

function stringify(msg: unknown): string {
  if (msg instanceof Error) return msg.stack || msg.message;
  if (typeof msg === 'string') return msg;
  try {
    return JSON.stringify(msg) ?? String(msg);
  } catch {
    return String(msg);
  }
}

export function formatLine(level: LogLevel, msg: unknown, source?: string) {
  const time = new Date().toISOString();
  return `[${time}]${source ? ` [${source}]` : ''} ${level.toUpperCase()}: ${stringify(msg)}`;
}

export const logger = {
  debug: (msg: unknown, source?: string) => {
    if (shouldLog('debug')) console.debug(formatLine('debug', msg, source));
  },
  info: (msg: unknown, source?: string) => {
    if (shouldLog('info')) console.info(formatLine('info', msg, source));
  },
  warn: (msg: unknown, source?: string) => {
    if (shouldLog('warn')) console.warn(formatLine('warn', msg, source));
  },
  error: (msg: unknown, source?: string) => {
    if (shouldLog('error')) console.error(formatLine('error', msg, source));
  }
};
