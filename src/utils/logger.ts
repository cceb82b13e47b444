/**
 * Console logger with a level gate
 * LOG_LEVEL selects the lowest level written; tests run with "silent"
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

const defaultLevel = (): LogLevel => {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
};

let currentLevel: LogLevel = defaultLevel();

export const setLogLevel = (level: LogLevel) => {
  currentLevel = level;
};

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

export const logDebug = (message: string, data?: unknown) => {
  if (!enabled('debug')) return;
  if (data === undefined) console.debug(message);
  else console.debug(message, data);
};

export const logInfo = (message: string, data?: unknown) => {
  if (!enabled('info')) return;
  if (data === undefined) console.log(message);
  else console.log(message, data);
};

export const logWarn = (message: string, data?: unknown) => {
  if (!enabled('warn')) return;
  if (data === undefined) console.warn(message);
  else console.warn(message, data);
};

export const logError = (message: string, data?: unknown) => {
  if (!enabled('error')) return;
  if (data === undefined) console.error(message);
  else console.error(message, data);
};
