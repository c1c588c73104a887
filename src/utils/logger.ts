export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

const fromEnv = process.env.YOLO_LOG_LEVEL;
let currentLevel: LogLevel = fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

const shouldLog = (level: LogLevel) => LEVELS.indexOf(level) >= LEVELS.indexOf(currentLevel);

export const logger = {
  debug: (...args: unknown[]) => {
    if (shouldLog('debug')) console.debug('[yolo-decode]', ...args);
  },
  info: (...args: unknown[]) => {
    if (shouldLog('info')) console.info('[yolo-decode]', ...args);
  },
  warn: (...args: unknown[]) => {
    if (shouldLog('warn')) console.warn('[yolo-decode]', ...args);
  },
  error: (...args: unknown[]) => {
    if (shouldLog('error')) console.error('[yolo-decode]', ...args);
  },
};
