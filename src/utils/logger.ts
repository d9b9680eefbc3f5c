import { isErrorLike } from './error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const envLevel = process.env.UI_AUTOMATOR_LOG_LEVEL;
let activeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

function errorData(error: unknown): Record<string, unknown> {
  if (isErrorLike(error)) {
    return { error: error.message };
  }
  return error === undefined ? {} : { error: String(error) };
}

// Logs go to stderr; stdout stays free for the CLI's own output.
function write(level: Exclude<LogLevel, 'silent'>, scope: string, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[activeLevel]) {
    return;
  }

  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
  console.error(`${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${scope}] ${message}${suffix}`);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => write('debug', scope, message, data),
    info: (message, data) => write('info', scope, message, data),
    warn: (message, data) => write('warn', scope, message, data),
    error: (message, error, data) => write('error', scope, message, { ...errorData(error), ...data }),
    child: childScope => createLogger(`${scope}:${childScope}`),
  };
}
