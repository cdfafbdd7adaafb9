import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function timestamp(): string {
  return new Date().toISOString().slice(11, 23);
}

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  child(scope: string): Logger;
}

function createLogger(scope?: string): Logger {
  const tag = scope ? `[${scope}] ` : '';
  return {
    debug(msg, ...args) {
      if (shouldLog('debug')) {
        console.error(chalk.gray(`[${timestamp()}] DEBUG ${tag}${msg}`), ...args);
      }
    },

    info(msg, ...args) {
      if (shouldLog('info')) {
        console.error(chalk.blue(`[${timestamp()}] INFO  ${tag}${msg}`), ...args);
      }
    },

    warn(msg, ...args) {
      if (shouldLog('warn')) {
        console.error(chalk.yellow(`[${timestamp()}] WARN  ${tag}${msg}`), ...args);
      }
    },

    error(msg, ...args) {
      if (shouldLog('error')) {
        console.error(chalk.red(`[${timestamp()}] ERROR ${tag}${msg}`), ...args);
      }
    },

    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger: Logger = createLogger();
