/**
 * Console logger
 *
 * Prints `[scope] message` lines the same way everywhere in the job,
 * filtered and styled by the `logging` section of the config.
 */
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { LoggingConfig } from './config.js';

type LogLevel = LoggingConfig['level'];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const plain = new Chalk({ level: 0 });

let settings: LoggingConfig = { level: 'info', timestamps: true, colors: true };

export function configureLogger(config: LoggingConfig): void {
  settings = { ...config };
}

function paint(): ChalkInstance {
  return settings.colors ? chalk : plain;
}

function levelTag(level: LogLevel, c: ChalkInstance): string {
  switch (level) {
    case 'debug':
      return c.gray('debug');
    case 'info':
      return c.cyan('info');
    case 'warn':
      return c.yellow('warn');
    case 'error':
      return c.red('error');
  }
}

function emit(scope: string, level: LogLevel, message: string, details: unknown[]): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[settings.level]) return;

  const c = paint();
  const parts = [
    settings.timestamps ? c.dim(new Date().toISOString()) : null,
    levelTag(level, c),
    c.magenta(`[${scope}]`),
    message,
  ].filter((part): part is string => part !== null);
  const line = parts.join(' ');

  if (level === 'error') {
    console.error(line, ...details);
  } else if (level === 'warn') {
    console.warn(line, ...details);
  } else {
    console.log(line, ...details);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, ...details) => emit(scope, 'debug', message, details),
    info: (message, ...details) => emit(scope, 'info', message, details),
    warn: (message, ...details) => emit(scope, 'warn', message, details),
    error: (message, ...details) => emit(scope, 'error', message, details),
  };
}
