import chalk from 'chalk';

import { logLevelRank, resolveLogLevel, type LogLevel } from '../config/env-config.js';

export interface ModuleLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type Emit = (line: string) => void;

const paint: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: (text) => chalk.gray(text),
  info: (text) => chalk.cyan(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text)
};

/**
 * Tagged console logger. The level is re-read on every call so tests and the
 * CLI can flip DIALECT_RELAY_LOG_LEVEL without rebuilding loggers.
 */
export function createModuleLogger(tag: string, emit?: Emit): ModuleLogger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (logLevelRank(level) < logLevelRank(resolveLogLevel())) {
      return;
    }
    const line = `${paint[level](`[${tag}]`)} ${message}`;
    if (emit) {
      emit(line);
      return;
    }
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };
  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message)
  };
}
