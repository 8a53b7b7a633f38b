import chalk from 'chalk';

import type { CliRuntime } from './runtime.js';

export type CliLogger = {
  info: (msg: string) => void;
  success: (msg: string) => void;
  warning: (msg: string) => void;
  error: (msg: string) => void;
  debug: (msg: string) => void;
};

export function createCliLogger(runtime: CliRuntime): CliLogger {
  const out = (symbol: string, msg: string): void => runtime.writeOut(`${symbol} ${msg}\n`);
  return {
    info: (msg: string) => out(chalk.blue('ℹ'), msg),
    success: (msg: string) => out(chalk.green('✓'), msg),
    warning: (msg: string) => out(chalk.yellow('⚠'), msg),
    error: (msg: string) => runtime.writeErr(`${chalk.red('✗')} ${msg}\n`),
    debug: (msg: string) => out(chalk.gray('◉'), msg)
  };
}
