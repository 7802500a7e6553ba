import chalk from 'chalk';
import type { LogLevelName } from '../config/index.js';

const SEVERITY: Record<LogLevelName, number> = {
  silent: 0,
  error: 1,
  info: 2,
  debug: 3,
};

export interface LogSink {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface Logger {
  readonly level: LogLevelName;
  error(message: string): void;
  warn(message: string): void;
  success(message: string): void;
  info(message: string): void;
  detail(message: string): void;
  debug(message: string): void;
}

/**
 * Indented, coloured console output gated by level
 */
export function createLogger(level: LogLevelName, sink: LogSink = console): Logger {
  const enabled = (threshold: LogLevelName) => SEVERITY[level] >= SEVERITY[threshold];

  return {
    level,
    error(message) {
      if (enabled('error')) sink.error(chalk.red(`  ✗ ${message}`));
    },
    warn(message) {
      if (enabled('error')) sink.error(chalk.yellow(`  ${message}`));
    },
    success(message) {
      if (enabled('info')) sink.log(chalk.green(`  ✓ ${message}`));
    },
    info(message) {
      if (enabled('info')) sink.log(`  ${message}`);
    },
    detail(message) {
      if (enabled('info')) sink.log(chalk.gray(`  ${message}`));
    },
    debug(message) {
      if (enabled('debug')) sink.log(chalk.dim(`  [debug] ${message}`));
    },
  };
}
