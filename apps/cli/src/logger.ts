import chalk from 'chalk';
import type { Logger, LogLevel } from '@termmail/shared';

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

export function createLogger(level: LogLevel, sink: LogSink = console): Logger {
  const enabled = (at: LogLevel) => RANK[at] <= RANK[level];
  return {
    debug(message) {
      if (enabled('debug')) sink.log(`${chalk.gray('debug')} ${message}`);
    },
    info(message) {
      if (enabled('info')) sink.log(`${chalk.blue('info')} ${message}`);
    },
    warn(message) {
      if (enabled('warn')) sink.error(`${chalk.yellow('warn')} ${message}`);
    },
    error(message) {
      if (enabled('error')) sink.error(`${chalk.red('error')} ${message}`);
    },
  };
}
