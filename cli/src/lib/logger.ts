import chalk from 'chalk';
import { isLevelEnabled, type LogLevel, type LogMeta, type Logger } from '@timeweave/core';

/**
 * Where log lines go. `console` satisfies it.
 */
export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

const LEVEL_STYLES = {
  debug: chalk.dim,
  info: (text: string) => text,
  warn: chalk.yellow,
  error: chalk.red,
} satisfies Record<Exclude<LogLevel, 'silent'>, (text: string) => string>;

/**
 * Console logger for the command line. Messages below `level` are dropped;
 * warnings and errors go to stderr.
 */
export function createCliLogger(level: LogLevel, sink: LogSink = globalThis.console): Logger {
  const write = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void => {
    if (!isLevelEnabled(entryLevel, level)) {
      return;
    }
    const line = LEVEL_STYLES[entryLevel](message) + formatMeta(meta);
    if (entryLevel === 'warn' || entryLevel === 'error') {
      sink.error(line);
    } else {
      sink.log(line);
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

export function formatMeta(meta: LogMeta | undefined): string {
  if (!meta) {
    return '';
  }
  const parts = Object.entries(meta)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return parts.length > 0 ? ` ${chalk.dim(parts.join(' '))}` : '';
}
