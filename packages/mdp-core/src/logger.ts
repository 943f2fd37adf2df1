/**
 * Console logger
 *
 * Writes `[level] message {meta}` lines to a stream (stderr by default),
 * dropping anything below the configured level.
 */

import type { ILogger, LogLevel, LogMeta } from '@bellman/mdp-contracts';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogSink {
  write(chunk: string): unknown;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  stream?: LogSink;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ILogger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const stream = options.stream ?? process.stderr;

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void => {
    if (LEVEL_RANK[level] < threshold) {return;}
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    stream.write(`[${level}] ${message}${suffix}\n`);
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, error, meta) =>
      write('error', error ? `${message}: ${error.message}` : message, meta),
  };
}
