import { inspect } from 'util';
import type { LoggingConfig, LogFormat, LogLevel } from '../../config/types.js';
import { createRotatingFileWriter, FileLogWriter } from './fileLogger.js';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

type ConsoleMethod = 'debug' | 'info' | 'log' | 'warn' | 'error';

const CONSOLE_METHODS: readonly ConsoleMethod[] = ['debug', 'info', 'log', 'warn', 'error'];

const METHOD_LEVELS: Record<ConsoleMethod, LogLevel> = {
  debug: 'debug',
  info: 'info',
  log: 'info',
  warn: 'warn',
  error: 'error',
};

const orig: Record<ConsoleMethod, (...args: unknown[]) => void> = {
  debug: console.debug,
  info: console.info,
  log: console.log,
  warn: console.warn,
  error: console.error,
};

let fileWriter: FileLogWriter | null = null;

export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

function stringify(arg: unknown): string {
  if (typeof arg === 'string') {
    return arg;
  }
  if (arg instanceof Error) {
    return arg.stack ?? arg.message;
  }
  return inspect(arg, { depth: 4, breakLength: Infinity });
}

/**
 * Renders one log line. Objects after the message are folded into `data`
 * for the json format and inspected inline for the pretty one.
 */
export function formatLogLine(
  level: LogLevel,
  args: unknown[],
  format: LogFormat,
  now: Date = new Date(),
): string {
  const timestamp = now.toISOString();

  if (format === 'json') {
    const [first, ...rest] = args;
    const entry: Record<string, unknown> = {
      timestamp,
      level,
      message: stringify(first ?? ''),
    };
    if (rest.length > 0) {
      entry.data = rest.map((value) =>
        value instanceof Error ? { name: value.name, message: value.message } : value,
      );
    }
    return `${JSON.stringify(entry)}\n`;
  }

  return `[${timestamp}] [${level.toUpperCase()}] ${args.map(stringify).join(' ')}\n`;
}

/**
 * Routes every console method through the configured level and format.
 * With `output: 'file'` lines are also appended to a daily-rotated file.
 */
export function initializeLogging(config: LoggingConfig): void {
  resetLogging();

  if (config.output === 'file' && config.filePath) {
    fileWriter = createRotatingFileWriter(config.filePath, config.retentionDays);
  }

  for (const method of CONSOLE_METHODS) {
    const level = METHOD_LEVELS[method];
    console[method] = (...args: unknown[]) => {
      if (!shouldLog(level, config.level)) {
        return;
      }
      const line = formatLogLine(level, args, config.format);
      fileWriter?.write(line);
      process.stdout.write(line);
    };
  }
}

export function resetLogging(): void {
  for (const method of CONSOLE_METHODS) {
    console[method] = orig[method];
  }
  fileWriter?.close();
  fileWriter = null;
}
