import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { type LogLevel, validateLoggerEnv } from './env.schema.js';

type LogMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerOverrides {
  /** Send every record to this stream instead of the configured transports. */
  destination?: pino.DestinationStream | undefined;
  level?: LogLevel | undefined;
}

const env = validateLoggerEnv(process.env);

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

const loggerCache = new Map<string, pino.Logger>();

let rootLogger: pino.Logger | undefined;
let overrides: LoggerOverrides = {};

function isTestEnvironment(): boolean {
  // vitest may set these after the env snapshot above was taken
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function createRootLogger(): pino.Logger {
  const level = overrides.level ?? env.LOGGER_LOG_LEVEL;
  const options: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (overrides.destination) {
    return pino.pino(options, overrides.destination);
  }

  if (isTestEnvironment()) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(options, noopStream);
  }

  const targets: pino.TransportTargetOptions[] = [];

  if (env.LOGGER_CONSOLE_ENABLED) {
    if (env.NODE_ENV === 'development') {
      targets.push({
        level,
        options: { ignore: 'pid,hostname,category,categoryLabel,service,environment' },
        target: 'pino-pretty',
      });
    } else {
      targets.push({ level, options: { destination: 1 }, target: 'pino/file' });
    }
  }

  if (env.LOGGER_FILE_LOG_ENABLED) {
    targets.push({
      level,
      options: {
        destination: path.join(env.LOGGER_LOG_DIRNAME, env.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (targets.length > 0) {
    options.transport = { targets };
  }
  return pino.pino(options);
}

function getOrCreateCategoryLogger(category: string): pino.Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  rootLogger ??= createRootLogger();
  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Category logger that looks up the underlying pino logger on every call, so
 * loggers captured at module load follow a later `initLogger`.
 */
class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  private log(level: LogMethod, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    const target = getOrCreateCategoryLogger(this.category);
    if (typeof msgOrObj === 'string') {
      target[level](msgOrObj);
    } else {
      target[level](msgOrObj, maybeMsg);
    }
  }
}

export function getLogger(category: string): Logger {
  return new CategoryLogger(category);
}

/**
 * Replace the destination and/or level of every logger. Resets cached
 * loggers so the new configuration applies immediately.
 */
export function initLogger(next: LoggerOverrides): void {
  overrides = next;
  rootLogger = undefined;
  loggerCache.clear();
}
