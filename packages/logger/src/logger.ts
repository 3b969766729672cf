import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = pino.Logger;

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function isTestEnvironment(env: LoggerEnvConfig): boolean {
  // vitest may set these after the env was first read
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function buildTransportTargets(env: LoggerEnvConfig): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (env.LOGGER_CONSOLE_ENABLED) {
    if (env.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: { ignore: 'pid,hostname,category,categoryLabel,service,environment' },
        target: 'pino-pretty',
      });
    } else {
      // plain JSON on stdout for log processors
      targets.push({ level: 'trace', options: { destination: 1 }, target: 'pino/file' });
    }
  }

  if (env.LOGGER_FILE_LOG_ENABLED) {
    targets.push({
      level: 'trace',
      options: {
        destination: `./${env.LOGGER_LOG_DIRNAME}/${env.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return targets;
}

function createRootLogger(): Logger {
  const env = validateLoggerEnv(process.env);

  const options: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isTestEnvironment(env)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(options, noopStream);
  }

  const targets = buildTransportTargets(env);
  if (targets.length > 0) {
    options.transport = { targets };
  }
  return pino.pino(options);
}

/**
 * Returns the logger for a category, creating it on first use.
 * Category loggers are pino children of a lazily created root logger.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Drops the root logger and every cached category logger so the next
 * `getLogger` call re-reads the environment.
 */
export function resetLoggers(): void {
  rootLogger = undefined;
  loggerCache.clear();
}
