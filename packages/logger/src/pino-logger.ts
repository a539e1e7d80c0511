import os from 'node:os';
import { Writable } from 'node:stream';

import { pino, type Logger as PinoLogger, type LoggerOptions, type TransportTargetOptions } from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = PinoLogger;

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
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

export function buildTransportTargets(env: LoggerEnvConfig): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [];

  if (env.LOGGER_CONSOLE_ENABLED) {
    if (env.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: { ignore: 'pid,hostname,categoryLabel,service,environment' },
        target: 'pino-pretty',
      });
    } else {
      // JSON on stdout for container log collectors
      targets.push({ level: 'trace', options: { destination: 1 }, target: 'pino/file' });
    }
  }

  if (env.LOGGER_FILE_LOG_ENABLED) {
    targets.push({
      level: 'trace',
      options: { destination: env.LOGGER_FILE_LOG_PATH, mkdir: true },
      target: 'pino/file',
    });
  }

  return targets;
}

function createRootLogger(): Logger {
  const env = validateLoggerEnv(process.env);

  const options: LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Tests get a sink that swallows everything and no transport worker threads
  if (isTestEnvironment(env)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(options, noopStream);
  }

  const targets = buildTransportTargets(env);
  if (targets.length > 0) {
    options.transport = { targets };
  }
  return pino(options);
}

/**
 * Returns the cached logger for a category, creating the root logger on first use.
 */
export function getLogger(category: string): Logger {
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

export function resetLoggers(): void {
  rootLogger = undefined;
  loggerCache.clear();
}
