/**
 * Structured JSON logger for the inventory scanner.
 *
 * Uses Pino. Logs go to stderr so stdout stays free for reports.
 */

import pino from 'pino';
import type { LogLevel } from '@shared/types';

type LogFormat = 'json' | 'pretty';

let root: pino.Logger | undefined;
const children = new Map<string, pino.Logger>();

/**
 * Normalize a user-supplied level name, falling back to 'info'.
 *
 * @param level - Level name in any case
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  const normalized = level?.toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return normalized;
    default:
      return 'info';
  }
}

function resolveFormat(): LogFormat {
  return process.env.LOG_FORMAT?.toLowerCase() === 'pretty' ? 'pretty' : 'json';
}

function createRoot(): pino.Logger {
  const options: pino.LoggerOptions = {
    level: parseLogLevel(process.env.LOG_LEVEL),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (resolveFormat() === 'pretty') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }
  return pino(options, pino.destination(2));
}

function rootLogger(): pino.Logger {
  root ??= createRoot();
  return root;
}

/**
 * Get the named Pino logger.
 *
 * All loggers are children of one root that writes to stderr. The root reads
 * LOG_LEVEL (any case, default 'info') when it is first needed; LOG_FORMAT=pretty
 * routes output through pino-pretty instead of JSON lines. Asking for the same
 * name twice returns the same logger.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @returns Configured Pino logger
 */
export function setupLogger(name: string = 'aws-inventory', level?: string): pino.Logger {
  let logger = children.get(name);
  if (!logger) {
    logger = rootLogger().child({ name });
    children.set(name, logger);
  }
  if (level !== undefined) {
    logger.level = parseLogLevel(level);
  }
  return logger;
}

/**
 * Change the level of the root and of every named logger.
 *
 * Module loggers are created at import time, before the CLI has parsed
 * `--log-level`.
 *
 * @param level - New level name
 */
export function setLogLevel(level: string): void {
  const logLevel = parseLogLevel(level);
  rootLogger().level = logLevel;
  for (const logger of children.values()) {
    logger.level = logLevel;
  }
  process.env.LOG_LEVEL = logLevel;
}
