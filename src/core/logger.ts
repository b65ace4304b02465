/**
 * Centralized pino logger factory for worksession.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout belongs to command output, so diagnostics go to the log file, or to
 * stderr before initLogger has run.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;

/**
 * Convert bytes to a size string for pino-roll ('10m', '1g', '500k').
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param homeDir - Worksession home; relative `filePath` values resolve against it
 */
export function initLogger(homeDir: string, config: LoggingConfig): pino.Logger {
  const dest = isAbsolute(config.filePath) ? config.filePath : join(homeDir, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
        removeOtherLogFiles: true,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger
 * so early startup code and tests never crash.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino(
      {
        level: 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      },
      pino.destination(2),
    ).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
