/**
 * Centralized pino logger factory.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout is reserved for command output, so diagnostics go to files, or to
 * stderr before initLogger() has run.
 */

import pino from 'pino';
import { join, dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
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
 * @param dataDir - Absolute path to the .backlog directory
 * @param config  - Logging configuration from BacklogConfig.logging
 * @returns The root pino logger instance
 */
export function initLogger(dataDir: string, config: LoggingConfig): pino.Logger {
  const dest = join(dataDir, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  // pino.transport() runs in a worker thread
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      mkdir: true,
      limit: {
        count: config.maxFiles,
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
 * Safe to call before initLogger: returns a stderr fallback logger so early
 * startup code and tests never crash. The fallback level comes from
 * BACKLOG_LOG_LEVEL (default 'warn').
 *
 * @param subsystem - Logical subsystem name (e.g. 'store', 'state', 'session')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    if (!fallbackLogger) {
      fallbackLogger = pino(
        {
          level: process.env['BACKLOG_LOG_LEVEL'] ?? 'warn',
          formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
        },
        pino.destination(2),
      );
    }
    return fallbackLogger.child({ subsystem });
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
