/**
 * Logger Factory
 *
 * Initializes the root winston logger and caches per-component Logger
 * wrappers.
 *
 * Usage:
 *   import { getLogger, registerComponent } from '../logging/index.js';
 *
 *   registerComponent('conversion', 'Conversion pipeline');
 *   const logger = getLogger('conversion');
 *   logger.info('Conversion started', { conversionId });
 */

import winston from 'winston';
import { initFromEnv } from './DebugModeRegistry.js';
import { LogLevel, parseLogLevel } from './LogLevel.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogFormat, LogTransport, TimestampFormat } from './transports.js';

export interface LoggingSettings {
  logLevel: LogLevel;
  /** `component` or `component:LEVEL` entries */
  debugComponents: string[];
  logFormat: LogFormat;
  logFile?: string;
  timestampFormat: TimestampFormat;
}

/**
 * Read LOG_LEVEL, LOG_FORMAT, LOG_FILE, LOG_TIMESTAMP_FORMAT and
 * CONVERTER_DEBUG_COMPONENTS. Unknown formats fall back to the defaults.
 */
export function readLoggingSettings(env: NodeJS.ProcessEnv = process.env): LoggingSettings {
  return {
    logLevel: parseLogLevel(env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: (env['CONVERTER_DEBUG_COMPONENTS'] ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
    logFormat: env['LOG_FORMAT'] === 'json' ? 'json' : 'text',
    logFile: env['LOG_FILE'] || undefined,
    timestampFormat: env['LOG_TIMESTAMP_FORMAT'] === 'iso' ? 'iso' : 'compact',
  };
}

/**
 * Winston uses lower numbers for higher priority
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize the logging subsystem. getLogger() lazy-initializes with the
 * environment configuration when this was never called.
 *
 * The root winston logger passes every level; filtering happens per
 * component in Logger so overrides can go below the global level.
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = readLoggingSettings();
  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];

  if (config.logFile) {
    transports.push(
      new FileTransport(config.logFile, config.logFormat, config.timestampFormat).createWinstonTransport()
    );
  }

  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  if (rootLogger) {
    rootLogger.close();
  }

  const logger = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: toWinstonLevel(LogLevel.TRACE),
    transports,
    exitOnError: false,
  });
  rootLogger = logger;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);

  // Re-wire existing cached loggers to the new root
  for (const [component] of loggerCache) {
    loggerCache.set(component, new Logger(component, logger));
  }

  return logger;
}

/**
 * Get (or create) a Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, rootLogger ?? initializeLogging());
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime. Components with an override keep it.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush pending writes and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const logger = rootLogger;
  if (!logger) return;

  rootLogger = null;
  loggerCache.clear();
  await new Promise<void>((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}
