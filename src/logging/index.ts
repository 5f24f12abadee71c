/**
 * Logging module
 *
 * Component loggers over winston with per-component level overrides.
 */

export { LogLevel, parseLogLevel, isLevelEnabled } from './LogLevel.js';
export {
  type RegisteredComponent,
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  getRegisteredComponents,
  resetDebugRegistry,
} from './DebugModeRegistry.js';
export { Logger, type LogMetadata } from './Logger.js';
export {
  type LoggingSettings,
  readLoggingSettings,
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export {
  type LogFormat,
  type TimestampFormat,
  type LogTransport,
  ConsoleTransport,
  FileTransport,
  formatCompactTimestamp,
  formatTextLine,
} from './transports.js';
