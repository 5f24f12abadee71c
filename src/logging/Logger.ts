/**
 * Logger
 *
 * Lightweight wrapper around a winston logger instance, bound to a component
 * name. Level filtering uses DebugModeRegistry for per-component overrides.
 */

import type winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

/** Global level getter, injected by LoggerFactory to avoid circular imports */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;

/**
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

export type LogMetadata = Record<string, unknown>;

export class Logger {
  constructor(
    private readonly component: string,
    private readonly winstonLogger: winston.Logger
  ) {}

  trace(message: string, metadata?: LogMetadata): void {
    this.logAt(LogLevel.TRACE, 'trace', message, undefined, metadata);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.logAt(LogLevel.DEBUG, 'debug', message, undefined, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.logAt(LogLevel.INFO, 'info', message, undefined, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.logAt(LogLevel.WARN, 'warn', message, undefined, metadata);
  }

  /**
   * Log an ERROR-level message with an optional Error object.
   */
  error(message: string, error?: Error, metadata?: LogMetadata): void {
    this.logAt(LogLevel.ERROR, 'error', message, error, metadata);
  }

  isDebugEnabled(): boolean {
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  isTraceEnabled(): boolean {
    return shouldLog(this.component, LogLevel.TRACE, globalLevelFn());
  }

  /**
   * Child logger with a sub-component suffix, e.g. "conversion.hl7"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.winstonLogger);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(
    level: LogLevel,
    winstonLevel: string,
    message: string,
    error?: Error,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(this.component, level, globalLevelFn())) {
      return;
    }

    const meta: LogMetadata = {
      component: this.component,
      ...metadata,
    };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    }
    this.winstonLogger.log(winstonLevel, message, meta);
  }
}
