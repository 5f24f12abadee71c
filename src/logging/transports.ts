/**
 * Logging Transports
 *
 * Winston transport wrappers. The text layout is
 * `INFO  2026-02-10 14:30:15,042 [conversion] Conversion started`.
 */

import winston from 'winston';

export type LogFormat = 'text' | 'json';
/** 'compact' is yyyy-MM-dd HH:mm:ss,SSS; 'iso' is ISO-8601 */
export type TimestampFormat = 'compact' | 'iso';

/**
 * Interface for pluggable log transports.
 */
export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

const MAX_LOG_FILE_SIZE = 10 * 1024 * 1024;
const MAX_LOG_FILES = 5;

/**
 * yyyy-MM-dd HH:mm:ss,SSS in local time
 */
export function formatCompactTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

/**
 * Render one text log line. Metadata other than the component is appended
 * as JSON.
 */
export function formatTextLine(
  info: { level: string; message: unknown; [key: string]: unknown },
  timestamp: string
): string {
  const { level, message, component, errorStack, ...rest } = info;
  const componentPart = typeof component === 'string' && component ? ` [${component}]` : '';

  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) extras[key] = value;
  }
  const extraPart = Object.keys(extras).length > 0 ? ` ${JSON.stringify(extras)}` : '';

  let line = `${level.toUpperCase().padEnd(5)} ${timestamp}${componentPart} ${String(message)}${extraPart}`;
  if (typeof errorStack === 'string' && errorStack) {
    line += '\n' + errorStack;
  }
  return line;
}

function buildTextFormat(timestampFormat: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => {
    const now = new Date();
    const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatCompactTimestamp(now);
    return formatTextLine(info, timestamp);
  });
}

function buildJsonFormat(): winston.Logform.Format {
  return winston.format.combine(winston.format.timestamp(), winston.format.json());
}

/**
 * Console transport. Every level goes to stdout.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: LogFormat,
    private timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: this.format === 'json' ? buildJsonFormat() : buildTextFormat(this.timestampFormat),
      stderrLevels: [],
    });
  }
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: LogFormat,
    private timestampFormat: TimestampFormat = 'compact'
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: this.format === 'json' ? buildJsonFormat() : buildTextFormat(this.timestampFormat),
      maxsize: MAX_LOG_FILE_SIZE,
      maxFiles: MAX_LOG_FILES,
    });
  }
}
