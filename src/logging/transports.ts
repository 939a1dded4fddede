/**
 * Logging Transports
 *
 * Winston transport wrappers. Text lines look like:
 *   INFO  2026-02-10 14:30:15,042 [composer] Composed ADT_A01 (6 segments)
 */

import winston from 'winston';
import { format } from 'date-fns';
import type { LogFormat, TimestampFormat } from './config.js';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

export function formatEngineTimestamp(date: Date): string {
  return format(date, 'yyyy-MM-dd HH:mm:ss,SSS');
}

export function formatTextLine(
  level: string,
  timestamp: string,
  component: string | undefined,
  message: string,
  errorStack?: string
): string {
  const componentPart = component ? ` [${component}]` : '';
  const line = `${level.toUpperCase().padEnd(5)} ${timestamp}${componentPart} ${message}`;
  return errorStack ? `${line}\n${errorStack}` : line;
}

function buildTextFormat(timestampFormat: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => {
    const now = new Date();
    const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatEngineTimestamp(now);
    const component = typeof info['component'] === 'string' ? info['component'] : undefined;
    const errorStack = typeof info['errorStack'] === 'string' ? info['errorStack'] : undefined;
    return formatTextLine(info.level, timestamp, component, String(info.message), errorStack);
  });
}

function buildFormat(logFormat: LogFormat, timestampFormat: TimestampFormat): winston.Logform.Format {
  return logFormat === 'json'
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : buildTextFormat(timestampFormat);
}

/**
 * Console transport. Everything goes to stdout so library output never
 * interleaves with a host's stderr diagnostics.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private readonly logFormat: LogFormat,
    private readonly timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.logFormat, this.timestampFormat),
      stderrLevels: [],
    });
  }
}

export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private readonly filePath: string,
    private readonly logFormat: LogFormat,
    private readonly timestampFormat: TimestampFormat = 'engine'
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.logFormat, this.timestampFormat),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    });
  }
}
