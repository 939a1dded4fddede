/**
 * Logging Configuration
 *
 * Derived from environment variables, cached after first read.
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export type LogFormat = 'text' | 'json';
export type TimestampFormat = 'engine' | 'iso';

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL, default INFO) */
  logLevel: LogLevel;
  /** Per-component overrides (HL7_ENGINE_DEBUG_COMPONENTS, comma-separated, `name[:LEVEL]`) */
  debugComponents: string[];
  /** LOG_FORMAT, default 'text' */
  logFormat: LogFormat;
  /** Optional file to append logs to (LOG_FILE) */
  logFile?: string;
  /** LOG_TIMESTAMP_FORMAT: 'engine' is `yyyy-MM-dd HH:mm:ss,SSS`, 'iso' is ISO-8601 */
  timestampFormat: TimestampFormat;
}

let cachedConfig: LoggingConfiguration | null = null;

function parseFormat(value: string | undefined): LogFormat {
  return value === 'json' ? 'json' : 'text';
}

function parseTimestampFormat(value: string | undefined): TimestampFormat {
  return value === 'iso' ? 'iso' : 'engine';
}

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    logLevel: parseLogLevel(process.env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(process.env['HL7_ENGINE_DEBUG_COMPONENTS']),
    logFormat: parseFormat(process.env['LOG_FORMAT']),
    logFile: process.env['LOG_FILE'] || undefined,
    timestampFormat: parseTimestampFormat(process.env['LOG_TIMESTAMP_FORMAT']),
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetLoggingConfig(): void {
  cachedConfig = null;
}
