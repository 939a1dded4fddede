/**
 * Logger Factory
 *
 * Owns the root winston logger and caches one Logger per component.
 *
 *   const logger = getLogger('composer');
 *   logger.debug('Resolved PID-5 from patient input');
 *
 * getLogger() lazily initializes with environment defaults, so library
 * callers never have to call initializeLogging() themselves.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/** Winston numbers priority the other way round: error=0 ... trace=4 */
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

export interface LoggingOptions {
  /** Replace the console transport, e.g. with a silent or capturing one */
  transports?: LogTransport[];
  /** Keep the console transport alongside `transports` */
  includeConsole?: boolean;
}

/**
 * (Re)initialize the logging subsystem from the current configuration.
 */
export function initializeLogging(options: LoggingOptions = {}): winston.Logger {
  const config = getLoggingConfig();
  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [];
  if (!options.transports || options.includeConsole) {
    transports.push(new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport());
  }
  if (config.logFile) {
    transports.push(
      new FileTransport(config.logFile, config.logFormat, config.timestampFormat).createWinstonTransport()
    );
  }
  for (const t of options.transports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  // Level filtering happens per component in Logger, so winston accepts everything
  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = root;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);

  for (const [component] of loggerCache) {
    loggerCache.set(component, new Logger(component, root));
  }
  return root;
}

export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const root = rootLogger ?? initializeLogging();
  const logger = new Logger(component, root);
  loggerCache.set(component, logger);
  return logger;
}

export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  rootLogger = null;
  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  rootLogger?.close();
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}
