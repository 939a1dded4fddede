import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  resetLogging,
  shutdownLogging,
} from '../../../src/logging/LoggerFactory.js';
import { resetLoggingConfig } from '../../../src/logging/config.js';
import { resetDebugRegistry } from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import { CaptureTransport, flushLogs } from '../../helpers/LogCapture.js';

describe('LoggerFactory', () => {
  const originalEnv = { ...process.env };
  let capture: CaptureTransport;

  beforeEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
    capture = new CaptureTransport();
  });

  afterEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
    process.env = { ...originalEnv };
  });

  describe('initializeLogging', () => {
    it('takes the global level from LOG_LEVEL', () => {
      process.env['LOG_LEVEL'] = 'DEBUG';
      resetLoggingConfig();
      initializeLogging({ transports: [capture] });
      expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    });

    it('defaults to INFO when LOG_LEVEL is unset', () => {
      delete process.env['LOG_LEVEL'];
      resetLoggingConfig();
      initializeLogging({ transports: [capture] });
      expect(getGlobalLevel()).toBe(LogLevel.INFO);
    });

    it('delivers entries to supplied transports', async () => {
      process.env['LOG_LEVEL'] = 'INFO';
      resetLoggingConfig();
      initializeLogging({ transports: [capture] });

      getLogger('composer').info('Composed ADT_A01');
      getLogger('composer').debug('hidden');
      await flushLogs();

      expect(capture.entries.map((e) => [e.level, e.component, e.message])).toEqual([
        ['info', 'composer', 'Composed ADT_A01'],
      ]);
    });

    it('can be called repeatedly', () => {
      initializeLogging({ transports: [capture] });
      initializeLogging({ transports: [capture] });
      expect(getLogger('codec').getComponent()).toBe('codec');
    });
  });

  describe('getLogger', () => {
    it('caches one Logger per component', () => {
      initializeLogging({ transports: [capture] });
      expect(getLogger('codec')).toBe(getLogger('codec'));
      expect(getLogger('codec')).not.toBe(getLogger('validator'));
    });

    it('initializes lazily', () => {
      const logger = getLogger('lazy');
      expect(logger.getComponent()).toBe('lazy');
    });

    it('rewires cached loggers after re-initialization', async () => {
      process.env['LOG_LEVEL'] = 'INFO';
      resetLoggingConfig();
      initializeLogging({ transports: [new CaptureTransport()] });
      const before = getLogger('rewire');

      initializeLogging({ transports: [capture] });
      const after = getLogger('rewire');
      after.info('to the new root');
      await flushLogs();

      expect(after).not.toBe(before);
      expect(capture.entries.map((e) => e.message)).toEqual(['to the new root']);
    });
  });

  describe('setGlobalLevel / getGlobalLevel', () => {
    it('changes filtering at runtime', () => {
      initializeLogging({ transports: [capture] });
      const logger = getLogger('runtime');

      setGlobalLevel(LogLevel.INFO);
      expect(logger.isDebugEnabled()).toBe(false);
      setGlobalLevel(LogLevel.DEBUG);
      expect(logger.isDebugEnabled()).toBe(true);
      expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    });
  });

  describe('resetLogging', () => {
    it('clears cached loggers and the global level', () => {
      initializeLogging({ transports: [capture] });
      const before = getLogger('reset');
      setGlobalLevel(LogLevel.TRACE);

      resetLogging();

      expect(getGlobalLevel()).toBe(LogLevel.INFO);
      initializeLogging({ transports: [capture] });
      expect(getLogger('reset')).not.toBe(before);
    });
  });

  describe('environment integration', () => {
    it('applies HL7_ENGINE_DEBUG_COMPONENTS overrides', () => {
      process.env['LOG_LEVEL'] = 'INFO';
      process.env['HL7_ENGINE_DEBUG_COMPONENTS'] = 'fingerprint:TRACE,composer';
      resetLoggingConfig();
      initializeLogging({ transports: [capture] });

      expect(getLogger('fingerprint').isTraceEnabled()).toBe(true);
      expect(getLogger('composer').isDebugEnabled()).toBe(true);
      expect(getLogger('composer').isTraceEnabled()).toBe(false);
      expect(getLogger('codec').isDebugEnabled()).toBe(false);
    });

    it('adds a file transport when LOG_FILE is set', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'hl7-log-'));
      try {
        process.env['LOG_FILE'] = join(dir, 'engine.log');
        resetLoggingConfig();
        expect(() => initializeLogging({ transports: [capture] })).not.toThrow();
        await shutdownLogging();
        // let the file stream finish opening before the directory goes away
        await new Promise((resolve) => setTimeout(resolve, 100));
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
