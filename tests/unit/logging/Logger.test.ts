import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { Logger, setGlobalLevelProvider } from '../../../src/logging/Logger.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import { resetDebugRegistry, setComponentLevel } from '../../../src/logging/DebugModeRegistry.js';
import { createCapturingWinston } from '../../helpers/LogCapture.js';

describe('Logger', () => {
  let globalLevel: LogLevel;

  beforeEach(() => {
    resetDebugRegistry();
    globalLevel = LogLevel.INFO;
    setGlobalLevelProvider(() => globalLevel);
  });

  afterEach(() => {
    resetDebugRegistry();
    setGlobalLevelProvider(() => LogLevel.INFO);
  });

  describe('basic logging', () => {
    it('logs info messages with the component attached', () => {
      const { logger, calls } = createCapturingWinston();
      new Logger('composer', logger).info('Composed ADT_A01');

      expect(calls).toHaveLength(1);
      expect(calls[0]?.level).toBe('info');
      expect(calls[0]?.message).toBe('Composed ADT_A01');
      expect(calls[0]?.component).toBe('composer');
    });

    it('logs warn messages', () => {
      const { logger, calls } = createCapturingWinston();
      new Logger('validator', logger).warn('Unknown trigger event');

      expect(calls.map((c) => [c.level, c.message])).toEqual([['warn', 'Unknown trigger event']]);
    });

    it('logs error messages with the error stack', () => {
      const { logger, calls } = createCapturingWinston();
      const err = new Error('definition unreadable');
      new Logger('definitions', logger).error('Load failed', err);

      expect(calls).toHaveLength(1);
      expect(calls[0]?.level).toBe('error');
      expect(calls[0]?.errorStack).toBe(err.stack);
    });

    it('omits errorStack when no error is passed', () => {
      const { logger, calls } = createCapturingWinston();
      new Logger('definitions', logger).error('Load failed');

      expect(calls[0]?.errorStack).toBeUndefined();
    });

    it('merges caller metadata', () => {
      const { logger, calls } = createCapturingWinston();
      new Logger('fingerprint', logger).info('Scored', { vendor: 'Epic', score: 0.9 });

      expect(calls[0]?.meta['vendor']).toBe('Epic');
      expect(calls[0]?.meta['score']).toBe(0.9);
      expect(calls[0]?.meta['component']).toBe('fingerprint');
    });
  });

  describe('level filtering', () => {
    it('drops debug and trace at the INFO global level', () => {
      const { logger, calls } = createCapturingWinston();
      const log = new Logger('codec', logger);

      log.trace('t');
      log.debug('d');
      log.info('i');

      expect(calls.map((c) => c.message)).toEqual(['i']);
    });

    it('drops everything below ERROR at the ERROR global level', () => {
      globalLevel = LogLevel.ERROR;
      const { logger, calls } = createCapturingWinston();
      const log = new Logger('codec', logger);

      log.info('i');
      log.warn('w');
      log.error('e');

      expect(calls.map((c) => c.level)).toEqual(['error']);
    });

    it('follows global level changes at runtime', () => {
      const { logger, calls } = createCapturingWinston();
      const log = new Logger('codec', logger);

      log.debug('before');
      globalLevel = LogLevel.DEBUG;
      log.debug('after');

      expect(calls.map((c) => c.message)).toEqual(['after']);
    });

    it('lets a component override raise its own verbosity', () => {
      setComponentLevel('composer', LogLevel.TRACE);
      const { logger, calls } = createCapturingWinston();

      new Logger('composer', logger).trace('composer trace');
      new Logger('validator', logger).trace('validator trace');

      expect(calls.map((c) => c.message)).toEqual(['composer trace']);
    });

    it('lets a component override silence it', () => {
      setComponentLevel('codec', LogLevel.ERROR);
      const { logger, calls } = createCapturingWinston();

      new Logger('codec', logger).warn('quiet');

      expect(calls).toHaveLength(0);
    });
  });

  describe('isDebugEnabled / isTraceEnabled', () => {
    it('reflects the global level', () => {
      const { logger } = createCapturingWinston();
      const log = new Logger('codec', logger);

      expect(log.isDebugEnabled()).toBe(false);
      globalLevel = LogLevel.DEBUG;
      expect(log.isDebugEnabled()).toBe(true);
      expect(log.isTraceEnabled()).toBe(false);
      globalLevel = LogLevel.TRACE;
      expect(log.isTraceEnabled()).toBe(true);
    });

    it('reflects a component override', () => {
      setComponentLevel('fingerprint', LogLevel.DEBUG);
      const { logger } = createCapturingWinston();

      expect(new Logger('fingerprint', logger).isDebugEnabled()).toBe(true);
      expect(new Logger('codec', logger).isDebugEnabled()).toBe(false);
    });
  });

  describe('child', () => {
    it('joins component names with a dot', () => {
      const { logger, calls } = createCapturingWinston();
      const child = new Logger('composer', logger).child('values');

      child.info('Generated value');

      expect(child.getComponent()).toBe('composer.values');
      expect(calls[0]?.component).toBe('composer.values');
    });

    it('inherits the parent override', () => {
      setComponentLevel('composer', LogLevel.DEBUG);
      const { logger, calls } = createCapturingWinston();

      new Logger('composer', logger).child('values').debug('inherited');

      expect(calls.map((c) => c.message)).toEqual(['inherited']);
    });
  });
});
