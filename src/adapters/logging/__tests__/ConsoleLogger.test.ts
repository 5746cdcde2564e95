import fs from 'fs';
import path from 'path';
import { ConsoleLogger } from '../ConsoleLogger';
import { createTempDir, removeDir } from '../../../test/helpers';

describe('ConsoleLogger', () => {
  let logger: ConsoleLogger;

  beforeEach(() => {
    logger = new ConsoleLogger('debug');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('time tracking', () => {
    it('should track and log timing information at debug level', (done) => {
      const consoleDebugSpy = jest.spyOn(console, 'debug').mockImplementation();

      logger.time('test-timer-1');

      setTimeout(() => {
        const duration = logger.timeEnd('test-timer-1');
        expect(duration).toBeGreaterThan(0);
        expect(consoleDebugSpy).toHaveBeenCalledWith(expect.stringContaining("[DEBUG] Timer 'test-timer-1':"));
        done();
      }, 10);
    });

    it('should handle timeLog correctly', (done) => {
      const consoleInfoSpy = jest.spyOn(console, 'info').mockImplementation();

      logger.time('test-timer-2');

      setTimeout(() => {
        logger.timeLog('test-timer-2', 'Custom message');
        expect(consoleInfoSpy).toHaveBeenCalledWith(expect.stringContaining('[INFO] Custom message ('));
        done();
      }, 10);
    });

    it('should warn when timer does not exist', () => {
      const consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();

      expect(logger.timeEnd('non-existent-timer')).toBe(0);

      expect(consoleWarnSpy).toHaveBeenCalledWith(
        expect.stringContaining("[WARN] Timer 'non-existent-timer' does not exist")
      );
    });
  });

  describe('log levels', () => {
    it('should respect log level filtering', () => {
      const warnLogger = new ConsoleLogger('warn');
      const debugSpy = jest.spyOn(console, 'debug').mockImplementation();
      const infoSpy = jest.spyOn(console, 'info').mockImplementation();
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
      const errorSpy = jest.spyOn(console, 'error').mockImplementation();

      warnLogger.debug('Debug message');
      warnLogger.info('Info message');
      warnLogger.warn('Warn message');
      warnLogger.error('Error message');

      expect(debugSpy).not.toHaveBeenCalled();
      expect(infoSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('message formatting', () => {
    it('should format messages with timestamp and level', () => {
      const consoleInfoSpy = jest.spyOn(console, 'info').mockImplementation();

      logger.info('Test message');

      expect(consoleInfoSpy).toHaveBeenCalledWith(
        expect.stringMatching(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] Test message$/)
      );
    });

    it('should pass extra arguments through to the console', () => {
      const consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
      const error = new Error('boom');

      logger.error('Failed', error);

      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('[ERROR] Failed'), error);
    });
  });

  describe('file sink', () => {
    let dir: string;

    beforeEach(() => {
      dir = createTempDir('logger-test-');
      jest.spyOn(console, 'info').mockImplementation();
      jest.spyOn(console, 'warn').mockImplementation();
    });

    afterEach(() => {
      removeDir(dir);
    });

    const read = (file: string) => fs.readFileSync(file, 'utf8').trim().split('\n');

    it('should append log lines with extra arguments', () => {
      const file = path.join(dir, 'logs', 'app.log');
      const fileLogger = new ConsoleLogger('info', file);

      fileLogger.info('Started');
      fileLogger.warn('Details', { attempt: 2 });
      fileLogger.debug('Hidden');
      fileLogger.close();

      const lines = read(file);
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/\[INFO\] Started$/);
      expect(lines[1]).toMatch(/\[WARN\] Details \{"attempt":2\}$/);
    });

    it('should rotate by size and keep at most maxFiles old logs', () => {
      const file = path.join(dir, 'app.log');
      // Each line is 42 bytes, so two fit under the limit
      const fileLogger = new ConsoleLogger('info', file, { maxSizeBytes: 100, maxFiles: 2 });

      for (let i = 1; i <= 7; i++) fileLogger.info(`entry ${i}`);
      fileLogger.close();

      expect(read(file).map((l) => l.slice(-7))).toEqual(['entry 7']);
      expect(read(`${file}.1`).map((l) => l.slice(-7))).toEqual(['entry 5', 'entry 6']);
      expect(read(`${file}.2`).map((l) => l.slice(-7))).toEqual(['entry 3', 'entry 4']);
      expect(fs.existsSync(`${file}.3`)).toBe(false);
    });
  });
});
