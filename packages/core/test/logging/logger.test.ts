/**
 * @fileoverview Logger Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ShellLogger,
  configureLogger,
  createLogger,
  getLogger,
  isLogLevel,
  resetLogger,
  setLogLevel,
} from '../../src/logging/logger.js';

function readLogLines(file: string): Record<string, unknown>[] {
  return fs
    .readFileSync(file, 'utf-8')
    .split('\n')
    .filter((line) => line !== '')
    .map((line): Record<string, unknown> => JSON.parse(line));
}

describe('ShellLogger', () => {
  beforeEach(() => {
    resetLogger();
  });

  afterEach(() => {
    resetLogger();
  });

  describe('getLogger', () => {
    it('should return a singleton logger instance', () => {
      expect(getLogger()).toBe(getLogger());
      expect(getLogger()).toBeInstanceOf(ShellLogger);
    });

    it('should take its level from LOG_LEVEL', () => {
      expect(getLogger().level).toBe('silent');
    });
  });

  describe('isLogLevel', () => {
    it('should accept known levels only', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('loud')).toBe(false);
    });
  });

  describe('file destination', () => {
    let testDir: string;
    let logFile: string;

    beforeEach(() => {
      testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'necroshell-log-'));
      logFile = path.join(testDir, 'logs', 'shell.log');
    });

    afterEach(() => {
      fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('should write JSON lines with the component name', () => {
      configureLogger({ level: 'info', destination: logFile });

      createLogger('test-component').info('Minion raised', { count: 3 });

      const [entry] = readLogLines(logFile);
      expect(entry).toMatchObject({
        level: 'info',
        name: 'necroshell',
        component: 'test-component',
        count: 3,
        msg: 'Minion raised',
      });
    });

    it('should serialize errors under err', () => {
      configureLogger({ level: 'info', destination: logFile });

      createLogger('test-component').error('Ritual failed', new Error('no mana'));

      const [entry] = readLogLines(logFile);
      expect(entry?.msg).toBe('Ritual failed');
      expect(entry?.err).toMatchObject({ message: 'no mana' });
    });

    it('should change the level of existing component loggers', () => {
      configureLogger({ level: 'warn', destination: logFile });
      const log = createLogger('test-component');

      log.info('hidden');
      setLogLevel('info');
      log.info('shown');

      expect(readLogLines(logFile).map((entry) => entry.msg)).toEqual(['shown']);
      expect(getLogger().level).toBe('info');
    });

    it('should rebind component loggers after reconfiguration', () => {
      const log = createLogger('test-component');
      log.warn('before');

      configureLogger({ level: 'info', destination: logFile });
      log.warn('after');

      expect(readLogLines(logFile).map((entry) => entry.msg)).toEqual(['after']);
    });
  });

  describe('ShellLogger instance', () => {
    it('should create child loggers', () => {
      const logger = new ShellLogger({ level: 'silent' });

      expect(logger.child({ component: 'child' })).toBeInstanceOf(ShellLogger);
    });

    it('should return a timer that can be stopped', () => {
      const logger = new ShellLogger({ level: 'silent' });
      const stop = logger.startTimer('operation');

      expect(() => stop()).not.toThrow();
    });

    it('should report level changes', () => {
      const logger = new ShellLogger({ level: 'silent' });
      logger.setLevel('debug');

      expect(logger.level).toBe('debug');
    });
  });
});
