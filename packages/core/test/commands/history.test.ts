/**
 * @fileoverview Command History Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { CommandHistory, getDefaultHistoryPath } from '../../src/commands/history.js';

describe('Command History', () => {
  describe('add', () => {
    it('should store lines in order', () => {
      const history = new CommandHistory(10);
      history.add('status');
      history.add('army');

      expect(history.entries()).toEqual(['status', 'army']);
      expect(history.get(0)).toBe('army');
      expect(history.get(1)).toBe('status');
      expect(history.get(2)).toBeUndefined();
    });

    it('should ignore empty lines', () => {
      const history = new CommandHistory(10);

      expect(history.add('')).toBe(false);
      expect(history.size()).toBe(0);
    });

    it('should ignore a repeat of the most recent line', () => {
      const history = new CommandHistory(10);
      history.add('status');

      expect(history.add('status')).toBe(false);
      expect(history.add('army')).toBe(true);
      expect(history.add('status')).toBe(true);
      expect(history.entries()).toEqual(['status', 'army', 'status']);
    });

    it('should evict the oldest entries once full', () => {
      const history = new CommandHistory(3);
      for (const line of ['a', 'b', 'c', 'd', 'e']) {
        history.add(line);
      }

      expect(history.size()).toBe(3);
      expect(history.entries()).toEqual(['c', 'd', 'e']);
      expect(history.get(0)).toBe('e');
    });

    it('should reject a non-positive capacity', () => {
      expect(() => new CommandHistory(0)).toThrow(RangeError);
      expect(() => new CommandHistory(1.5)).toThrow(RangeError);
    });
  });

  describe('search', () => {
    it('should return matches most recent first', () => {
      const history = new CommandHistory(10);
      history.add('raise zombie');
      history.add('status');
      history.add('raise skeleton');

      expect(history.search('raise')).toEqual(['raise skeleton', 'raise zombie']);
      expect(history.search('nothing')).toEqual([]);
    });
  });

  describe('clear', () => {
    it('should remove every entry and accept new ones', () => {
      const history = new CommandHistory(2);
      history.add('a');
      history.add('b');
      history.clear();

      expect(history.size()).toBe(0);
      expect(history.entries()).toEqual([]);

      history.add('c');
      expect(history.entries()).toEqual(['c']);
    });
  });

  describe('persistence', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'necroshell-history-'));
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    it('should save one line per entry, oldest first', async () => {
      const history = new CommandHistory(10);
      history.add('status');
      history.add('army --verbose');
      const file = path.join(testDir, 'history');

      expect(history.save(file)).toBe(true);
      expect(await fs.readFile(file, 'utf-8')).toBe('status\narmy --verbose\n');
    });

    it('should create the parent directory', async () => {
      const history = new CommandHistory(10);
      history.add('status');
      const file = path.join(testDir, 'nested', 'dir', 'history');

      expect(history.save(file)).toBe(true);
      expect(await fs.readFile(file, 'utf-8')).toBe('status\n');
    });

    it.skipIf(process.platform === 'win32')('should write the file readable only by the owner', async () => {
      const history = new CommandHistory(10);
      history.add('status');
      const file = path.join(testDir, 'history');
      history.save(file);

      const stat = await fs.stat(file);
      expect(stat.mode & 0o777).toBe(0o600);
    });

    it('should write an empty file for an empty history', async () => {
      const file = path.join(testDir, 'history');

      expect(new CommandHistory(10).save(file)).toBe(true);
      expect(await fs.readFile(file, 'utf-8')).toBe('');
    });

    it('should restore saved entries', () => {
      const file = path.join(testDir, 'history');
      const original = new CommandHistory(10);
      original.add('status');
      original.add('raise -c 3');
      original.save(file);

      const restored = new CommandHistory(10);

      expect(restored.load(file)).toBe(true);
      expect(restored.entries()).toEqual(['status', 'raise -c 3']);
    });

    it('should apply capacity and duplicate rules while loading', async () => {
      const file = path.join(testDir, 'history');
      await fs.writeFile(file, 'a\na\n\nb\r\nc\nd\n');

      const history = new CommandHistory(2);
      history.load(file);

      expect(history.entries()).toEqual(['c', 'd']);
    });

    it('should treat a missing file as an empty history', () => {
      const history = new CommandHistory(10);

      expect(history.load(path.join(testDir, 'missing'))).toBe(true);
      expect(history.size()).toBe(0);
    });

    it('should report a file that cannot be read', () => {
      const history = new CommandHistory(10);

      expect(history.load(testDir)).toBe(false);
    });

    it('should report a path that cannot be written', async () => {
      const blocker = path.join(testDir, 'file');
      await fs.writeFile(blocker, '');
      const history = new CommandHistory(10);
      history.add('status');

      expect(history.save(path.join(blocker, 'history'))).toBe(false);
    });
  });

  describe('getDefaultHistoryPath', () => {
    it('should place the file in the home directory', () => {
      expect(getDefaultHistoryPath('/home/necro')).toBe(
        path.join('/home/necro', '.necromancers_shell_history')
      );
    });
  });
});
