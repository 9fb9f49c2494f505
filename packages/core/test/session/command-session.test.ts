/**
 * @fileoverview Command Session Tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { commandError, commandSuccess } from '../../src/commands/dispatcher.js';
import { getInt } from '../../src/commands/parser.js';
import type { CommandDescriptor } from '../../src/commands/types.js';
import { CommandSession, createCommandSession } from '../../src/session/command-session.js';
import type { LineSource } from '../../src/session/types.js';

class ScriptedLineSource implements LineSource {
  readonly prompts: string[] = [];
  closed = false;

  constructor(private readonly lines: string[]) {}

  async readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.lines.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }
}

const raise: CommandDescriptor = {
  name: 'raise',
  description: 'Raise undead',
  flags: [{ name: 'count', short: 'c', type: 'int' }],
  handler: (command) => commandSuccess(`Raised ${getInt(command, 'count') ?? 1}`),
};

const status: CommandDescriptor = {
  name: 'status',
  description: 'Show status',
  handler: () => commandSuccess('All quiet'),
};

describe('Command Session', () => {
  let testDir: string;
  let historyPath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'necroshell-session-'));
    historyPath = path.join(testDir, 'history');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  function createSession(lines: string[] = [], persistHistory = false) {
    const source = new ScriptedLineSource(lines);
    const session = createCommandSession({
      historyPath,
      persistHistory,
      lineSource: source,
      commands: [raise, status],
    });
    return { session, source };
  }

  describe('lifecycle', () => {
    it('should refuse to execute before initialize', () => {
      const { session } = createSession();

      expect(session.isInitialized()).toBe(false);
      expect(session.execute('status')).toEqual(
        commandError('not_initialized', 'Command system not initialized')
      );
    });

    it('should refuse to read before initialize', async () => {
      const { session, source } = createSession(['status']);

      const result = await session.readAndExecute('> ');

      expect(result.success).toBe(false);
      expect(source.prompts).toEqual([]);
    });

    it('should be idempotent', () => {
      const { session } = createSession();
      session.initialize();
      session.initialize();

      expect(session.isInitialized()).toBe(true);
    });

    it('should refuse to execute after shutdown and close the source', () => {
      const { session, source } = createSession();
      session.initialize();
      session.shutdown();

      expect(session.isInitialized()).toBe(false);
      expect(source.closed).toBe(true);
      expect(session.execute('status').success).toBe(false);
    });
  });

  describe('execute', () => {
    it('should run a command', () => {
      const { session } = createSession();
      session.initialize();

      expect(session.execute('raise -c 4')).toEqual({
        success: true,
        output: 'Raised 4',
        shouldExit: false,
      });
    });

    it('should not record history', () => {
      const { session } = createSession();
      session.initialize();
      session.execute('status');

      expect(session.history.size()).toBe(0);
    });

    it('should report an empty string as a parse error', () => {
      const { session } = createSession();
      session.initialize();

      expect(session.execute('')).toEqual(
        commandError('command_failed', 'Parse error: Empty input')
      );
    });
  });

  describe('readAndExecute', () => {
    it('should read with the prompt, record and run the line', async () => {
      const { session, source } = createSession(['status']);
      session.initialize();

      const result = await session.readAndExecute('necromancer> ');

      expect(source.prompts).toEqual(['necromancer> ']);
      expect(result).toEqual({ success: true, output: 'All quiet', shouldExit: false });
      expect(session.history.entries()).toEqual(['status']);
    });

    it('should record lines that fail to parse', async () => {
      const { session } = createSession(['dance']);
      session.initialize();

      const result = await session.readAndExecute('> ');

      expect(result).toEqual(commandError('command_failed', 'Parse error: Unknown command: dance'));
      expect(session.history.entries()).toEqual(['dance']);
    });

    it('should skip blank lines without recording them', async () => {
      const { session } = createSession(['   ']);
      session.initialize();

      expect(await session.readAndExecute('> ')).toEqual({ success: true, shouldExit: false });
      expect(session.history.size()).toBe(0);
    });

    it('should ask to exit at end of input', async () => {
      const { session } = createSession([]);
      session.initialize();

      expect(await session.readAndExecute('> ')).toEqual({
        success: true,
        output: 'EOF received',
        shouldExit: true,
      });
    });

    it('should report a missing line source', async () => {
      const session = new CommandSession({ persistHistory: false });
      session.initialize();

      expect(await session.readAndExecute('> ')).toEqual(
        commandError('internal', 'No input source attached')
      );
    });

    it('should use an attached line source', async () => {
      const session = new CommandSession({ persistHistory: false, commands: [status] });
      session.attachLineSource(new ScriptedLineSource(['status']));
      session.initialize();

      const result = await session.readAndExecute('> ');

      expect(result.success && result.output).toBe('All quiet');
    });
  });

  describe('registry mutation', () => {
    it('should make a new command completable immediately', () => {
      const { session } = createSession();
      const summon: CommandDescriptor = {
        name: 'summon',
        description: 'Summon',
        handler: () => commandSuccess(),
      };

      expect(session.registerCommand(summon)).toBe(true);
      expect(session.autocomplete.complete('su')).toEqual(['summon']);
    });

    it('should drop an unregistered command from completion', () => {
      const { session } = createSession();

      expect(session.unregisterCommand('status')).toBe(true);
      expect(session.autocomplete.complete('st')).toEqual([]);
      expect(session.registry.has('status')).toBe(false);
    });

    it('should reject duplicate registration', () => {
      const { session } = createSession();

      expect(session.registerCommand(status)).toBe(false);
      expect(session.registry.count()).toBe(2);
    });

    it('should report unregistering an unknown command', () => {
      const { session } = createSession();

      expect(session.unregisterCommand('ghost')).toBe(false);
    });

    it('should run a command registered after initialize', () => {
      const { session } = createSession();
      session.initialize();
      const handler = vi.fn(() => commandSuccess('risen'));
      session.registerCommand({ name: 'rise', description: 'Rise', handler });

      expect(session.execute('rise')).toEqual({ success: true, output: 'risen', shouldExit: false });
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('history persistence', () => {
    it('should load history on initialize and save it on shutdown', async () => {
      await fs.writeFile(historyPath, 'status\n');
      const { session } = createSession(['raise -c 2'], true);
      session.initialize();

      expect(session.history.entries()).toEqual(['status']);

      await session.readAndExecute('> ');
      session.shutdown();

      expect(await fs.readFile(historyPath, 'utf-8')).toBe('status\nraise -c 2\n');
    });

    it('should not touch the file when persistence is off', async () => {
      const { session } = createSession(['status'], false);
      session.initialize();
      await session.readAndExecute('> ');
      session.shutdown();

      await expect(fs.access(historyPath)).rejects.toThrow();
    });

    it('should bound history by the configured capacity', () => {
      const session = new CommandSession({ historyCapacity: 2, persistHistory: false });

      expect(session.history.capacity).toBe(2);
    });
  });
});
