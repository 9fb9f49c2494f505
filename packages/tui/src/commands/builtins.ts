/**
 * @fileoverview Built-in Commands
 *
 * System commands every shell session registers: help, quit, exit, clear,
 * log and history. Game commands are registered by the game on top of these.
 */
import {
  LOG_LEVELS,
  commandError,
  commandExit,
  commandSuccess,
  configureLogger,
  formatCommandHelp,
  formatCommandList,
  getArg,
  getInt,
  getLogger,
  getString,
  isLogLevel,
  setLogLevel,
  type CommandDescriptor,
  type CommandHistory,
  type CommandSession,
  type ReadonlyCommandRegistry,
} from '@necromancers-shell/core';

/** ANSI: clear screen, cursor home */
export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export const FAREWELL = 'Farewell, Necromancer. The shadows await your return...';

export interface TerminalOutput {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

// =============================================================================
// Command Factories
// =============================================================================

export function createHelpCommand(registry: ReadonlyCommandRegistry): CommandDescriptor {
  return {
    name: 'help',
    description: 'Show available commands',
    usage: 'help [command]',
    helpText: 'Without an argument, lists every command. With a command name, shows its options.',
    maxArgs: 1,
    handler: (command) => {
      const name = getArg(command, 0);
      if (name === undefined) {
        return commandSuccess(formatCommandList(registry));
      }
      const descriptor = registry.get(name);
      if (!descriptor) {
        return commandError('command_failed', `Unknown command: ${name}`);
      }
      return commandSuccess(formatCommandHelp(descriptor));
    },
  };
}

export function createQuitCommand(name: 'quit' | 'exit' = 'quit'): CommandDescriptor {
  return {
    name,
    description: 'Exit the game',
    usage: name,
    handler: () => commandExit(FAREWELL),
  };
}

/**
 * Writes the clear sequence straight to the terminal
 */
export function createClearCommand(output: TerminalOutput): CommandDescriptor {
  return {
    name: 'clear',
    description: 'Clear the screen',
    usage: 'clear',
    handler: () => {
      if (!output.isTTY) {
        return commandError('command_failed', 'Cannot clear: not a terminal');
      }
      output.write(CLEAR_SCREEN);
      return commandSuccess();
    },
  };
}

export function createLogCommand(): CommandDescriptor {
  const levelList = LOG_LEVELS.join(', ');

  return {
    name: 'log',
    description: 'Show or change the log level',
    usage: 'log [level] [--file <path>]',
    flags: [{ name: 'file', short: 'f', type: 'string', description: 'Write logs to this file' }],
    maxArgs: 1,
    handler: (command) => {
      const level = getArg(command, 0);
      if (level === undefined) {
        return commandSuccess(
          [
            `Current log level: ${getLogger().level.toUpperCase()}`,
            '',
            `Available levels: ${levelList}`,
            'Usage: log <level> [--file <path>]',
          ].join('\n')
        );
      }

      if (!isLogLevel(level)) {
        return commandError(
          'command_failed',
          `Invalid log level: ${level}\nValid levels: ${levelList}`
        );
      }

      const file = getString(command, 'file');
      if (file === undefined) {
        setLogLevel(level);
        return commandSuccess(`Log level set to: ${level}`);
      }

      try {
        configureLogger({ level, destination: file });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return commandError('command_failed', `Failed to change log file: ${reason}`);
      }
      return commandSuccess(`Log level set to: ${level}, writing to ${file}`);
    },
  };
}

export function createHistoryCommand(history: CommandHistory): CommandDescriptor {
  return {
    name: 'history',
    description: 'Show command history',
    usage: 'history [query] [--limit <n>]',
    flags: [
      { name: 'limit', short: 'n', type: 'int', description: 'Show only the last n entries' },
    ],
    maxArgs: 1,
    handler: (command) => {
      const limit = getInt(command, 'limit');
      if (limit !== undefined && limit < 1) {
        return commandError('command_failed', '--limit must be a positive integer');
      }

      const query = getArg(command, 0);
      let entries = query === undefined ? history.entries() : history.search(query).reverse();
      if (limit !== undefined) {
        entries = entries.slice(-limit);
      }

      if (entries.length === 0) {
        return commandSuccess(query === undefined ? 'No history.' : `No history matching '${query}'.`);
      }

      const width = String(entries.length).length;
      return commandSuccess(
        entries.map((entry, i) => `${String(i + 1).padStart(width)}  ${entry}`).join('\n')
      );
    },
  };
}

// =============================================================================
// Registration
// =============================================================================

export interface BuiltinOptions {
  /** Terminal the clear command writes to */
  output: TerminalOutput;
}

export function getBuiltinCommands(
  session: CommandSession,
  options: BuiltinOptions
): CommandDescriptor[] {
  return [
    createHelpCommand(session.registry),
    createQuitCommand('quit'),
    createQuitCommand('exit'),
    createClearCommand(options.output),
    createLogCommand(),
    createHistoryCommand(session.history),
  ];
}

/**
 * Register every built-in; returns the names that were already taken
 */
export function registerBuiltinCommands(session: CommandSession, options: BuiltinOptions): string[] {
  const skipped: string[] = [];
  for (const descriptor of getBuiltinCommands(session, options)) {
    if (!session.registerCommand(descriptor)) {
      skipped.push(descriptor.name);
    }
  }
  return skipped;
}
