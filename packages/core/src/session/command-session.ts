/**
 * @fileoverview Command Session
 *
 * Owns one registry, one history log and one autocomplete index, and runs
 * input lines through tokenize -> parse -> dispatch. Registry mutations go
 * through this class so the autocomplete index is rebuilt in the same call.
 */

import { Autocomplete } from '../commands/autocomplete.js';
import { commandError, commandExit, commandSuccess, dispatch } from '../commands/dispatcher.js';
import {
  CommandHistory,
  DEFAULT_HISTORY_CAPACITY,
  getDefaultHistoryPath,
} from '../commands/history.js';
import { parseLine } from '../commands/parser.js';
import { CommandRegistry, type ReadonlyCommandRegistry } from '../commands/registry.js';
import { isBlank } from '../commands/tokenizer.js';
import type { CommandDescriptor, CommandResult } from '../commands/types.js';
import { createLogger } from '../logging/index.js';
import type { CommandSessionConfig, LineSource } from './types.js';

const log = createLogger('session');

export class CommandSession {
  private readonly commandRegistry = new CommandRegistry();
  private readonly commandHistory: CommandHistory;
  private readonly completion = new Autocomplete();
  private readonly historyPath: string;
  private readonly persistHistory: boolean;
  private lineSource: LineSource | null;
  private initialized = false;

  constructor(config: CommandSessionConfig = {}) {
    this.commandHistory = new CommandHistory(config.historyCapacity ?? DEFAULT_HISTORY_CAPACITY);
    this.historyPath = config.historyPath ?? getDefaultHistoryPath();
    this.persistHistory = config.persistHistory ?? true;
    this.lineSource = config.lineSource ?? null;

    for (const descriptor of config.commands ?? []) {
      this.commandRegistry.register(descriptor);
    }
    this.completion.rebuild(this.commandRegistry);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Load history and mark the session ready
   */
  initialize(): void {
    if (this.initialized) {
      log.warn('Command session already initialized');
      return;
    }

    log.info('Initializing command session', { commands: this.commandRegistry.count() });

    if (this.persistHistory) {
      this.commandHistory.load(this.historyPath);
    }
    this.completion.rebuild(this.commandRegistry);

    this.initialized = true;
    log.info('Command session initialized', { historyEntries: this.commandHistory.size() });
  }

  /**
   * Save history and close the line source
   */
  shutdown(): void {
    if (!this.initialized) {
      return;
    }

    log.info('Shutting down command session');

    if (this.persistHistory) {
      this.commandHistory.save(this.historyPath);
    }
    this.lineSource?.close();

    this.initialized = false;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  attachLineSource(source: LineSource): void {
    this.lineSource = source;
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Read one line and execute it. End of input asks the caller to exit.
   */
  async readAndExecute(prompt: string): Promise<CommandResult> {
    if (!this.initialized) {
      return commandError('not_initialized', 'Command system not initialized');
    }
    if (!this.lineSource) {
      return commandError('internal', 'No input source attached');
    }

    const line = await this.lineSource.readLine(prompt);
    if (line === null) {
      log.info('End of input');
      return commandExit('EOF received');
    }
    if (isBlank(line)) {
      return commandSuccess();
    }

    this.commandHistory.add(line);
    return this.run(line);
  }

  /**
   * Execute a command string without touching history or input
   */
  execute(input: string): CommandResult {
    if (!this.initialized) {
      return commandError('not_initialized', 'Command system not initialized');
    }
    return this.run(input);
  }

  private run(input: string): CommandResult {
    return dispatch(parseLine(input, this.commandRegistry));
  }

  // ===========================================================================
  // Registry
  // ===========================================================================

  /**
   * Register a command and rebuild the autocomplete index
   */
  registerCommand(descriptor: CommandDescriptor): boolean {
    const registered = this.commandRegistry.register(descriptor);
    if (registered) {
      this.completion.rebuild(this.commandRegistry);
      log.debug('Registered command', { command: descriptor.name });
    } else {
      log.warn('Command already registered', { command: descriptor.name });
    }
    return registered;
  }

  /**
   * Unregister a command and rebuild the autocomplete index
   */
  unregisterCommand(name: string): boolean {
    const removed = this.commandRegistry.unregister(name);
    if (removed) {
      this.completion.rebuild(this.commandRegistry);
      log.debug('Unregistered command', { command: name });
    }
    return removed;
  }

  get registry(): ReadonlyCommandRegistry {
    return this.commandRegistry;
  }

  get history(): CommandHistory {
    return this.commandHistory;
  }

  get autocomplete(): Autocomplete {
    return this.completion;
  }
}

export function createCommandSession(config: CommandSessionConfig = {}): CommandSession {
  return new CommandSession(config);
}
