/**
 * @fileoverview Session Types
 */

import type { CommandDescriptor } from '../commands/types.js';

/**
 * Provider of raw input lines. Resolves null at end of input.
 */
export interface LineSource {
  readLine(prompt: string): Promise<string | null>;
  close(): void;
}

/**
 * Command session configuration
 */
export interface CommandSessionConfig {
  /** Maximum history entries (default: 100) */
  historyCapacity?: number;
  /** History file (default: ~/.necromancers_shell_history) */
  historyPath?: string;
  /** Load history on initialize and save it on shutdown (default: true) */
  persistHistory?: boolean;
  /** Where readAndExecute reads lines from */
  lineSource?: LineSource;
  /** Commands registered at construction */
  commands?: CommandDescriptor[];
}
