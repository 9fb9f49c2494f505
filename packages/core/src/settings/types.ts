/**
 * @fileoverview Settings Types
 */

import type { LogLevel } from '../logging/index.js';

export interface HistorySettings {
  /** Maximum number of lines kept */
  capacity: number;
  /** Load on start and save on exit */
  persist: boolean;
  /** History file; defaults to ~/.necromancers_shell_history */
  file?: string;
}

export interface LoggingSettings {
  level: LogLevel;
  /** Write JSON logs to this file instead of stderr */
  file?: string;
  /** Pretty-print stderr logs */
  pretty: boolean;
}

export interface ShellSettings {
  /** Prompt shown before each command */
  prompt: string;
  history: HistorySettings;
  logging: LoggingSettings;
}
