/**
 * @fileoverview TUI Types
 */
import type { LogLevel } from '@necromancers-shell/core';

// =============================================================================
// CLI Configuration
// =============================================================================

export interface CliConfig {
  /** Execute this line and exit instead of starting the shell */
  command?: string;
  /** History file, overriding settings */
  historyFile?: string;
  /** Disable history persistence */
  noHistory: boolean;
  /** Settings file (default: ~/.necroshell/settings.json) */
  settingsPath?: string;
  /** Log level, overriding settings */
  logLevel?: LogLevel;
  /** Log file, overriding settings */
  logFile?: string;
}
