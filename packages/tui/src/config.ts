/**
 * @fileoverview CLI Argument Parsing
 *
 * Parses necroshell's command line and combines it with the settings file
 * into session and logger configuration. Command-line values win.
 */
import { parseArgs } from 'util';
import {
  isLogLevel,
  type CommandSessionConfig,
  type LoggerOptions,
  type ShellSettings,
} from '@necromancers-shell/core';
import type { CliConfig } from './types.js';

export type CliParseResult =
  | { kind: 'run'; config: CliConfig }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export const USAGE = `Necromancer's Shell

USAGE:
  necroshell [options]

OPTIONS:
  -c, --command <line>      Execute one command and exit
  --history-file <path>     History file (default: ~/.necromancers_shell_history)
  --no-history              Do not load or save history
  --settings <path>         Settings file (default: ~/.necroshell/settings.json)
  --log-level <level>       trace, debug, info, warn, error, fatal or silent
  --log-file <path>         Write logs to a file instead of stderr
  -h, --help                Show this help message
  --version                 Show version number

KEYBOARD SHORTCUTS:
  Tab       Complete commands and flags
  Up/Down   Navigate history
  Ctrl+C    Exit the shell
  Ctrl+D    Exit the shell
`;

// =============================================================================
// Argument Parsing
// =============================================================================

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      command: { type: 'string', short: 'c' },
      'history-file': { type: 'string' },
      'no-history': { type: 'boolean' },
      settings: { type: 'string' },
      'log-level': { type: 'string' },
      'log-file': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean' },
    },
    allowPositionals: false,
    strict: true,
  });
}

export function parseCliArgs(argv: string[]): CliParseResult {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return { kind: 'error', message: error instanceof Error ? error.message : String(error) };
  }

  const { values } = parsed;

  if (values.help) {
    return { kind: 'help' };
  }
  if (values.version) {
    return { kind: 'version' };
  }

  const logLevel = values['log-level'];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    return { kind: 'error', message: `Invalid log level: ${logLevel}` };
  }

  return {
    kind: 'run',
    config: {
      command: values.command,
      historyFile: values['history-file'],
      noHistory: values['no-history'] ?? false,
      settingsPath: values.settings,
      logLevel,
      logFile: values['log-file'],
    },
  };
}

// =============================================================================
// Resolution
// =============================================================================

export function resolveLoggerOptions(config: CliConfig, settings: ShellSettings): LoggerOptions {
  return {
    level: config.logLevel ?? settings.logging.level,
    destination: config.logFile ?? settings.logging.file,
    pretty: settings.logging.pretty,
  };
}

/**
 * History is never persisted for a single -c command
 */
export function resolveSessionConfig(
  config: CliConfig,
  settings: ShellSettings
): CommandSessionConfig {
  return {
    historyCapacity: settings.history.capacity,
    historyPath: config.historyFile ?? settings.history.file,
    persistHistory: !config.noHistory && config.command === undefined && settings.history.persist,
  };
}
