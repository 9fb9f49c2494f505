#!/usr/bin/env -S node --import tsx
/**
 * @fileoverview Necroshell CLI Entry Point
 *
 * Starts an interactive shell on the terminal, or executes one command with -c.
 */
import {
  VERSION,
  configureLogger,
  createCommandSession,
  createLogger,
  loadSettings,
} from '@necromancers-shell/core';
import { registerBuiltinCommands } from './commands/builtins.js';
import { createCompleter } from './completer.js';
import { USAGE, parseCliArgs, resolveLoggerOptions, resolveSessionConfig } from './config.js';
import { ReadlineLineSource } from './input/readline-source.js';
import { runCommand, runShell } from './shell.js';
import { defaultTheme } from './theme.js';
import type { CliConfig } from './types.js';

const log = createLogger('tui:cli');

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));

  switch (parsed.kind) {
    case 'help':
      console.log(USAGE);
      return;
    case 'version':
      console.log(`necroshell v${VERSION}`);
      return;
    case 'error':
      console.error(`Error: ${parsed.message}\n\nRun 'necroshell --help' for usage.`);
      process.exitCode = 2;
      return;
    case 'run':
      await run(parsed.config);
      return;
  }
}

async function run(config: CliConfig): Promise<void> {
  const settings = loadSettings(config.settingsPath);
  configureLogger(resolveLoggerOptions(config, settings));

  const session = createCommandSession(resolveSessionConfig(config, settings));
  const skipped = registerBuiltinCommands(session, { output: process.stdout });
  if (skipped.length > 0) {
    log.warn('Built-in commands already registered', { skipped });
  }

  // Non-interactive mode
  if (config.command !== undefined) {
    session.initialize();
    try {
      process.exitCode = runCommand(session, config.command, defaultTheme, process);
    } finally {
      session.shutdown();
    }
    return;
  }

  // Interactive mode; history is loaded first so the up arrow can reach it
  session.initialize();
  const source = new ReadlineLineSource({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY,
    completer: createCompleter(session.autocomplete),
    history: session.history.entries(),
    historySize: session.history.capacity,
  });

  await runShell({
    session,
    source,
    prompt: settings.prompt,
    theme: defaultTheme,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

// Run
main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
