/**
 * @fileoverview Shell Loop
 *
 * Drives a CommandSession: prompt, read, execute, render, until
 * a command or end of input asks to exit.
 */
import { createLogger, type CommandSession, type LineSource } from '@necromancers-shell/core';
import { writeResult, type OutputStreams } from './render.js';
import type { ShellTheme } from './theme.js';

const log = createLogger('tui:shell');

export const BANNER = [
  "Necromancer's Shell - Command System Active",
  "Type 'help' for available commands, 'quit' to exit",
  '',
].join('\n');

export interface ShellOptions extends OutputStreams {
  session: CommandSession;
  /** Attached to the session before the first read */
  source: LineSource;
  prompt: string;
  theme: ShellTheme;
  /** Print the banner before the first prompt (default: true) */
  banner?: boolean;
}

/**
 * Run until exit, then shut the session down. Initializes the session if
 * the caller has not.
 */
export async function runShell(options: ShellOptions): Promise<void> {
  const { session, theme } = options;
  const prompt = theme.prompt(options.prompt);

  session.attachLineSource(options.source);
  if (!session.isInitialized()) {
    session.initialize();
  }

  if (options.banner ?? true) {
    options.stdout.write(`${theme.heading(BANNER)}\n`);
  }

  let commands = 0;
  try {
    for (;;) {
      const result = await session.readAndExecute(prompt);
      writeResult(result, theme, options);
      commands++;
      if (result.shouldExit) {
        break;
      }
    }
  } finally {
    log.info('Shell loop finished', { commands });
    session.shutdown();
  }
}

/**
 * Execute one line non-interactively. Returns the process exit code.
 */
export function runCommand(
  session: CommandSession,
  line: string,
  theme: ShellTheme,
  streams: OutputStreams
): number {
  const result = session.execute(line);
  writeResult(result, theme, streams);
  return result.success ? 0 : 1;
}
