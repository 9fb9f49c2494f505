/**
 * @fileoverview Result Rendering
 *
 * Turns a CommandResult into the text written to stdout and stderr.
 * Output goes to stdout; error messages go to stderr as `Error: <message>`.
 */
import type { CommandResult } from '@necromancers-shell/core';
import type { ShellTheme } from './theme.js';

export interface RenderedResult {
  stdout: string | null;
  stderr: string | null;
}

export function renderResult(result: CommandResult, theme: ShellTheme): RenderedResult {
  const stdout = result.output ? theme.output(result.output) : null;

  if (result.success) {
    return { stdout, stderr: null };
  }

  return {
    stdout,
    stderr: result.error ? `${theme.errorLabel('Error:')} ${theme.error(result.error)}` : null,
  };
}

export interface OutputStreams {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * Render and write a result, one trailing newline per stream
 */
export function writeResult(result: CommandResult, theme: ShellTheme, streams: OutputStreams): void {
  const rendered = renderResult(result, theme);
  if (rendered.stdout !== null) {
    streams.stdout.write(`${rendered.stdout}\n`);
  }
  if (rendered.stderr !== null) {
    streams.stderr.write(`${rendered.stderr}\n`);
  }
}
