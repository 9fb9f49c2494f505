/**
 * @fileoverview Readline Line Source
 *
 * LineSource over node:readline. Lines typed before readLine() is called are
 * buffered; end of input, close() and Ctrl+C all resolve pending and later
 * reads with null.
 */
import * as readline from 'readline';
import type { LineSource } from '@necromancers-shell/core';
import type { ReadlineCompleter } from '../completer.js';

export interface ReadlineSourceOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Enable line editing, arrow-key history and tab completion */
  terminal?: boolean;
  completer?: ReadlineCompleter;
  /** Previous lines, oldest first, offered by the up arrow */
  history?: readonly string[];
  historySize?: number;
}

export class ReadlineLineSource implements LineSource {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;
  private closed = false;

  constructor(options: ReadlineSourceOptions) {
    this.rl = readline.createInterface({
      input: options.input,
      output: options.output,
      terminal: options.terminal ?? false,
      completer: options.completer,
      // readline keeps history newest first
      history: [...(options.history ?? [])].reverse(),
      historySize: options.historySize,
    });
    this.lines = this.rl[Symbol.asyncIterator]();

    this.rl.on('close', () => {
      this.closed = true;
    });
    this.rl.on('SIGINT', () => {
      this.close();
    });
  }

  async readLine(prompt: string): Promise<string | null> {
    if (!this.closed) {
      this.rl.setPrompt(prompt);
      this.rl.prompt();
    }
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.rl.close();
  }
}
